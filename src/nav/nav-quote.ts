import Decimal from 'decimal.js';
import { SchemaError } from '../common/errors/fund-accounting.errors';
import { parseDecimal } from '../common/utils/decimal.util';

// Dealing-date price lookup consumed by the unitisation engine.
// Keys are ISO calendar dates (YYYY-MM-DD).
export type NavByDate = ReadonlyMap<string, Decimal>;

/**
 * Builds the lookup from a plain { date: navPerUnit } record.
 * Sign is not checked here; the engine rejects non-positive quotes for dates it uses.
 */
export function toNavByDate(quotes: Readonly<Record<string, unknown>>): NavByDate {
  return new Map(
    Object.entries(quotes).map(([date, value]): [string, Decimal] => {
      const navPerUnit = parseDecimal(value);
      if (!navPerUnit) {
        throw new SchemaError(`NAV per unit for ${date} is not a number: ${String(value)}`, { date });
      }
      return [date, navPerUnit];
    }),
  );
}

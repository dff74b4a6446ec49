import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import {
  Holding,
  HoldingInput,
  Liability,
  LiabilityInput,
  NavCalculation,
  ValuedHolding,
} from './entities/holding.entity';
import { FUND_CONFIG, FundConfig } from '../config/fund.config';
import { ArgumentError, SchemaError } from '../common/errors/fund-accounting.errors';
import { DecimalInput, add, divide, parseDecimal } from '../common/utils/decimal.util';

const HOLDING_FIELDS = ['instrument', 'quantity', 'price', 'baseCcy', 'fxToBase'] as const;
const LIABILITY_FIELDS = ['liability', 'amount', 'baseCcy'] as const;

function missingFields<K extends string>(row: Partial<Record<K, unknown>>, fields: readonly K[]): K[] {
  return fields.filter((field) => {
    const value = row[field];
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
  });
}

function requireNumber(value: unknown, label: string): Decimal {
  const parsed = parseDecimal(value);
  if (!parsed) {
    throw new SchemaError(`${label} is not a number: ${String(value)}`);
  }
  return parsed;
}

/**
 * NAV aggregation for one valuation point.
 * net assets = Σ(quantity × price × fx) − Σ liabilities; NAV per unit = net assets / units.
 * Pure arithmetic, no state; FX rates arrive already resolved.
 */
@Injectable()
export class NavService {
  private readonly logger = new Logger(NavService.name);

  constructor(@Inject(FUND_CONFIG) private readonly config: FundConfig) {}

  /**
   * @throws SchemaError if a row lacks a required field or carries a non-numeric value
   * @throws ArgumentError if unitsOutstanding <= 0
   */
  calculateNav(
    holdingRows: readonly HoldingInput[],
    liabilityRows: readonly LiabilityInput[],
    unitsOutstanding: DecimalInput,
    baseCcy: string = this.config.baseCcy,
  ): NavCalculation {
    const holdings = holdingRows.map((row, index) => this.toHolding(row, index));
    const liabilities = liabilityRows.map((row, index) => this.toLiability(row, index));

    const units = parseDecimal(unitsOutstanding);
    if (!units || units.lessThanOrEqualTo(0)) {
      throw new ArgumentError('Units outstanding must be greater than 0.', {
        unitsOutstanding: String(unitsOutstanding),
      });
    }

    const valued: ValuedHolding[] = holdings.map((holding) => ({
      ...holding,
      marketValueBase: holding.quantity.times(holding.price).times(holding.fxToBase),
    }));

    const totalAssets = add(...valued.map((h) => h.marketValueBase));
    const totalLiabilities = add(...liabilities.map((l) => l.amount));
    const netAssets = totalAssets.minus(totalLiabilities);
    const navPerUnit = divide(netAssets, units);

    this.logger.log(
      `NAV ${navPerUnit.toString()} ${baseCcy} per unit from ${valued.length} holdings and ${liabilities.length} liabilities`,
    );

    return {
      holdings: valued,
      liabilities,
      summary: {
        baseCcy,
        totalAssets,
        totalLiabilities,
        netAssets,
        unitsOutstanding: units,
        navPerUnit,
      },
    };
  }

  private toHolding(row: HoldingInput, index: number): Holding {
    const missing = missingFields(row, HOLDING_FIELDS);
    if (missing.length > 0) {
      throw new SchemaError(`Missing fields in holding ${index}: ${missing.join(', ')}`, { index, missing });
    }

    return {
      instrument: String(row.instrument),
      quantity: requireNumber(row.quantity, `Quantity of holding ${index}`),
      price: requireNumber(row.price, `Price of holding ${index}`),
      baseCcy: String(row.baseCcy),
      fxToBase: requireNumber(row.fxToBase, `FX rate of holding ${index}`),
    };
  }

  private toLiability(row: LiabilityInput, index: number): Liability {
    const missing = missingFields(row, LIABILITY_FIELDS);
    if (missing.length > 0) {
      throw new SchemaError(`Missing fields in liability ${index}: ${missing.join(', ')}`, { index, missing });
    }

    return {
      liability: String(row.liability),
      amount: requireNumber(row.amount, `Amount of liability ${index}`),
      baseCcy: String(row.baseCcy),
    };
  }
}

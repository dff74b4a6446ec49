import { Injectable, Logger } from '@nestjs/common';
import { Transaction, TransactionInput, TransactionKind } from './entities/transaction.entity';
import { InvalidKindError, SchemaError } from '../common/errors/fund-accounting.errors';
import { parseDecimal } from '../common/utils/decimal.util';

const REQUIRED_FIELDS = ['date', 'investor', 'kind', 'amount'] as const;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const KINDS: ReadonlySet<string> = new Set(Object.values(TransactionKind));

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  return typeof value !== 'string' || value.trim() !== '';
}

function isTransactionKind(value: string): value is TransactionKind {
  return KINDS.has(value);
}

// Turns raw records into typed transactions.
// Validates every record before returning any, input order preserved.
@Injectable()
export class TransactionNormalizerService {
  private readonly logger = new Logger(TransactionNormalizerService.name);

  /**
   * @throws SchemaError when a field is missing or unreadable
   * @throws InvalidKindError when kind is not subscription/redemption after trim + lower-case
   */
  normalize(inputs: readonly TransactionInput[]): Transaction[] {
    const transactions = inputs.map((input, index) => this.normalizeOne(input, index));
    this.logger.debug(`Normalized ${transactions.length} transactions`);
    return transactions;
  }

  /** Reduces a date or ISO date-time to its YYYY-MM-DD calendar date */
  normalizeDate(value: unknown): string | undefined {
    const raw = value instanceof Date ? value.toISOString() : value;
    if (typeof raw !== 'string') {
      return undefined;
    }

    const match = ISO_DATE.exec(raw.trim());
    if (!match) {
      return undefined;
    }

    const [, year, month, day] = match;
    const calendarDate = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // rejects rollovers such as 2026-02-30
    if (
      calendarDate.getUTCFullYear() !== Number(year) ||
      calendarDate.getUTCMonth() !== Number(month) - 1 ||
      calendarDate.getUTCDate() !== Number(day)
    ) {
      return undefined;
    }
    return `${year}-${month}-${day}`;
  }

  private normalizeOne(input: TransactionInput, index: number): Transaction {
    const missing = REQUIRED_FIELDS.filter((field) => !isPresent(input[field]));
    if (missing.length > 0) {
      this.logger.warn(`Transaction ${index} missing fields: ${missing.join(', ')}`);
      throw new SchemaError(`Missing fields in transaction ${index}: ${missing.join(', ')}`, {
        index,
        missing,
      });
    }

    const kind = String(input.kind).trim().toLowerCase();
    if (!isTransactionKind(kind)) {
      this.logger.warn(`Transaction ${index} has unrecognized kind '${String(input.kind)}'`);
      throw new InvalidKindError(index, String(input.kind));
    }

    const date = this.normalizeDate(input.date);
    if (!date) {
      throw new SchemaError(`Invalid date in transaction ${index}: ${String(input.date)}`, { index });
    }

    if (typeof input.investor !== 'string') {
      throw new SchemaError(`Investor must be a string in transaction ${index}`, { index });
    }

    const amount = parseDecimal(input.amount);
    if (!amount) {
      throw new SchemaError(`Amount is not a number in transaction ${index}: ${String(input.amount)}`, {
        index,
      });
    }
    if (!amount.isPositive() || amount.isZero()) {
      throw new SchemaError(`Amount must be positive in transaction ${index}: ${amount.toString()}`, {
        index,
      });
    }

    return { date, investor: input.investor, kind, amount };
  }
}

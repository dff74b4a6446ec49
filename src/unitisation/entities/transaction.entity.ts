import Decimal from 'decimal.js';

export enum TransactionKind {
  SUBSCRIPTION = 'subscription',
  REDEMPTION = 'redemption',
}

// Investor cash movement, already normalized.
// amount is base-currency value to convert, never a unit count.
export interface Transaction {
  date: string;               // ISO calendar date, YYYY-MM-DD
  investor: string;
  kind: TransactionKind;
  amount: Decimal;
}

// Raw record as handed over by a loader or the HTTP layer.
export interface TransactionInput {
  date?: unknown;
  investor?: unknown;
  kind?: unknown;
  amount?: unknown;
}

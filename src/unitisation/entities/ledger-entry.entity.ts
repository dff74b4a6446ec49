import Decimal from 'decimal.js';
import { TransactionKind } from './transaction.entity';

// One audit row per processed transaction, in processing order.
// Values carry full precision; rounding happens only in the report view.
export interface LedgerEntry {
  readonly date: string;
  readonly investor: string;
  readonly kind: TransactionKind;
  readonly amount: Decimal;
  readonly navPerUnit: Decimal;
  readonly unitsChange: Decimal;         // signed: + subscription, - redemption
  readonly investorUnitsAfter: Decimal;
  readonly totalUnitsAfter: Decimal;
}

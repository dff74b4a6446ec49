import Decimal from 'decimal.js';
import { LedgerEntry } from './ledger-entry.entity';

// Running state for a single engine invocation.
// totalUnits = openingUnits + sum of investor balances.
export interface FundState {
  readonly openingUnits: Decimal;
  readonly openingNavPerUnit: Decimal;   // informational only
  totalUnits: Decimal;
  investorUnits: Map<string, Decimal>;
}

export interface InvestorUnits {
  investor: string;
  units: Decimal;
}

export type UnitisationTotals = {
  openingUnits: Decimal;
  openingNavPerUnit: Decimal;
  closingUnits: Decimal;
};

export interface UnitisationResult {
  ledger: LedgerEntry[];
  investorSummary: InvestorUnits[];    // sorted by investor
  totals: UnitisationTotals;
}

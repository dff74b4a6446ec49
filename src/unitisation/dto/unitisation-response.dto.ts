// Ledger row as emitted: amount to 2 dp, NAV and units to 6 dp
export interface LedgerEntryDto {
  date: string;
  investor: string;
  kind: 'Subscription' | 'Redemption';
  amount: number;
  navPerUnit: number;
  unitsChange: number;
  investorUnitsAfter: number;
  totalUnitsAfter: number;
}

export interface InvestorUnitsDto {
  investor: string;
  units: number;
}

export interface UnitisationTotalsDto {
  openingUnits: number;
  openingNavPerUnit: number;
  closingUnits: number;
  closingUnitsExact: string;     // full precision, for the next run's openingUnits
}

// Complete unitisation run
export interface UnitisationResponseDto {
  runId: string;                         // per call, not part of the deterministic payload
  ledger: LedgerEntryDto[];
  investorSummary: InvestorUnitsDto[];   // sorted by investor
  totals: UnitisationTotalsDto;
}

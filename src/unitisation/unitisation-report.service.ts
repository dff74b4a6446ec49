import { Inject, Injectable } from '@nestjs/common';
import { UnitisationResult } from './entities/fund-state.entity';
import { LedgerEntry } from './entities/ledger-entry.entity';
import { TransactionKind } from './entities/transaction.entity';
import { LedgerEntryDto, UnitisationResponseDto } from './dto/unitisation-response.dto';
import { FUND_CONFIG, FundConfig } from '../config/fund.config';
import { toRoundedNumber } from '../common/utils/decimal.util';

export type UnitisationReport = Omit<UnitisationResponseDto, 'runId'>;

const KIND_LABELS: Record<TransactionKind, LedgerEntryDto['kind']> = {
  [TransactionKind.SUBSCRIPTION]: 'Subscription',
  [TransactionKind.REDEMPTION]: 'Redemption',
};

// Read-only view of an engine result for emission.
// Rounding is applied here only; engine values stay at full precision.
@Injectable()
export class UnitisationReportService {
  constructor(@Inject(FUND_CONFIG) private readonly config: FundConfig) {}

  buildReport(result: UnitisationResult): UnitisationReport {
    const units = this.config.unitsDecimalPlaces;

    return {
      ledger: result.ledger.map((entry) => this.toLedgerRow(entry)),
      investorSummary: result.investorSummary.map(({ investor, units: held }) => ({
        investor,
        units: toRoundedNumber(held, units),
      })),
      totals: {
        openingUnits: toRoundedNumber(result.totals.openingUnits, units),
        openingNavPerUnit: toRoundedNumber(result.totals.openingNavPerUnit, units),
        closingUnits: toRoundedNumber(result.totals.closingUnits, units),
        closingUnitsExact: result.totals.closingUnits.toString(),
      },
    };
  }

  private toLedgerRow(entry: LedgerEntry): LedgerEntryDto {
    const units = this.config.unitsDecimalPlaces;

    return {
      date: entry.date,
      investor: entry.investor,
      kind: KIND_LABELS[entry.kind],
      amount: toRoundedNumber(entry.amount, this.config.amountDecimalPlaces),
      navPerUnit: toRoundedNumber(entry.navPerUnit, units),
      unitsChange: toRoundedNumber(entry.unitsChange, units),
      investorUnitsAfter: toRoundedNumber(entry.investorUnitsAfter, units),
      totalUnitsAfter: toRoundedNumber(entry.totalUnitsAfter, units),
    };
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Transaction, TransactionInput, TransactionKind } from './entities/transaction.entity';
import { LedgerEntry } from './entities/ledger-entry.entity';
import { FundState, UnitisationResult } from './entities/fund-state.entity';
import { TransactionNormalizerService } from './transaction-normalizer.service';
import { NavByDate } from '../nav/nav-quote';
import { FUND_CONFIG, FundConfig } from '../config/fund.config';
import {
  InsufficientBalanceError,
  InvalidQuoteError,
  MissingQuoteError,
} from '../common/errors/fund-accounting.errors';
import { DecimalInput, divide, toDecimal } from '../common/utils/decimal.util';

export interface UnitisationInput {
  openingUnits: DecimalInput;
  openingNavPerUnit: DecimalInput;
  transactions: readonly TransactionInput[];
  navByDate: NavByDate;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Canonical processing order: date, then investor. Array#sort is stable, so ties keep input order. */
export function sortForProcessing(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort(
    (a, b) => compareText(a.date, b.date) || compareText(a.investor, b.investor),
  );
}

// Unitisation engine: folds subscriptions and redemptions into investor units.
// Each call owns its state; nothing survives between invocations.
@Injectable()
export class UnitisationService {
  private readonly logger = new Logger(UnitisationService.name);

  constructor(
    private readonly normalizer: TransactionNormalizerService,
    @Inject(FUND_CONFIG) private readonly config: FundConfig,
  ) {}

  /**
   * Converts the batch into a ledger, per-investor balances and fund totals.
   * Any failure aborts the whole batch; no partial ledger is returned.
   */
  process(input: UnitisationInput): UnitisationResult {
    // re-validated here even when the caller already normalized
    const transactions = sortForProcessing(this.normalizer.normalize(input.transactions));

    const state: FundState = {
      openingUnits: toDecimal(input.openingUnits),
      openingNavPerUnit: toDecimal(input.openingNavPerUnit),
      totalUnits: toDecimal(input.openingUnits),
      investorUnits: new Map(),
    };
    this.logger.log(
      `Processing ${transactions.length} transactions from ${state.openingUnits.toString()} opening units`,
    );

    const ledger = transactions.map((tx) => this.apply(state, tx, this.resolveNav(input.navByDate, tx.date)));

    const investorSummary = Array.from(state.investorUnits.entries())
      .map(([investor, units]) => ({ investor, units }))
      .sort((a, b) => compareText(a.investor, b.investor));

    this.logger.log(
      `Processed ${ledger.length} transactions for ${investorSummary.length} investors, closing units ${state.totalUnits.toString()}`,
    );

    return {
      ledger,
      investorSummary,
      totals: {
        openingUnits: state.openingUnits,
        openingNavPerUnit: state.openingNavPerUnit,
        closingUnits: state.totalUnits,
      },
    };
  }

  private resolveNav(navByDate: NavByDate, date: string): Decimal {
    const navPerUnit = navByDate.get(date);
    if (navPerUnit === undefined) {
      this.logger.warn(`No NAV per unit for ${date}`);
      throw new MissingQuoteError(date);
    }
    if (navPerUnit.lessThanOrEqualTo(0)) {
      this.logger.warn(`Non-positive NAV per unit ${navPerUnit.toString()} for ${date}`);
      throw new InvalidQuoteError(date, navPerUnit.toString());
    }
    return navPerUnit;
  }

  // Mutates state for one transaction and returns its ledger row.
  private apply(state: FundState, tx: Transaction, navPerUnit: Decimal): LedgerEntry {
    const unitsDelta = divide(tx.amount, navPerUnit);
    const held = state.investorUnits.get(tx.investor) ?? new Decimal(0);

    let unitsChange: Decimal;
    if (tx.kind === TransactionKind.SUBSCRIPTION) {
      unitsChange = unitsDelta;
    } else {
      if (held.plus(this.config.redemptionTolerance).lessThan(unitsDelta)) {
        this.logger.warn(`Redemption by ${tx.investor} on ${tx.date} exceeds holding`);
        throw new InsufficientBalanceError(
          tx.investor,
          tx.date,
          held.toFixed(this.config.unitsDecimalPlaces),
          unitsDelta.toFixed(this.config.unitsDecimalPlaces),
        );
      }
      unitsChange = unitsDelta.negated();
    }

    const investorUnitsAfter = held.plus(unitsChange);
    state.investorUnits.set(tx.investor, investorUnitsAfter);
    state.totalUnits = state.totalUnits.plus(unitsChange);

    return {
      date: tx.date,
      investor: tx.investor,
      kind: tx.kind,
      amount: tx.amount,
      navPerUnit,
      unitsChange,
      investorUnitsAfter,
      totalUnitsAfter: state.totalUnits,
    };
  }
}

import Decimal from 'decimal.js';
import { parseDecimal } from '../common/utils/decimal.util';

export const FUND_CONFIG = 'FUND_CONFIG';

export interface FundConfig {
  port: number;
  baseCcy: string;
  redemptionTolerance: Decimal;  // slack allowed when a redemption empties a holding
  unitsDecimalPlaces: number;    // ledger view precision for units and NAV per unit
  amountDecimalPlaces: number;   // ledger view precision for currency amounts
}

const DEFAULTS = {
  PORT: '3000',
  BASE_CCY: 'USD',
  REDEMPTION_TOLERANCE: '1e-12',
  UNITS_DECIMAL_PLACES: '6',
  AMOUNT_DECIMAL_PLACES: '2',
};

function readInteger(env: NodeJS.ProcessEnv, key: keyof typeof DEFAULTS, min: number): number {
  const raw = env[key] ?? DEFAULTS[key];
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

/**
 * Builds the typed config from environment variables.
 * Throws on invalid values so a misconfigured service never starts.
 */
export function loadFundConfig(env: NodeJS.ProcessEnv = process.env): FundConfig {
  const rawTolerance = env.REDEMPTION_TOLERANCE ?? DEFAULTS.REDEMPTION_TOLERANCE;
  const redemptionTolerance = parseDecimal(rawTolerance);
  if (!redemptionTolerance || redemptionTolerance.isNegative()) {
    throw new Error(`REDEMPTION_TOLERANCE must be a non-negative number, got '${rawTolerance}'`);
  }

  const baseCcy = (env.BASE_CCY ?? DEFAULTS.BASE_CCY).trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(baseCcy)) {
    throw new Error(`BASE_CCY must be a 3-letter currency code, got '${baseCcy}'`);
  }

  return {
    port: readInteger(env, 'PORT', 1),
    baseCcy,
    redemptionTolerance,
    unitsDecimalPlaces: readInteger(env, 'UNITS_DECIMAL_PLACES', 0),
    amountDecimalPlaces: readInteger(env, 'AMOUNT_DECIMAL_PLACES', 0),
  };
}

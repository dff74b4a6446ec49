import Decimal from 'decimal.js';

// Position row valued into the fund's base currency.
export interface Holding {
  instrument: string;
  quantity: Decimal;
  price: Decimal;            // in the instrument's currency
  baseCcy: string;
  fxToBase: Decimal;         // already applied upstream rate
}

export interface ValuedHolding extends Holding {
  marketValueBase: Decimal;  // quantity × price × fxToBase
}

export interface Liability {
  liability: string;
  amount: Decimal;
  baseCcy: string;
}

export interface NavSummary {
  baseCcy: string;
  totalAssets: Decimal;
  totalLiabilities: Decimal;
  netAssets: Decimal;
  unitsOutstanding: Decimal;
  navPerUnit: Decimal;
}

export interface NavCalculation {
  holdings: ValuedHolding[];
  liabilities: Liability[];
  summary: NavSummary;
}

// Loosely typed rows as received from a loader or the HTTP layer.
export type HoldingInput = Partial<Record<'instrument' | 'quantity' | 'price' | 'baseCcy' | 'fxToBase', unknown>>;
export type LiabilityInput = Partial<Record<'liability' | 'amount' | 'baseCcy', unknown>>;

// Position valued in base currency, money rounded to 2 dp
export interface ValuedHoldingDto {
  instrument: string;
  quantity: number;
  price: number;
  baseCcy: string;
  fxToBase: number;
  marketValueBase: number;
}

export interface LiabilityRowDto {
  liability: string;
  amount: number;
  baseCcy: string;
}

export interface NavSummaryDto {
  baseCcy: string;
  totalAssets: number;
  totalLiabilities: number;
  netAssets: number;
  unitsOutstanding: number;
  navPerUnit: number;             // 6 dp
}

export interface NavResponseDto {
  holdings: ValuedHoldingDto[];
  liabilities: LiabilityRowDto[];
  summary: NavSummaryDto;
}

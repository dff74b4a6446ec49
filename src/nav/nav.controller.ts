import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from '@nestjs/common';
import { NavService } from './nav.service';
import { CalculateNavDto } from './dto/calculate-nav.dto';
import { NavResponseDto } from './dto/nav-response.dto';
import { FUND_CONFIG, FundConfig } from '../config/fund.config';
import { toRoundedNumber } from '../common/utils/decimal.util';

@Controller('nav')
export class NavController {
  constructor(
    private readonly navService: NavService,
    @Inject(FUND_CONFIG) private readonly config: FundConfig,
  ) {}

  /**
   * Values holdings in base currency and derives NAV per unit.
   *
   * POST /nav/calculate
   * @returns 200 with valued holdings, liabilities and NAV summary
   */
  @Post('calculate')
  @HttpCode(HttpStatus.OK)
  calculate(@Body() dto: CalculateNavDto): NavResponseDto {
    const { holdings, liabilities, summary } = this.navService.calculateNav(
      dto.holdings,
      dto.liabilities,
      dto.unitsOutstanding,
      dto.baseCcy,
    );
    const money = this.config.amountDecimalPlaces;

    return {
      holdings: holdings.map((h) => ({
        instrument: h.instrument,
        quantity: h.quantity.toNumber(),
        price: h.price.toNumber(),
        baseCcy: h.baseCcy,
        fxToBase: h.fxToBase.toNumber(),
        marketValueBase: toRoundedNumber(h.marketValueBase, money),
      })),
      liabilities: liabilities.map((l) => ({
        liability: l.liability,
        amount: toRoundedNumber(l.amount, money),
        baseCcy: l.baseCcy,
      })),
      summary: {
        baseCcy: summary.baseCcy,
        totalAssets: toRoundedNumber(summary.totalAssets, money),
        totalLiabilities: toRoundedNumber(summary.totalLiabilities, money),
        netAssets: toRoundedNumber(summary.netAssets, money),
        unitsOutstanding: summary.unitsOutstanding.toNumber(),
        navPerUnit: toRoundedNumber(summary.navPerUnit, this.config.unitsDecimalPlaces),
      },
    };
  }
}

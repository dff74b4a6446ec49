import { Test, TestingModule } from '@nestjs/testing';
import { NavController } from './nav.controller';
import { NavService } from './nav.service';
import { FUND_CONFIG, loadFundConfig } from '../config/fund.config';
import { ArgumentError } from '../common/errors/fund-accounting.errors';

describe('NavController', () => {
  let controller: NavController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [NavController],
      providers: [NavService, { provide: FUND_CONFIG, useValue: loadFundConfig({ BASE_CCY: 'gbp' }) }],
    }).compile();

    controller = module.get<NavController>(NavController);
  });

  describe('calculate', () => {
    it('should round money to 2 places and NAV per unit to 6', () => {
      const result = controller.calculate({
        holdings: [{ instrument: 'EQ-ALPHA', quantity: 3, price: 33.3335, baseCcy: 'GBP', fxToBase: 1 }],
        liabilities: [{ liability: 'Admin fee', amount: 0.005, baseCcy: 'GBP' }],
        unitsOutstanding: 30,
      });

      expect(result.holdings).toEqual([
        {
          instrument: 'EQ-ALPHA',
          quantity: 3,
          price: 33.3335,
          baseCcy: 'GBP',
          fxToBase: 1,
          marketValueBase: 100,
        },
      ]);
      expect(result.liabilities).toEqual([{ liability: 'Admin fee', amount: 0.01, baseCcy: 'GBP' }]);
      expect(result.summary).toEqual({
        baseCcy: 'GBP',
        totalAssets: 100,
        totalLiabilities: 0.01,
        netAssets: 100,
        unitsOutstanding: 30,
        navPerUnit: 3.333183,
      });
    });

    it('should fall back to the configured base currency', () => {
      const result = controller.calculate({ holdings: [], liabilities: [], unitsOutstanding: 1 });
      expect(result.summary.baseCcy).toBe('GBP');
    });

    it('should propagate ArgumentError for non-positive units', () => {
      expect(() => controller.calculate({ holdings: [], liabilities: [], unitsOutstanding: 0 })).toThrow(
        ArgumentError,
      );
    });
  });
});

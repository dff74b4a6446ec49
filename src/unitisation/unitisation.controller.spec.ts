import { Test, TestingModule } from '@nestjs/testing';
import { UnitisationController } from './unitisation.controller';
import { UnitisationService } from './unitisation.service';
import { UnitisationReportService } from './unitisation-report.service';
import { TransactionNormalizerService } from './transaction-normalizer.service';
import { ProcessUnitisationDto, TransactionDto } from './dto/process-unitisation.dto';
import { FUND_CONFIG, loadFundConfig } from '../config/fund.config';
import {
  InsufficientBalanceError,
  InvalidKindError,
  MissingQuoteError,
  SchemaError,
} from '../common/errors/fund-accounting.errors';

describe('UnitisationController', () => {
  let controller: UnitisationController;

  const createDto = (transactions: TransactionDto[], overrides: Partial<ProcessUnitisationDto> = {}): ProcessUnitisationDto => ({
    openingUnits: 100000,
    openingNavPerUnit: 1,
    transactions,
    navByDate: { '2026-01-02': 1.0125, '2026-01-03': 1.02 },
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [UnitisationController],
      providers: [
        TransactionNormalizerService,
        UnitisationService,
        UnitisationReportService,
        { provide: FUND_CONFIG, useValue: loadFundConfig({}) },
      ],
    }).compile();

    controller = module.get<UnitisationController>(UnitisationController);
  });

  describe('process', () => {
    it('should return ledger, summary and totals for a batch', () => {
      const result = controller.process(
        createDto([{ date: '2026-01-02', investor: 'INV-001', kind: 'Subscription', amount: 10125 }]),
      );

      expect(result.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(result.ledger).toEqual([
        {
          date: '2026-01-02',
          investor: 'INV-001',
          kind: 'Subscription',
          amount: 10125,
          navPerUnit: 1.0125,
          unitsChange: 10000,
          investorUnitsAfter: 10000,
          totalUnitsAfter: 110000,
        },
      ]);
      expect(result.investorSummary).toEqual([{ investor: 'INV-001', units: 10000 }]);
      expect(result.totals).toEqual({
        openingUnits: 100000,
        openingNavPerUnit: 1,
        closingUnits: 110000,
        closingUnitsExact: '110000',
      });
    });

    it('should return the opening totals for an empty batch', () => {
      const result = controller.process(createDto([], { openingUnits: 100 }));

      expect(result.ledger).toEqual([]);
      expect(result.investorSummary).toEqual([]);
      expect(result.totals.closingUnits).toBe(result.totals.openingUnits);
      expect(result.totals.closingUnitsExact).toBe('100');
    });

    it('should give each run its own runId but the same payload', () => {
      const dto = createDto([{ date: '2026-01-02', investor: 'A', kind: 'Subscription', amount: 10125 }]);

      const { runId: firstRun, ...first } = controller.process(dto);
      const { runId: secondRun, ...second } = controller.process(dto);

      expect(firstRun).not.toBe(secondRun);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('should carry the previous closing units into the next run', () => {
      const dayOne = controller.process(
        createDto([{ date: '2026-01-02', investor: 'A', kind: 'Subscription', amount: 10125 }]),
      );
      const dayTwo = controller.process(
        createDto([{ date: '2026-01-03', investor: 'B', kind: 'Subscription', amount: 1020 }], {
          openingUnits: dayOne.totals.closingUnits,
        }),
      );

      expect(dayTwo.totals.openingUnits).toBe(110000);
      expect(dayTwo.totals.closingUnits).toBe(111000);
    });

    it('should surface domain errors unchanged', () => {
      expect(() =>
        controller.process(createDto([{ date: '2026-01-02', investor: 'A', kind: 'Purchase', amount: 1 }])),
      ).toThrow(InvalidKindError);
      expect(() =>
        controller.process(createDto([{ date: '2026-01-04', investor: 'A', kind: 'Subscription', amount: 1 }])),
      ).toThrow(MissingQuoteError);
      expect(() =>
        controller.process(createDto([{ date: '2026-01-03', investor: 'A', kind: 'Redemption', amount: 1 }])),
      ).toThrow(InsufficientBalanceError);
    });

    it('should reject a non-numeric NAV quote', () => {
      const dto = createDto([{ date: '2026-01-02', investor: 'A', kind: 'Subscription', amount: 1 }], {
        navByDate: { '2026-01-02': Number.NaN },
      });

      expect(() => controller.process(dto)).toThrow(SchemaError);
    });
  });
});

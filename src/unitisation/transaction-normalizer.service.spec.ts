import { Test, TestingModule } from '@nestjs/testing';
import { TransactionNormalizerService } from './transaction-normalizer.service';
import { TransactionInput, TransactionKind } from './entities/transaction.entity';
import { InvalidKindError, SchemaError } from '../common/errors/fund-accounting.errors';

describe('TransactionNormalizerService', () => {
  let normalizer: TransactionNormalizerService;

  const createInput = (overrides: TransactionInput = {}): TransactionInput => ({
    date: '2026-01-02',
    investor: 'INV-001',
    kind: 'Subscription',
    amount: 10125,
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TransactionNormalizerService],
    }).compile();

    normalizer = module.get<TransactionNormalizerService>(TransactionNormalizerService);
  });

  describe('normalize', () => {
    it('should produce typed transactions in input order', () => {
      const [first, second] = normalizer.normalize([
        createInput({ date: '2026-01-03', investor: 'B' }),
        createInput({ date: '2026-01-02', investor: 'A', kind: 'Redemption', amount: '5100.00' }),
      ]);

      expect(first.investor).toBe('B');
      expect(first.kind).toBe(TransactionKind.SUBSCRIPTION);
      expect(first.amount.toString()).toBe('10125');
      expect(second.investor).toBe('A');
      expect(second.kind).toBe(TransactionKind.REDEMPTION);
      expect(second.amount.toString()).toBe('5100');
    });

    it('should normalize kind by trimming and lower-casing', () => {
      const [tx] = normalizer.normalize([createInput({ kind: '  REDEMPTION ' })]);
      expect(tx.kind).toBe(TransactionKind.REDEMPTION);
    });

    it('should pass investor identifiers through unchanged', () => {
      const [padded, plain] = normalizer.normalize([createInput({ investor: ' A' }), createInput({ investor: 'A' })]);

      expect(padded.investor).toBe(' A');
      expect(plain.investor).toBe('A');
    });

    it('should reject an unrecognized kind', () => {
      expect(() => normalizer.normalize([createInput({ kind: 'Purchase' })])).toThrow(InvalidKindError);
      expect(() => normalizer.normalize([createInput({ kind: 'Purchase' })])).toThrow(
        "Transaction kind must be 'Subscription' or 'Redemption', got 'Purchase' at index 0",
      );
    });

    it('should report an unrecognized kind before checking the amount', () => {
      expect(() => normalizer.normalize([createInput({ kind: 'Purchase', amount: 0 })])).toThrow(InvalidKindError);
      expect(() => normalizer.normalize([createInput({ kind: 'Purchase', date: '2026-02-30' })])).toThrow(
        InvalidKindError,
      );
    });

    it('should list every missing field', () => {
      const input: TransactionInput = { date: '2026-01-02', kind: 'Subscription' };

      expect(() => normalizer.normalize([createInput(), input])).toThrow(SchemaError);
      expect(() => normalizer.normalize([createInput(), input])).toThrow(
        'Missing fields in transaction 1: investor, amount',
      );
    });

    it('should treat blank strings and null as missing', () => {
      expect(() => normalizer.normalize([createInput({ investor: '   ' })])).toThrow(
        'Missing fields in transaction 0: investor',
      );
      expect(() => normalizer.normalize([createInput({ amount: null })])).toThrow(
        'Missing fields in transaction 0: amount',
      );
    });

    it('should reject non-numeric and non-positive amounts', () => {
      expect(() => normalizer.normalize([createInput({ amount: 'ten' })])).toThrow(SchemaError);
      expect(() => normalizer.normalize([createInput({ amount: 0 })])).toThrow(
        'Amount must be positive in transaction 0: 0',
      );
      expect(() => normalizer.normalize([createInput({ amount: -25 })])).toThrow(SchemaError);
    });

    it('should return an empty batch unchanged', () => {
      expect(normalizer.normalize([])).toEqual([]);
    });
  });

  describe('normalizeDate', () => {
    it('should keep plain calendar dates', () => {
      expect(normalizer.normalizeDate('2026-01-02')).toBe('2026-01-02');
    });

    it('should drop the time component of ISO date-times', () => {
      expect(normalizer.normalizeDate('2026-01-02T15:30:00Z')).toBe('2026-01-02');
      expect(normalizer.normalizeDate('2026-01-02 09:00')).toBe('2026-01-02');
    });

    it('should accept Date instances', () => {
      expect(normalizer.normalizeDate(new Date(Date.UTC(2026, 0, 4)))).toBe('2026-01-04');
    });

    it('should reject impossible and unparseable dates', () => {
      expect(normalizer.normalizeDate('2026-02-30')).toBeUndefined();
      expect(normalizer.normalizeDate('02/01/2026')).toBeUndefined();
      expect(normalizer.normalizeDate(20260102)).toBeUndefined();
    });

    it('should fail normalize with SchemaError on a bad date', () => {
      expect(() => normalizer.normalize([createInput({ date: '2026-13-01' })])).toThrow(
        'Invalid date in transaction 0: 2026-13-01',
      );
    });
  });
});

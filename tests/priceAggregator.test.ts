import { describe, expect, it } from 'vitest';
import { AggregationMode } from '../src/domain/oracle/oracleTypes.js';
import { PriceAggregator } from '../src/domain/oracle/priceAggregator.js';

describe('PriceAggregator', () => {
  const aggregator = new PriceAggregator();

  it('returns null when there is nothing to aggregate', () => {
    expect(aggregator.aggregate([], AggregationMode.MedianTrim)).toBeNull();
    expect(aggregator.aggregate([], AggregationMode.Mean)).toBeNull();
  });

  it('trims the extremes before taking the median', () => {
    expect(aggregator.aggregate([100n, 102n, 98n, 1000n], AggregationMode.MedianTrim)).toBe(101n);
  });

  it('takes the plain mean in mean mode', () => {
    expect(aggregator.aggregate([100n, 102n, 98n, 1000n], AggregationMode.Mean)).toBe(325n);
  });

  describe('medianWithTrim()', () => {
    it('returns a single reading as is', () => {
      expect(aggregator.medianWithTrim([7n])).toBe(7n);
    });

    it('does not trim two readings and truncates their average', () => {
      expect(aggregator.medianWithTrim([4n, 8n])).toBe(6n);
      expect(aggregator.medianWithTrim([1n, 2n])).toBe(1n);
    });

    it('keeps the middle of three', () => {
      expect(aggregator.medianWithTrim([3n, 1n, 2n])).toBe(2n);
    });

    it('drops only one occurrence of a repeated extreme', () => {
      expect(aggregator.medianWithTrim([5n, 5n, 5n, 9n])).toBe(5n);
      expect(aggregator.medianWithTrim([9n, 1n, 1n, 9n])).toBe(5n);
      expect(aggregator.medianWithTrim([2n, 2n, 2n])).toBe(2n);
    });

    it('takes the odd middle after trimming', () => {
      expect(aggregator.medianWithTrim([5n, 1n, 4n, 2n, 3n])).toBe(3n);
    });

    it('does not mutate its input', () => {
      const prices = [3n, 1n, 2n];
      aggregator.medianWithTrim(prices);
      expect(prices).toEqual([3n, 1n, 2n]);
    });

    it('throws on empty input', () => {
      expect(() => aggregator.medianWithTrim([])).toThrow('No prices for median');
    });
  });

  describe('mean()', () => {
    it('truncates toward zero', () => {
      expect(aggregator.mean([1n, 2n])).toBe(1n);
      expect(aggregator.mean([10n, 11n, 13n])).toBe(11n);
    });

    it('throws on empty input', () => {
      expect(() => aggregator.mean([])).toThrow('No prices for mean');
    });
  });
});

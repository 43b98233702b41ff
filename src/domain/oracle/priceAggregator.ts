/**
 * Price aggregation over already-filtered source readings.
 */

import { AggregationMode } from './oracleTypes.js';

export class PriceAggregator {
  /**
   * Aggregate positive integer prices. Returns null when there is nothing to
   * aggregate.
   */
  aggregate(prices: readonly bigint[], mode: AggregationMode): bigint | null {
    if (prices.length === 0) {
      return null;
    }

    return mode === AggregationMode.Mean
      ? this.mean(prices)
      : this.medianWithTrim(prices);
  }

  /**
   * Plain arithmetic mean, truncated toward zero. No time weighting.
   */
  mean(prices: readonly bigint[]): bigint {
    if (prices.length === 0) {
      throw new Error('No prices for mean');
    }
    const sum = prices.reduce((acc, price) => acc + price, 0n);
    return sum / BigInt(prices.length);
  }

  /**
   * Median after dropping one lowest and one highest reading when there are
   * at least three. An even span averages its two middle readings.
   */
  medianWithTrim(prices: readonly bigint[]): bigint {
    if (prices.length === 0) {
      throw new Error('No prices for median');
    }

    const sorted = [...prices].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const start = sorted.length >= 3 ? 1 : 0;
    const end = sorted.length >= 3 ? sorted.length - 1 : sorted.length;
    const span = sorted.slice(start, end);

    if (span.length === 1) {
      return span[0];
    }

    const mid = Math.floor(span.length / 2);
    if (span.length % 2 === 1) {
      return span[mid];
    }
    return (span[mid - 1] + span[mid]) / 2n;
  }
}

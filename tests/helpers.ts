import { PriceSource } from '../src/domain/oracle/oracleTypes.js';
import { Clock } from '../src/infra/clock.js';
import { EventLogger } from '../src/infra/logger.js';

export const ADMIN = 'admin-1';

/** Clock the test moves by hand. */
export class ManualClock implements Clock {
  constructor(private current = 1_000) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export const silentLogger = (): EventLogger => new EventLogger({ name: 'test', level: 'silent' });

export const fixedPrice = (price: bigint): PriceSource => ({
  getPrice: async () => price,
});

export const failingPrice = (message: string): PriceSource => ({
  getPrice: async () => {
    throw new Error(message);
  },
});

// Vote weights, tallies, source weights and prices are signed 128-bit integers.
export const AMOUNT_MIN = -(2n ** 127n);
export const AMOUNT_MAX = 2n ** 127n - 1n;

export const isAmountInRange = (value: bigint): boolean => value >= AMOUNT_MIN && value <= AMOUNT_MAX;

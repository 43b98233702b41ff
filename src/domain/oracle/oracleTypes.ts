/**
 * Oracle source registry and aggregation types.
 */

export const AggregationMode = {
  MedianTrim: 0,
  Mean: 1,
} as const;

export type AggregationMode = typeof AggregationMode[keyof typeof AggregationMode];

export interface OracleSource {
  address: string;
  /** Stored for operators; aggregation does not weight by it. */
  weight: bigint;
  /** Seconds since epoch of the last known liveness signal. */
  lastHeartbeat: number;
}

export interface OracleSourceView extends OracleSource {
  stale: boolean;
}

export interface OracleConfig {
  heartbeatTtlSeconds: number;
  mode: AggregationMode;
  performanceCount: number;
}

/** Capability every registered source exposes. */
export interface PriceSource {
  getPrice(asset: string, signal?: AbortSignal): Promise<bigint>;
}

export interface PriceSourceResolver {
  resolve(address: string): PriceSource | null;
}

export const isStale = (source: OracleSource, now: number, ttlSeconds: number): boolean => (
  Math.max(0, now - source.lastHeartbeat) > ttlSeconds
);

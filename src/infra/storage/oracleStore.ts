import { z } from 'zod';
import { AggregationMode, OracleSource } from '../../domain/oracle/oracleTypes.js';
import { KvDraft, readValue } from './kvStore.js';
import { OracleKeys } from './storageKeys.js';

const sourceListSchema = z.array(z.object({
  address: z.string(),
  weight: z.bigint(),
  lastHeartbeat: z.number().int().nonnegative(),
}));

const modeSchema = z.union([z.literal(AggregationMode.MedianTrim), z.literal(AggregationMode.Mean)]);

export interface OracleDefaults {
  heartbeatTtlSeconds: number;
  mode: AggregationMode;
}

/** Per-asset source lists plus the oracle tunables. */
export class OracleStore {
  constructor(
    private readonly kv: KvDraft,
    private readonly defaults: OracleDefaults,
  ) {}

  getSources(asset: string): OracleSource[] {
    return readValue(this.kv, OracleKeys.sources(asset), sourceListSchema) ?? [];
  }

  putSources(asset: string, sources: OracleSource[]): void {
    this.kv.set(OracleKeys.sources(asset), sources);
  }

  getHeartbeatTtl(): number {
    return readValue(this.kv, OracleKeys.heartbeatTtl(), z.number().int().nonnegative())
      ?? this.defaults.heartbeatTtlSeconds;
  }

  setHeartbeatTtl(ttlSeconds: number): void {
    this.kv.set(OracleKeys.heartbeatTtl(), ttlSeconds);
  }

  getMode(): AggregationMode {
    return readValue(this.kv, OracleKeys.mode(), modeSchema) ?? this.defaults.mode;
  }

  setMode(mode: AggregationMode): void {
    this.kv.set(OracleKeys.mode(), mode);
  }

  getPerfCount(): number {
    return readValue(this.kv, OracleKeys.perfCount(), z.number().int().nonnegative()) ?? 0;
  }

  /** Increment the aggregation counter and return the new value. */
  incPerf(): number {
    const next = this.getPerfCount() + 1;
    this.kv.set(OracleKeys.perfCount(), next);
    return next;
  }
}

/**
 * Multi-source oracle price aggregator.
 *
 * Sources are registered per asset by an admin. Reading a price queries every
 * source whose heartbeat is within the TTL, drops non-positive answers and
 * aggregates the rest by trimmed median (mode 0) or mean (mode 1).
 */

import type { SourceFailurePolicy } from '../config.js';
import { isAmountInRange } from '../domain/amount.js';
import {
  AggregationMode,
  isStale,
  OracleConfig,
  OracleSource,
  OracleSourceView,
  PriceSourceResolver,
} from '../domain/oracle/oracleTypes.js';
import { PriceAggregator } from '../domain/oracle/priceAggregator.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { Clock } from '../infra/clock.js';
import { EventBus, eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { KvDraft, KvStore } from '../infra/storage/kvStore.js';
import { OracleDefaults, OracleStore } from '../infra/storage/oracleStore.js';
import { mapPriceSourceError, PriceSourceTimeoutError } from '../integrations/priceSources/errorMapping.js';
import { AdminGate } from './adminGate.js';

export interface OracleAggregatorOptions {
  defaults: OracleDefaults;
  sourceFailurePolicy: SourceFailurePolicy;
  /**
   * Upper bound per source call, in milliseconds. Must be positive: the
   * store lock is held while sources answer, so a source that calls back
   * over HTTP waits on that lock until this bound releases it.
   */
  sourceTimeoutMs: number;
}

export const toAggregationMode = (value: number): AggregationMode | null => {
  if (value === AggregationMode.MedianTrim) return AggregationMode.MedianTrim;
  if (value === AggregationMode.Mean) return AggregationMode.Mean;
  return null;
};

export class OracleAggregator {
  constructor(
    private readonly kv: KvStore,
    private readonly clock: Clock,
    private readonly adminGate: AdminGate,
    private readonly resolver: PriceSourceResolver,
    private readonly logger: EventLogger,
    private readonly options: OracleAggregatorOptions,
    private readonly events: EventBus = eventBus,
    private readonly aggregator: PriceAggregator = new PriceAggregator(),
  ) {
    if (!Number.isSafeInteger(options.sourceTimeoutMs) || options.sourceTimeoutMs <= 0) {
      throw new RangeError(`sourceTimeoutMs must be a positive integer, got ${options.sourceTimeoutMs}`);
    }
  }

  // ─── Source registry ────────────────────────────────────────────────

  /**
   * Register a source, or overwrite the entry with the same address in place.
   */
  async setSource(caller: string, asset: string, source: OracleSource): Promise<OracleSource[]> {
    if (source.weight < 0n || !isAmountInRange(source.weight)) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Source weight must be a non-negative 128-bit integer.', {
        weight: source.weight.toString(),
      });
    }
    if (!Number.isSafeInteger(source.lastHeartbeat) || source.lastHeartbeat < 0) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'lastHeartbeat must be a non-negative integer.', {
        lastHeartbeat: source.lastHeartbeat,
      });
    }

    const sources = await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      const store = this.storeFor(draft);
      const current = store.getSources(asset);

      const replaced = current.some((entry) => entry.address === source.address);
      const next = replaced
        ? current.map((entry) => (entry.address === source.address ? { ...source } : entry))
        : [...current, { ...source }];

      store.putSources(asset, next);
      return next;
    });

    this.logger.log('info', 'oracle.source.set', { caller, asset, source: source.address, sourceCount: sources.length });
    this.events.emit('oracle.source.set', { asset, source });
    return sources;
  }

  /** Drop every entry with the address. Unknown addresses are not an error. */
  async removeSource(caller: string, asset: string, address: string): Promise<OracleSource[]> {
    const outcome = await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      const store = this.storeFor(draft);
      const current = store.getSources(asset);
      const next = current.filter((entry) => entry.address !== address);
      store.putSources(asset, next);
      return { sources: next, removed: current.length - next.length };
    });

    this.logger.log('info', 'oracle.source.removed', { caller, asset, source: address, removed: outcome.removed });
    this.events.emit('oracle.source.removed', { asset, address, removed: outcome.removed });
    return outcome.sources;
  }

  getSources(asset: string): OracleSourceView[] {
    const store = this.storeFor(this.kv.snapshot());
    const ttl = store.getHeartbeatTtl();
    const now = this.clock.now();
    return store.getSources(asset).map((source) => ({ ...source, stale: isStale(source, now, ttl) }));
  }

  // ─── Prices ─────────────────────────────────────────────────────────

  async fetchPrices(asset: string): Promise<bigint[]> {
    return this.kv.transaction((draft) => this.collectPrices(this.storeFor(draft), asset));
  }

  /**
   * Fetch and aggregate. The performance counter moves on every call that
   * completes, including calls that end with no price.
   */
  async aggregatePrice(asset: string): Promise<bigint | null> {
    const outcome = await this.kv.transaction(async (draft) => {
      const store = this.storeFor(draft);
      const prices = await this.collectPrices(store, asset);
      const performanceCount = store.incPerf();
      const mode = store.getMode();
      return {
        price: this.aggregator.aggregate(prices, mode),
        mode,
        samples: prices.length,
        performanceCount,
      };
    });

    this.logger.log('info', 'oracle.price.aggregated', {
      asset,
      price: outcome.price?.toString() ?? null,
      mode: outcome.mode,
      samples: outcome.samples,
      performanceCount: outcome.performanceCount,
    });
    this.events.emit('oracle.price.aggregated', { asset, price: outcome.price, samples: outcome.samples });
    return outcome.price;
  }

  // ─── Tunables ───────────────────────────────────────────────────────

  getConfig(): OracleConfig {
    const store = this.storeFor(this.kv.snapshot());
    return {
      heartbeatTtlSeconds: store.getHeartbeatTtl(),
      mode: store.getMode(),
      performanceCount: store.getPerfCount(),
    };
  }

  async setHeartbeatTtl(caller: string, ttlSeconds: number): Promise<OracleConfig> {
    if (!Number.isSafeInteger(ttlSeconds) || ttlSeconds < 0) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Heartbeat TTL must be a non-negative integer.', {
        ttlSeconds,
      });
    }

    await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      this.storeFor(draft).setHeartbeatTtl(ttlSeconds);
    });
    return this.configUpdated(caller);
  }

  async setMode(caller: string, mode: number): Promise<OracleConfig> {
    const parsed = toAggregationMode(mode);
    if (parsed === null) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Aggregation mode must be 0 (median) or 1 (mean).', { mode });
    }

    await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      this.storeFor(draft).setMode(parsed);
    });
    return this.configUpdated(caller);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private storeFor(draft: KvDraft): OracleStore {
    return new OracleStore(draft, this.options.defaults);
  }

  private async collectPrices(store: OracleStore, asset: string): Promise<bigint[]> {
    const ttl = store.getHeartbeatTtl();
    const now = this.clock.now();
    const prices: bigint[] = [];

    for (const source of store.getSources(asset)) {
      if (isStale(source, now, ttl)) {
        this.logger.log('debug', 'oracle.source.stale', { asset, source: source.address, lastHeartbeat: source.lastHeartbeat });
        continue;
      }

      let price: bigint;
      try {
        price = await this.callSource(source.address, asset);
      } catch (error) {
        const failure = mapPriceSourceError(error, source.address, asset);
        if (this.options.sourceFailurePolicy === 'strict') {
          throw failure;
        }
        this.logger.log('warn', 'oracle.source.failed', {
          asset,
          source: source.address,
          code: failure.code,
          reason: failure.message,
        });
        continue;
      }

      if (price > 0n) {
        prices.push(price);
      }
    }

    return prices;
  }

  private async callSource(address: string, asset: string): Promise<bigint> {
    const source = this.resolver.resolve(address);
    if (!source) {
      throw new DomainError(ErrorCode.ExternalCallFailed, 502, 'No price source is reachable at this address.', {
        source: address,
        asset,
      });
    }

    const timeoutMs = this.options.sourceTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      // Reject before aborting so the timeout wins the race.
      timer = setTimeout(() => {
        reject(new PriceSourceTimeoutError(address, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([source.getPrice(asset, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private configUpdated(caller: string): OracleConfig {
    const current = this.getConfig();
    this.logger.log('info', 'oracle.config.updated', { caller, ...current });
    this.events.emit('oracle.config.updated', current);
    return current;
  }
}

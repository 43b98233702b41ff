import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { PriceSourceResolver } from './domain/oracle/oracleTypes.js';
import { Clock, systemClock } from './infra/clock.js';
import { EventBus, eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { KvStore } from './infra/storage/kvStore.js';
import {
  ChainedPriceSourceResolver,
  HttpPriceSourceResolver,
} from './integrations/priceSources/httpPriceSource.js';
import { StaticAdminGate } from './services/adminGate.js';
import { GovernanceEngine } from './services/governanceEngine.js';
import { OracleAggregator } from './services/oracleAggregator.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  store: KvStore;
  governance: GovernanceEngine;
  oracle: OracleAggregator;
  logger: EventLogger;
}

export interface BuildAppOptions {
  clock?: Clock;
  /** Consulted before the HTTP resolver; lets embedders register in-process sources. */
  priceSources?: PriceSourceResolver;
  bus?: EventBus;
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const logger = new EventLogger({
    name: config.app.name,
    level: config.log.level,
    logFile: config.paths.logFile,
  });

  const store = new KvStore(config.paths.stateFile);
  await store.init();

  const clock = options.clock ?? systemClock;
  const bus = options.bus ?? eventBus;
  bus.onListenerError((event, error) => {
    logger.log('error', 'event.listener.failed', { eventType: event, error: String(error) });
  });

  const adminGate = new StaticAdminGate(config.admin.addresses);
  const resolver = new ChainedPriceSourceResolver([
    ...(options.priceSources ? [options.priceSources] : []),
    new HttpPriceSourceResolver({ pricePath: config.oracle.sourcePricePath }),
  ]);

  const governance = new GovernanceEngine(store, clock, adminGate, logger, {
    defaults: {
      quorumBps: config.governance.defaultQuorumBps,
      timelockSeconds: config.governance.defaultTimelockSeconds,
    },
    voteAccounting: config.governance.voteAccounting,
  }, bus);

  const oracle = new OracleAggregator(store, clock, adminGate, resolver, logger, {
    defaults: {
      heartbeatTtlSeconds: config.oracle.defaultHeartbeatTtlSeconds,
      mode: config.oracle.defaultMode,
    },
    sourceFailurePolicy: config.oracle.sourceFailurePolicy,
    sourceTimeoutMs: config.oracle.sourceTimeoutMs,
  }, bus);

  const feed = await registerWebSocket(app, bus);
  await registerRoutes(app, {
    config,
    store,
    feed,
    governance,
    oracle,
    logger,
  });

  return { app, store, governance, oracle, logger };
}

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { isAmountInRange } from '../domain/amount.js';
import { describeFailure, ErrorCode, ErrorStatus, isDomainError, toErrorEnvelope } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { KvStore } from '../infra/storage/kvStore.js';
import { GovernanceEngine } from '../services/governanceEngine.js';
import { OracleAggregator } from '../services/oracleAggregator.js';
import { toProposalView, toReceiptView, toSourceView } from './serializers.js';
import type { LiveFeed } from './websocket.js';

interface RouteDeps {
  config: AppConfig;
  store: KvStore;
  feed: LiveFeed;
  governance: GovernanceEngine;
  oracle: OracleAggregator;
  logger: EventLogger;
}

const CALLER_HEADER = 'x-caller-address';

const address = z.string().trim().min(1).max(512);

const integerAmount = z
  .union([
    z.string().regex(/^-?\d+$/, 'must be an integer string'),
    z.number().int().refine(Number.isSafeInteger, 'exceeds safe integer range; send it as a string'),
  ])
  .transform((value) => BigInt(value))
  .refine(isAmountInRange, 'must fit in a signed 128-bit integer');

const proposalParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const receiptParamsSchema = proposalParamsSchema.extend({
  voter: address,
});

const delegatorParamsSchema = z.object({
  from: address,
});

const assetParamsSchema = z.object({
  asset: z.string().trim().min(1).max(128),
});

const sourceParamsSchema = assetParamsSchema.extend({
  address,
});

const proposeSchema = z.object({
  proposer: address,
  title: z.string().trim().min(1).max(280),
  votingPeriodSeconds: z.number().int().nonnegative(),
});

const voteSchema = z.object({
  voter: address,
  support: z.boolean(),
  weight: integerAmount,
});

const delegateSchema = z.object({
  to: address,
});

const quorumSchema = z.object({
  quorumBps: z.number().int(),
});

const timelockSchema = z.object({
  timelockSeconds: z.number().int(),
});

const sourceSchema = z.object({
  address,
  weight: integerAmount,
  lastHeartbeat: z.number().int(),
});

const heartbeatTtlSchema = z.object({
  heartbeatTtlSeconds: z.number().int(),
});

const modeSchema = z.object({
  mode: z.number().int(),
});

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const sendDomainError = (reply: FastifyReply, error: unknown): void => {
    if (!isDomainError(error)) {
      deps.logger.log('error', 'request.failed', { error: String(error) });
    }
    const failure = describeFailure(error);
    void reply.code(failure.statusCode).send(failure.body);
  };

  const sendInvalid = (reply: FastifyReply, message: string, error: z.ZodError): FastifyReply => reply
    .code(ErrorStatus.invalid_payload)
    .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

  const requireCaller = (request: FastifyRequest, reply: FastifyReply): string | null => {
    const raw = request.headers[CALLER_HEADER];
    const caller = typeof raw === 'string' ? raw.trim() : '';
    if (!caller) {
      void reply.code(401).send(toErrorEnvelope(
        ErrorCode.Unauthorized,
        `${CALLER_HEADER} header is required.`,
      ));
      return null;
    }
    return caller;
  };

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
  }));

  app.get('/health', async () => {
    const parameters = deps.governance.getParameters();
    const oracleConfig = deps.oracle.getConfig();

    return {
      status: 'ok',
      env: deps.config.app.env,
      uptimeSeconds: Math.round(process.uptime()),
      wsClients: deps.feed.connectedClients(),
      stateSummary: {
        keys: deps.store.keyCount(),
        proposals: parameters.proposalCount,
        aggregations: oracleConfig.performanceCount,
      },
    };
  });

  // ─── Governance ───────────────────────────────────────────────────────

  app.post('/governance/proposals', async (request, reply) => {
    const parse = proposeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const proposal = await deps.governance.propose(
        parse.data.proposer,
        parse.data.title,
        parse.data.votingPeriodSeconds,
      );
      return reply.code(201).send({ proposal: toProposalView(proposal, deps.governance.statusOf(proposal)) });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/governance/proposals/:id', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid proposal id.', params.error);

    try {
      const proposal = deps.governance.getProposal(params.data.id);
      return { proposal: toProposalView(proposal, deps.governance.statusOf(proposal)) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/governance/proposals/:id/votes', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid proposal id.', params.error);
    const parse = voteSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const proposal = await deps.governance.vote(params.data.id, parse.data);
      return { proposal: toProposalView(proposal, deps.governance.statusOf(proposal)) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/governance/proposals/:id/receipts/:voter', async (request, reply) => {
    const params = receiptParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      const receipt = deps.governance.getReceipt(params.data.id, params.data.voter);
      return { proposalId: params.data.id, receipt: receipt ? toReceiptView(receipt) : null };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/governance/proposals/:id/queue', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid proposal id.', params.error);

    try {
      const proposal = await deps.governance.queue(params.data.id);
      return { proposal: toProposalView(proposal, deps.governance.statusOf(proposal)) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/governance/proposals/:id/execute', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid proposal id.', params.error);

    try {
      const proposal = await deps.governance.execute(params.data.id);
      return { proposal: toProposalView(proposal, deps.governance.statusOf(proposal)) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.put('/governance/delegations/:from', async (request, reply) => {
    const params = delegatorParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid delegator.', params.error);
    const parse = delegateSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      await deps.governance.delegate(params.data.from, parse.data.to);
      return { from: params.data.from, delegate: parse.data.to };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/governance/delegations/:from', async (request, reply) => {
    const params = delegatorParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid delegator.', params.error);

    return { from: params.data.from, delegate: deps.governance.getDelegate(params.data.from) };
  });

  app.get('/governance/parameters', async () => deps.governance.getParameters());

  app.put('/governance/parameters/quorum', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const parse = quorumSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      return await deps.governance.setQuorumBps(caller, parse.data.quorumBps);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.put('/governance/parameters/timelock', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const parse = timelockSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      return await deps.governance.setTimelock(caller, parse.data.timelockSeconds);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Oracle ───────────────────────────────────────────────────────────

  app.get('/oracle/assets/:asset/sources', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid asset.', params.error);

    return {
      asset: params.data.asset,
      sources: deps.oracle.getSources(params.data.asset).map(toSourceView),
    };
  });

  app.put('/oracle/assets/:asset/sources', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid asset.', params.error);
    const parse = sourceSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const sources = await deps.oracle.setSource(caller, params.data.asset, parse.data);
      return { asset: params.data.asset, sources: sources.map(toSourceView) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.delete('/oracle/assets/:asset/sources/:address', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const params = sourceParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      const sources = await deps.oracle.removeSource(caller, params.data.asset, params.data.address);
      return { asset: params.data.asset, sources: sources.map(toSourceView) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/oracle/assets/:asset/prices', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid asset.', params.error);

    try {
      const prices = await deps.oracle.fetchPrices(params.data.asset);
      return { asset: params.data.asset, prices: prices.map((price) => price.toString()) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/oracle/assets/:asset/price', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid asset.', params.error);

    try {
      const price = await deps.oracle.aggregatePrice(params.data.asset);
      return { asset: params.data.asset, price: price === null ? null : price.toString() };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/oracle/config', async () => deps.oracle.getConfig());

  app.put('/oracle/config/heartbeat-ttl', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const parse = heartbeatTtlSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      return await deps.oracle.setHeartbeatTtl(caller, parse.data.heartbeatTtlSeconds);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.put('/oracle/config/mode', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return reply;
    const parse = modeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      return await deps.oracle.setMode(caller, parse.data.mode);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });
}

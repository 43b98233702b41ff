import dotenv from 'dotenv';
import path from 'node:path';
import { AggregationMode } from './domain/oracle/oracleTypes.js';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parsePositiveInt = (input: string | undefined, fallback: number): number => {
  const n = parseNumber(input, fallback);
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
};

const parseList = (input: string | undefined): string[] => (input ?? '')
  .split(',')
  .map((s) => s.trim())
  .filter(Boolean);

// An empty value disables the path entirely.
const parseOptionalPath = (input: string | undefined, fallback: string | undefined): string | undefined => {
  if (input === undefined) return fallback;
  return input.trim() ? input : undefined;
};

const parseMode = (input: string | undefined, fallback: AggregationMode): AggregationMode => {
  const n = parseNumber(input, fallback);
  return n === AggregationMode.Mean ? AggregationMode.Mean : AggregationMode.MedianTrim;
};

const parseChoice = <T extends string>(input: string | undefined, choices: readonly T[], fallback: T): T => {
  const match = choices.find((choice) => choice === input?.trim().toLowerCase());
  return match ?? fallback;
};

export type VoteAccounting = 'accumulate' | 'replace';
export type SourceFailurePolicy = 'strict' | 'isolate';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

export const config = {
  app: {
    name: 'governance-oracle-service',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8790),
    host: process.env.HOST ?? '0.0.0.0',
  },
  paths: {
    dataDir,
    stateFile: parseOptionalPath(process.env.STATE_FILE, path.join(dataDir, 'state.json')),
    logFile: parseOptionalPath(process.env.LOG_FILE, undefined),
  },
  log: {
    level: parseChoice<LogLevel>(
      process.env.LOG_LEVEL,
      ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      'info',
    ),
  },
  admin: {
    addresses: parseList(process.env.ADMIN_ADDRESSES),
  },
  governance: {
    defaultQuorumBps: parseNumber(process.env.GOV_DEFAULT_QUORUM_BPS, 1000),
    defaultTimelockSeconds: parseNumber(process.env.GOV_DEFAULT_TIMELOCK_SECONDS, 60),
    voteAccounting: parseChoice<VoteAccounting>(process.env.GOV_VOTE_ACCOUNTING, ['accumulate', 'replace'], 'accumulate'),
  },
  oracle: {
    defaultHeartbeatTtlSeconds: parseNumber(process.env.ORACLE_DEFAULT_HEARTBEAT_TTL_SECONDS, 300),
    defaultMode: parseMode(process.env.ORACLE_DEFAULT_MODE, AggregationMode.MedianTrim),
    sourceFailurePolicy: parseChoice<SourceFailurePolicy>(
      process.env.ORACLE_SOURCE_FAILURE_POLICY,
      ['strict', 'isolate'],
      'strict',
    ),
    sourceTimeoutMs: parsePositiveInt(process.env.ORACLE_SOURCE_TIMEOUT_MS, 5000),
    sourcePricePath: process.env.ORACLE_SOURCE_PRICE_PATH ?? '/price',
  },
};

export type AppConfig = typeof config;

// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the governance & oracle HTTP API.
// Integer amounts (weights, tallies, prices) travel as decimal strings.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalStatus = 'pending' | 'voting_closed' | 'queued' | 'executed';

export type AggregationMode = 0 | 1;

// ─── Governance ────────────────────────────────────────────────────────────

export interface Proposal {
  id: number;
  proposer: string;
  title: string;
  created: number;
  votingEnds: number;
  queuedUntil: number;
  forVotes: string;
  againstVotes: string;
  executed: boolean;
  status: ProposalStatus;
}

export interface ProposeOpts {
  proposer: string;
  title: string;
  votingPeriodSeconds: number;
}

export interface VoteOpts {
  voter: string;
  support: boolean;
  /** Integer weight; bigint and number are sent as decimal strings. */
  weight: string | number | bigint;
}

export interface VoteReceipt {
  voter: string;
  support: boolean;
  weight: string;
}

export interface ReceiptResponse {
  proposalId: number;
  receipt: VoteReceipt | null;
}

export interface DelegationResponse {
  from: string;
  delegate: string | null;
}

export interface GovernanceParameters {
  quorumBps: number;
  timelockSeconds: number;
  proposalCount: number;
}

// ─── Oracle ────────────────────────────────────────────────────────────────

export interface OracleSourceInput {
  address: string;
  weight: string | number | bigint;
  lastHeartbeat: number;
}

export interface OracleSource {
  address: string;
  weight: string;
  lastHeartbeat: number;
  stale?: boolean;
}

export interface SourcesResponse {
  asset: string;
  sources: OracleSource[];
}

export interface PricesResponse {
  asset: string;
  prices: string[];
}

export interface PriceResponse {
  asset: string;
  price: string | null;
}

export interface OracleConfig {
  heartbeatTtlSeconds: number;
  mode: AggregationMode;
  performanceCount: number;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  env: string;
  uptimeSeconds: number;
  wsClients: number;
  stateSummary: {
    keys: number;
    proposals: number;
    aggregations: number;
  };
}

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

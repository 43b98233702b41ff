// Governance & oracle API SDK entry point
export { GovernanceOracleClient, GovernanceOracleApiError } from './client.js';
export type { GovernanceOracleClientOptions } from './client.js';
export type {
  ProposalStatus,
  AggregationMode,

  // Governance
  Proposal,
  ProposeOpts,
  VoteOpts,
  VoteReceipt,
  ReceiptResponse,
  DelegationResponse,
  GovernanceParameters,

  // Oracle
  OracleSourceInput,
  OracleSource,
  SourcesResponse,
  PricesResponse,
  PriceResponse,
  OracleConfig,

  // System
  HealthResponse,
  APIErrorEnvelope,
} from './types.js';

import { Proposal, ProposalStatus, VoteReceipt } from '../domain/governance/governanceTypes.js';
import { OracleSource, OracleSourceView } from '../domain/oracle/oracleTypes.js';

// Bigints leave the process as decimal strings.

export interface ProposalView {
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

export const toProposalView = (proposal: Proposal, status: ProposalStatus): ProposalView => ({
  id: proposal.id,
  proposer: proposal.proposer,
  title: proposal.title,
  created: proposal.created,
  votingEnds: proposal.votingEnds,
  queuedUntil: proposal.queuedUntil,
  forVotes: proposal.forVotes.toString(),
  againstVotes: proposal.againstVotes.toString(),
  executed: proposal.executed,
  status,
});

export const toReceiptView = (receipt: VoteReceipt) => ({
  voter: receipt.voter,
  support: receipt.support,
  weight: receipt.weight.toString(),
});

export const toSourceView = (source: OracleSource | OracleSourceView) => ({
  address: source.address,
  weight: source.weight.toString(),
  lastHeartbeat: source.lastHeartbeat,
  ...('stale' in source ? { stale: source.stale } : {}),
});

/** JSON.stringify replacer for payloads that may still carry bigints. */
export const bigintReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

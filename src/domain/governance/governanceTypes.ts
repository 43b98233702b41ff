/**
 * Proposal governance types.
 *
 * A proposal moves pending → voting_closed → queued → executed. There is no
 * rejected state: a proposal that never reaches quorum stays voting_closed.
 */

export type ProposalStatus = 'pending' | 'voting_closed' | 'queued' | 'executed';

export interface Proposal {
  id: number;
  proposer: string;
  title: string;
  /** Seconds since epoch. */
  created: number;
  votingEnds: number;
  /** 0 while not queued. */
  queuedUntil: number;
  forVotes: bigint;
  againstVotes: bigint;
  executed: boolean;
}

export interface VoteReceipt {
  voter: string;
  support: boolean;
  weight: bigint;
}

export interface GovernanceParameters {
  quorumBps: number;
  timelockSeconds: number;
  proposalCount: number;
}

export const BPS_DENOMINATOR = 10_000n;

export const proposalStatus = (proposal: Proposal, now: number): ProposalStatus => {
  if (proposal.executed) return 'executed';
  if (proposal.queuedUntil !== 0) return 'queued';
  return now < proposal.votingEnds ? 'pending' : 'voting_closed';
};

/**
 * `for * 10000 / total >= quorumBps`, truncating. Quorum needs a positive
 * total; a zero or negative total never meets it.
 */
export const meetsQuorum = (proposal: Proposal, quorumBps: number): boolean => {
  const total = proposal.forVotes + proposal.againstVotes;
  if (total <= 0n) return false;
  return (proposal.forVotes * BPS_DENOMINATOR) / total >= BigInt(quorumBps);
};

import { z } from 'zod';
import { Proposal, VoteReceipt } from '../../domain/governance/governanceTypes.js';
import { KvDraft, readValue } from './kvStore.js';
import { GovKeys } from './storageKeys.js';

const timestampSchema = z.number().int().nonnegative();

const proposalSchema = z.object({
  id: z.number().int().positive(),
  proposer: z.string(),
  title: z.string(),
  created: timestampSchema,
  votingEnds: timestampSchema,
  queuedUntil: timestampSchema,
  forVotes: z.bigint(),
  againstVotes: z.bigint(),
  executed: z.boolean(),
});

const receiptSchema = z.object({
  voter: z.string(),
  support: z.boolean(),
  weight: z.bigint(),
});

const proposalMapSchema = z.record(z.string(), proposalSchema);
const receiptMapSchema = z.record(z.string(), receiptSchema);

export interface GovernanceDefaults {
  quorumBps: number;
  timelockSeconds: number;
}

/** Proposals, receipts, delegations and the two governance tunables. */
export class GovernanceStore {
  constructor(
    private readonly kv: KvDraft,
    private readonly defaults: GovernanceDefaults,
  ) {}

  /** Allocate the next proposal id. Ids start at 1. */
  nextId(): number {
    const id = this.proposalCount() + 1;
    this.kv.set(GovKeys.counter(), id);
    return id;
  }

  proposalCount(): number {
    return readValue(this.kv, GovKeys.counter(), z.number().int().nonnegative()) ?? 0;
  }

  saveProposal(proposal: Proposal): void {
    const proposals = this.proposals();
    proposals[String(proposal.id)] = proposal;
    this.kv.set(GovKeys.proposals(), proposals);
  }

  getProposal(id: number): Proposal | null {
    return this.proposals()[String(id)] ?? null;
  }

  saveReceipt(proposalId: number, receipt: VoteReceipt): void {
    const key = GovKeys.receipts(proposalId);
    const receipts = readValue(this.kv, key, receiptMapSchema) ?? {};
    receipts[receipt.voter] = receipt;
    this.kv.set(key, receipts);
  }

  getReceipt(proposalId: number, voter: string): VoteReceipt | null {
    const receipts = readValue(this.kv, GovKeys.receipts(proposalId), receiptMapSchema) ?? {};
    return receipts[voter] ?? null;
  }

  getQuorumBps(): number {
    return readValue(this.kv, GovKeys.quorumBps(), z.number().int()) ?? this.defaults.quorumBps;
  }

  setQuorumBps(bps: number): void {
    this.kv.set(GovKeys.quorumBps(), bps);
  }

  getTimelock(): number {
    return readValue(this.kv, GovKeys.timelock(), z.number().int().nonnegative()) ?? this.defaults.timelockSeconds;
  }

  setTimelock(seconds: number): void {
    this.kv.set(GovKeys.timelock(), seconds);
  }

  setDelegate(from: string, to: string): void {
    this.kv.set(GovKeys.delegation(from), to);
  }

  getDelegate(from: string): string | null {
    return readValue(this.kv, GovKeys.delegation(from), z.string()) ?? null;
  }

  private proposals(): Record<string, Proposal> {
    return readValue(this.kv, GovKeys.proposals(), proposalMapSchema) ?? {};
  }
}

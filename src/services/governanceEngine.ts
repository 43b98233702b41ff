/**
 * Proposal governance engine.
 *
 * Anyone may propose and vote. A proposal can be queued once voting has
 * closed and the "for" share of cast weight meets the quorum; it can be
 * executed once its timelock has elapsed. Operations that find their guard
 * unmet return the proposal unchanged instead of failing.
 */

import type { VoteAccounting } from '../config.js';
import { isAmountInRange } from '../domain/amount.js';
import {
  GovernanceParameters,
  meetsQuorum,
  Proposal,
  proposalStatus,
  ProposalStatus,
  VoteReceipt,
} from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { Clock } from '../infra/clock.js';
import { EventBus, eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { GovernanceDefaults, GovernanceStore } from '../infra/storage/governanceStore.js';
import { KvDraft, KvStore } from '../infra/storage/kvStore.js';
import { AdminGate } from './adminGate.js';

export interface GovernanceEngineOptions {
  defaults: GovernanceDefaults;
  voteAccounting: VoteAccounting;
}

export interface CastVoteInput {
  voter: string;
  support: boolean;
  weight: bigint;
}

const MAX_QUORUM_BPS = 10_000;

const assertNonNegativeInteger = (value: number, field: string): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new DomainError(ErrorCode.InvalidAmount, 400, `${field} must be a non-negative integer.`, { [field]: value });
  }
};

// Both operands are already safe; the sum must be too.
const addSeconds = (now: number, seconds: number, field: string): number => {
  const sum = now + seconds;
  if (!Number.isSafeInteger(sum)) {
    throw new DomainError(ErrorCode.InvalidAmount, 400, `${field} puts the deadline out of range.`, {
      now,
      [field]: seconds,
    });
  }
  return sum;
};

export class GovernanceEngine {
  constructor(
    private readonly kv: KvStore,
    private readonly clock: Clock,
    private readonly adminGate: AdminGate,
    private readonly logger: EventLogger,
    private readonly options: GovernanceEngineOptions,
    private readonly events: EventBus = eventBus,
  ) {}

  async propose(proposer: string, title: string, votingPeriodSeconds: number): Promise<Proposal> {
    assertNonNegativeInteger(votingPeriodSeconds, 'votingPeriodSeconds');

    const proposal = await this.kv.transaction((draft) => {
      const store = this.storeFor(draft);
      const now = this.clock.now();
      const created: Proposal = {
        id: store.nextId(),
        proposer,
        title,
        created: now,
        votingEnds: addSeconds(now, votingPeriodSeconds, 'votingPeriodSeconds'),
        queuedUntil: 0,
        forVotes: 0n,
        againstVotes: 0n,
        executed: false,
      };
      store.saveProposal(created);
      return created;
    });

    this.logger.log('info', 'proposal.created', {
      proposalId: proposal.id,
      proposer,
      votingEnds: proposal.votingEnds,
    });
    this.events.emit('proposal.created', proposal);
    return proposal;
  }

  /**
   * Add `weight` to the chosen tally and record the voter's receipt.
   *
   * Under `accumulate` accounting every call adds to the tally while the
   * receipt keeps only the latest vote. Under `replace` the voter's previous
   * receipt is taken back out of the tally first. A vote that would push a
   * tally out of the signed 128-bit range is refused.
   */
  async vote(id: number, input: CastVoteInput): Promise<Proposal> {
    if (!isAmountInRange(input.weight)) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Vote weight is out of range.', {
        weight: input.weight.toString(),
      });
    }

    const outcome = await this.kv.transaction((draft) => {
      const store = this.storeFor(draft);
      const proposal = this.requireProposal(store, id);

      if (this.clock.now() > proposal.votingEnds) {
        return { proposal, counted: false };
      }

      if (this.options.voteAccounting === 'replace') {
        const previous = store.getReceipt(id, input.voter);
        if (previous) {
          this.applyWeight(proposal, previous.support, -previous.weight);
        }
      }

      this.applyWeight(proposal, input.support, input.weight);
      if (!isAmountInRange(proposal.forVotes) || !isAmountInRange(proposal.againstVotes)) {
        throw new DomainError(ErrorCode.InvalidAmount, 400, 'Vote would push a tally out of range.', {
          proposalId: id,
          weight: input.weight.toString(),
        });
      }
      store.saveReceipt(id, { voter: input.voter, support: input.support, weight: input.weight });
      store.saveProposal(proposal);
      return { proposal, counted: true };
    });

    if (!outcome.counted) {
      this.logger.log('debug', 'proposal.vote.ignored', { proposalId: id, voter: input.voter, reason: 'voting_closed' });
      return outcome.proposal;
    }

    this.logger.log('info', 'proposal.voted', {
      proposalId: id,
      voter: input.voter,
      support: input.support,
      weight: input.weight.toString(),
    });
    this.events.emit('proposal.voted', { proposal: outcome.proposal, voter: input.voter, support: input.support });
    return outcome.proposal;
  }

  async queue(id: number): Promise<Proposal> {
    const outcome = await this.kv.transaction((draft) => {
      const store = this.storeFor(draft);
      const proposal = this.requireProposal(store, id);
      const now = this.clock.now();

      if (proposal.executed || now < proposal.votingEnds || !meetsQuorum(proposal, store.getQuorumBps())) {
        return { proposal, queued: false };
      }

      proposal.queuedUntil = addSeconds(now, store.getTimelock(), 'timelockSeconds');
      store.saveProposal(proposal);
      return { proposal, queued: true };
    });

    if (!outcome.queued) {
      this.logger.log('debug', 'proposal.queue.skipped', { proposalId: id });
      return outcome.proposal;
    }

    this.logger.log('info', 'proposal.queued', { proposalId: id, queuedUntil: outcome.proposal.queuedUntil });
    this.events.emit('proposal.queued', outcome.proposal);
    return outcome.proposal;
  }

  async execute(id: number): Promise<Proposal> {
    const outcome = await this.kv.transaction((draft) => {
      const store = this.storeFor(draft);
      const proposal = this.requireProposal(store, id);

      if (proposal.executed || proposal.queuedUntil === 0 || this.clock.now() < proposal.queuedUntil) {
        return { proposal, executed: false };
      }

      proposal.executed = true;
      store.saveProposal(proposal);
      return { proposal, executed: true };
    });

    if (outcome.executed) {
      this.logger.log('info', 'proposal.executed', { proposalId: id });
      this.events.emit('proposal.executed', outcome.proposal);
    }
    return outcome.proposal;
  }

  /** Record a delegate. Tallying does not consult delegations. */
  async delegate(from: string, to: string): Promise<void> {
    await this.kv.transaction((draft) => {
      this.storeFor(draft).setDelegate(from, to);
    });

    this.logger.log('info', 'delegation.set', { from, to });
    this.events.emit('delegation.set', { from, to });
  }

  getDelegate(from: string): string | null {
    return this.storeFor(this.kv.snapshot()).getDelegate(from);
  }

  getProposal(id: number): Proposal {
    return this.requireProposal(this.storeFor(this.kv.snapshot()), id);
  }

  getReceipt(id: number, voter: string): VoteReceipt | null {
    const store = this.storeFor(this.kv.snapshot());
    this.requireProposal(store, id);
    return store.getReceipt(id, voter);
  }

  statusOf(proposal: Proposal): ProposalStatus {
    return proposalStatus(proposal, this.clock.now());
  }

  getParameters(): GovernanceParameters {
    const store = this.storeFor(this.kv.snapshot());
    return {
      quorumBps: store.getQuorumBps(),
      timelockSeconds: store.getTimelock(),
      proposalCount: store.proposalCount(),
    };
  }

  async setQuorumBps(caller: string, bps: number): Promise<GovernanceParameters> {
    if (!Number.isSafeInteger(bps) || bps < 0 || bps > MAX_QUORUM_BPS) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, `quorumBps must be an integer between 0 and ${MAX_QUORUM_BPS}.`, {
        quorumBps: bps,
      });
    }

    await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      this.storeFor(draft).setQuorumBps(bps);
    });
    return this.parametersUpdated(caller);
  }

  async setTimelock(caller: string, seconds: number): Promise<GovernanceParameters> {
    assertNonNegativeInteger(seconds, 'timelockSeconds');

    await this.kv.transaction((draft) => {
      this.adminGate.requireAdmin(caller);
      this.storeFor(draft).setTimelock(seconds);
    });
    return this.parametersUpdated(caller);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private storeFor(draft: KvDraft): GovernanceStore {
    return new GovernanceStore(draft, this.options.defaults);
  }

  private requireProposal(store: GovernanceStore, id: number): Proposal {
    const proposal = store.getProposal(id);
    if (!proposal) {
      throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { proposalId: id });
    }
    return proposal;
  }

  private applyWeight(proposal: Proposal, support: boolean, weight: bigint): void {
    if (support) {
      proposal.forVotes += weight;
    } else {
      proposal.againstVotes += weight;
    }
  }

  private parametersUpdated(caller: string): GovernanceParameters {
    const parameters = this.getParameters();
    this.logger.log('info', 'governance.parameters.updated', { caller, ...parameters });
    this.events.emit('governance.parameters.updated', parameters);
    return parameters;
  }
}

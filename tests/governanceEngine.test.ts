import { describe, expect, it } from 'vitest';
import type { VoteAccounting } from '../src/config.js';
import { AMOUNT_MAX, AMOUNT_MIN } from '../src/domain/amount.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { EventBus, EventType } from '../src/infra/eventBus.js';
import { KvStore } from '../src/infra/storage/kvStore.js';
import { StaticAdminGate } from '../src/services/adminGate.js';
import { GovernanceEngine } from '../src/services/governanceEngine.js';
import { ADMIN, ManualClock, silentLogger } from './helpers.js';

function setup(voteAccounting: VoteAccounting = 'accumulate') {
  const kv = new KvStore();
  const clock = new ManualClock(1_000);
  const bus = new EventBus();
  const engine = new GovernanceEngine(kv, clock, new StaticAdminGate([ADMIN]), silentLogger(), {
    defaults: { quorumBps: 1000, timelockSeconds: 60 },
    voteAccounting,
  }, bus);
  return { kv, clock, bus, engine };
}

describe('GovernanceEngine', () => {
  describe('propose()', () => {
    it('creates proposals with sequential ids', async () => {
      const { engine } = setup();

      const first = await engine.propose('alice', 'Raise fees', 100);
      const second = await engine.propose('bob', 'Lower fees', 50);

      expect(first).toEqual({
        id: 1,
        proposer: 'alice',
        title: 'Raise fees',
        created: 1_000,
        votingEnds: 1_100,
        queuedUntil: 0,
        forVotes: 0n,
        againstVotes: 0n,
        executed: false,
      });
      expect(second.id).toBe(2);
      expect(engine.getParameters().proposalCount).toBe(2);
    });

    it('rejects a voting period that pushes votingEnds past the safe range', async () => {
      const { engine } = setup();
      await expect(engine.propose('alice', 'Forever', Number.MAX_SAFE_INTEGER)).rejects.toMatchObject({
        code: ErrorCode.InvalidAmount,
        statusCode: 400,
      });
      expect(engine.getParameters().proposalCount).toBe(0);
    });

    it('rejects a negative voting period', async () => {
      const { engine } = setup();
      await expect(engine.propose('alice', 'Bad', -1)).rejects.toMatchObject({
        code: ErrorCode.InvalidAmount,
        statusCode: 400,
      });
      expect(engine.getParameters().proposalCount).toBe(0);
    });
  });

  describe('vote()', () => {
    it('adds weight to the chosen tally and records a receipt', async () => {
      const { engine } = setup();
      await engine.propose('alice', 'Raise fees', 100);

      await engine.vote(1, { voter: 'carol', support: true, weight: 700n });
      const proposal = await engine.vote(1, { voter: 'dave', support: false, weight: 300n });

      expect(proposal.forVotes).toBe(700n);
      expect(proposal.againstVotes).toBe(300n);
      expect(engine.getReceipt(1, 'carol')).toEqual({ voter: 'carol', support: true, weight: 700n });
      expect(engine.getReceipt(1, 'erin')).toBeNull();
    });

    it('still counts a vote cast exactly at votingEnds', async () => {
      const { engine, clock } = setup();
      await engine.propose('alice', 'Raise fees', 100);

      clock.set(1_100);
      const proposal = await engine.vote(1, { voter: 'carol', support: true, weight: 5n });

      expect(proposal.forVotes).toBe(5n);
    });

    it('ignores votes after voting has closed', async () => {
      const { engine, clock } = setup();
      await engine.propose('alice', 'Raise fees', 100);

      clock.set(1_101);
      const proposal = await engine.vote(1, { voter: 'carol', support: true, weight: 5n });

      expect(proposal.forVotes).toBe(0n);
      expect(engine.getReceipt(1, 'carol')).toBeNull();
    });

    it('accumulates repeat votes while the receipt keeps the latest', async () => {
      const { engine } = setup('accumulate');
      await engine.propose('alice', 'Raise fees', 100);

      await engine.vote(1, { voter: 'carol', support: true, weight: 100n });
      const proposal = await engine.vote(1, { voter: 'carol', support: false, weight: 50n });

      expect(proposal.forVotes).toBe(100n);
      expect(proposal.againstVotes).toBe(50n);
      expect(engine.getReceipt(1, 'carol')).toEqual({ voter: 'carol', support: false, weight: 50n });
    });

    it('replaces the previous vote under replace accounting', async () => {
      const { engine } = setup('replace');
      await engine.propose('alice', 'Raise fees', 100);

      await engine.vote(1, { voter: 'carol', support: true, weight: 100n });
      const proposal = await engine.vote(1, { voter: 'carol', support: false, weight: 50n });

      expect(proposal.forVotes).toBe(0n);
      expect(proposal.againstVotes).toBe(50n);
    });

    it('rejects a weight outside the 128-bit range', async () => {
      const { engine } = setup();
      await engine.propose('alice', 'Raise fees', 100);

      await expect(engine.vote(1, { voter: 'carol', support: true, weight: AMOUNT_MAX + 1n })).rejects.toMatchObject({
        code: ErrorCode.InvalidAmount,
      });
      await expect(engine.vote(1, { voter: 'carol', support: false, weight: AMOUNT_MIN - 1n })).rejects.toMatchObject({
        code: ErrorCode.InvalidAmount,
      });
      expect(engine.getReceipt(1, 'carol')).toBeNull();
    });

    it('refuses a vote that would overflow a tally and keeps the earlier state', async () => {
      const { engine } = setup();
      await engine.propose('alice', 'Raise fees', 100);
      await engine.vote(1, { voter: 'carol', support: true, weight: AMOUNT_MAX });

      await expect(engine.vote(1, { voter: 'dave', support: true, weight: 1n })).rejects.toMatchObject({
        code: ErrorCode.InvalidAmount,
        statusCode: 400,
      });

      expect(engine.getProposal(1).forVotes).toBe(AMOUNT_MAX);
      expect(engine.getReceipt(1, 'dave')).toBeNull();
    });

    it('fails with proposal_not_found for unknown ids', async () => {
      const { engine } = setup();
      await expect(engine.vote(99, { voter: 'carol', support: true, weight: 1n })).rejects.toMatchObject({
        code: ErrorCode.ProposalNotFound,
        statusCode: 404,
      });
    });
  });

  describe('queue() and execute()', () => {
    async function passedProposal() {
      const ctx = setup();
      await ctx.engine.propose('alice', 'Raise fees', 100);
      await ctx.engine.vote(1, { voter: 'carol', support: true, weight: 700n });
      await ctx.engine.vote(1, { voter: 'dave', support: false, weight: 300n });
      return ctx;
    }

    it('does not queue while voting is open', async () => {
      const { engine } = await passedProposal();
      const proposal = await engine.queue(1);
      expect(proposal.queuedUntil).toBe(0);
      expect(engine.statusOf(proposal)).toBe('pending');
    });

    it('queues once voting has closed and quorum is met', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(1_100);

      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(1_160);
      expect(engine.statusOf(proposal)).toBe('queued');
    });

    it('does not queue a proposal without votes', async () => {
      const { engine, clock } = setup();
      await engine.propose('alice', 'Quiet', 10);
      clock.set(1_010);

      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(0);
      expect(engine.statusOf(proposal)).toBe('voting_closed');
    });

    it('does not queue below the quorum', async () => {
      const { engine, clock } = await passedProposal();
      await engine.setQuorumBps(ADMIN, 8000);
      clock.set(1_100);

      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(0);
    });

    it('does not queue when the total cast weight is negative', async () => {
      const { engine, clock } = setup();
      await engine.propose('alice', 'Raise fees', 100);
      await engine.vote(1, { voter: 'carol', support: true, weight: -10n });
      await engine.vote(1, { voter: 'dave', support: false, weight: -5n });
      clock.set(1_100);

      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(0);
      expect(engine.statusOf(proposal)).toBe('voting_closed');
    });

    it('does not queue when the tallies cancel out to zero', async () => {
      const { engine, clock } = setup();
      await engine.propose('alice', 'Raise fees', 100);
      await engine.vote(1, { voter: 'carol', support: true, weight: 10n });
      await engine.vote(1, { voter: 'dave', support: false, weight: -10n });
      clock.set(1_100);

      expect((await engine.queue(1)).queuedUntil).toBe(0);
    });

    it('refuses to queue when the timelock would overflow the deadline', async () => {
      const { engine, clock } = await passedProposal();
      await engine.setTimelock(ADMIN, Number.MAX_SAFE_INTEGER);
      clock.set(1_100);

      await expect(engine.queue(1)).rejects.toMatchObject({ code: ErrorCode.InvalidAmount, statusCode: 400 });
      expect(engine.getProposal(1).queuedUntil).toBe(0);
    });

    it('queues exactly at the quorum', async () => {
      const { engine, clock } = await passedProposal();
      await engine.setQuorumBps(ADMIN, 7000);
      clock.set(1_100);

      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(1_160);
    });

    it('yields the same proposal when queued twice at the same instant', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(1_100);

      const first = await engine.queue(1);
      const second = await engine.queue(1);

      expect(second).toEqual(first);
    });

    it('pushes the timelock forward when queued again', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(1_100);
      await engine.queue(1);

      clock.set(1_110);
      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(1_170);
    });

    it('executes only after the timelock', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(1_100);
      await engine.queue(1);

      expect((await engine.execute(1)).executed).toBe(false);

      clock.set(1_159);
      expect((await engine.execute(1)).executed).toBe(false);

      clock.set(1_160);
      const executed = await engine.execute(1);
      expect(executed.executed).toBe(true);
      expect(engine.statusOf(executed)).toBe('executed');
    });

    it('does not execute an unqueued proposal', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(5_000);
      const proposal = await engine.execute(1);
      expect(proposal.executed).toBe(false);
    });

    it('leaves an executed proposal alone when queued again', async () => {
      const { engine, clock } = await passedProposal();
      clock.set(1_100);
      await engine.queue(1);
      clock.set(1_160);
      await engine.execute(1);

      clock.set(1_200);
      const proposal = await engine.queue(1);

      expect(proposal.queuedUntil).toBe(1_160);
      expect(proposal.executed).toBe(true);
    });

    it('emits lifecycle events after each committed transition', async () => {
      const { engine, clock, bus } = setup();
      const received: EventType[] = [];
      bus.on('*', (event) => {
        received.push(event);
      });

      await engine.propose('alice', 'Raise fees', 0);
      await engine.vote(1, { voter: 'carol', support: true, weight: 1n });
      await engine.queue(1);
      clock.advance(60);
      await engine.execute(1);
      await engine.execute(1);

      expect(received).toEqual(['proposal.created', 'proposal.voted', 'proposal.queued', 'proposal.executed']);
    });
  });

  describe('delegation', () => {
    it('records delegates without touching tallies', async () => {
      const { engine } = setup();
      await engine.propose('alice', 'Raise fees', 100);

      await engine.delegate('carol', 'dave');
      await engine.vote(1, { voter: 'dave', support: true, weight: 10n });

      expect(engine.getDelegate('carol')).toBe('dave');
      expect(engine.getDelegate('erin')).toBeNull();
      expect(engine.getProposal(1).forVotes).toBe(10n);
    });

    it('overwrites an earlier delegate', async () => {
      const { engine } = setup();
      await engine.delegate('carol', 'dave');
      await engine.delegate('carol', 'erin');
      expect(engine.getDelegate('carol')).toBe('erin');
    });
  });

  describe('parameters', () => {
    it('starts from the configured defaults', () => {
      const { engine } = setup();
      expect(engine.getParameters()).toEqual({ quorumBps: 1000, timelockSeconds: 60, proposalCount: 0 });
    });

    it('lets an admin change quorum and timelock', async () => {
      const { engine } = setup();

      await engine.setQuorumBps(ADMIN, 5000);
      const parameters = await engine.setTimelock(ADMIN, 0);

      expect(parameters).toEqual({ quorumBps: 5000, timelockSeconds: 0, proposalCount: 0 });
    });

    it('refuses non-admin callers', async () => {
      const { engine } = setup();
      await expect(engine.setQuorumBps('mallory', 5000)).rejects.toMatchObject({
        code: ErrorCode.Unauthorized,
        statusCode: 403,
      });
      await expect(engine.setTimelock('mallory', 5)).rejects.toMatchObject({ code: ErrorCode.Unauthorized });
      expect(engine.getParameters().quorumBps).toBe(1000);
    });

    it('rejects out-of-range values', async () => {
      const { engine } = setup();
      await expect(engine.setQuorumBps(ADMIN, 10_001)).rejects.toMatchObject({ code: ErrorCode.InvalidAmount });
      await expect(engine.setTimelock(ADMIN, -1)).rejects.toMatchObject({ code: ErrorCode.InvalidAmount });
    });
  });
});

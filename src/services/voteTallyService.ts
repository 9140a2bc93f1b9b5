/**
 * Vote tally engine.
 *
 * One vote per (proposal, voter). The vote's weight is the voter's stake at
 * the moment of casting: stake added afterwards does not change that vote,
 * though it counts in full on any other open proposal.
 */

import { votingOpen } from '../domain/governance/executionOracle.js';
import { VoteRecord, voteKey } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { BlockClock } from '../infra/clock/chainClock.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { isoNow } from '../utils/time.js';

export class VoteTallyService {
  constructor(
    private readonly store: StateStore,
    private readonly clock: BlockClock,
    private readonly logger: EventLogger,
  ) {}

  /**
   * Checks run in a fixed order and the first failure is reported:
   * existence, open window, non-zero stake, no prior vote.
   */
  async castVote(caller: string, proposalId: number, support: boolean): Promise<VoteRecord> {
    const vote = await this.store.transaction((state) => {
      const { governance } = state;
      const proposal = governance.proposals[String(proposalId)];
      if (!proposal) {
        throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { proposalId });
      }

      const now = this.clock.now();
      if (!votingOpen(proposal, now)) {
        throw new DomainError(ErrorCode.ProposalNotActive, 409, 'Proposal is not open for voting.', {
          proposalId,
          status: proposal.status,
          startHeight: proposal.startHeight,
          endHeight: proposal.endHeight,
          height: now,
        });
      }

      const weight = governance.stakes[caller]?.stakedAmount ?? 0;
      if (weight <= 0) {
        throw new DomainError(ErrorCode.InsufficientStake, 403, 'Voting requires a non-zero stake.');
      }

      const key = voteKey(proposalId, caller);
      if (governance.votes[key]) {
        throw new DomainError(ErrorCode.AlreadyVoted, 409, 'Caller has already voted on this proposal.', { proposalId });
      }

      const record: VoteRecord = {
        proposalId,
        voter: caller,
        support,
        weight,
        castAtHeight: now,
        castAt: isoNow(),
      };

      governance.votes[key] = record;
      if (support) {
        proposal.yesWeight += weight;
      } else {
        proposal.noWeight += weight;
      }
      state.metrics.votesCast += 1;

      return record;
    });

    eventBus.emit('vote.cast', vote);
    await this.logger.log('info', 'vote.cast', {
      proposalId: vote.proposalId,
      voter: vote.voter,
      support: vote.support,
      weight: vote.weight,
    });

    return vote;
  }

  getVote(proposalId: number, voter: string): VoteRecord | null {
    return this.store.read((state) => state.governance.votes[voteKey(proposalId, voter)] ?? null);
  }

  /** Votes on one proposal, in the order they were cast. */
  listVotes(proposalId: number): VoteRecord[] {
    return this.store.read((state) => (
      Object.values(state.governance.votes).filter((vote) => vote.proposalId === proposalId)
    ));
  }
}

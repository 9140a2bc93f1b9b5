/**
 * Proposal registry.
 *
 * Proposals get sequential integer ids and a quorum bar fixed at creation
 * from the total stake at that moment. Later staking does not move it.
 */

import { GovernanceSettings } from '../config.js';
import { toProposalView, quorumThreshold } from '../domain/governance/executionOracle.js';
import { Proposal, ProposalPhase, ProposalView } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { BlockClock } from '../infra/clock/chainClock.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { isoNow } from '../utils/time.js';

export interface CreateProposalInput {
  title: string;
  description: string;
  /** Voting window in blocks. Defaults to the configured duration. */
  duration?: number;
}

export interface ListProposalsFilter {
  phase?: ProposalPhase;
  creator?: string;
}

export class ProposalRegistryService {
  constructor(
    private readonly store: StateStore,
    private readonly clock: BlockClock,
    private readonly logger: EventLogger,
    private readonly settings: GovernanceSettings,
  ) {}

  async createProposal(caller: string, input: CreateProposalInput): Promise<Proposal> {
    const { title, description } = input;
    const duration = input.duration ?? this.settings.defaultProposalDuration;

    if (title.length === 0 || title.length > this.settings.titleMaxLength) {
      throw new DomainError(
        ErrorCode.InvalidTitle,
        400,
        `Title must be 1-${this.settings.titleMaxLength} characters.`,
        { length: title.length },
      );
    }

    if (description.length === 0 || description.length > this.settings.descriptionMaxLength) {
      throw new DomainError(
        ErrorCode.InvalidDescription,
        400,
        `Description must be 1-${this.settings.descriptionMaxLength} characters.`,
        { length: description.length },
      );
    }

    const proposal = await this.store.transaction((state) => {
      const { governance } = state;
      const stake = governance.stakes[caller]?.stakedAmount ?? 0;

      if (stake < this.settings.minProposalStake) {
        throw new DomainError(
          ErrorCode.InsufficientStake,
          403,
          `Creating a proposal requires at least ${this.settings.minProposalStake} staked.`,
          { stake, required: this.settings.minProposalStake },
        );
      }

      if (!Number.isSafeInteger(duration) || duration <= 0) {
        throw new DomainError(ErrorCode.InvalidAmount, 400, 'Duration must be a positive number of blocks.', { duration });
      }

      const now = this.clock.now();
      if (!Number.isSafeInteger(now + duration)) {
        throw new DomainError(ErrorCode.InvalidAmount, 400, 'Duration runs past the largest representable height.', {
          duration,
          height: now,
        });
      }

      const id = governance.proposalCount + 1;
      const created: Proposal = {
        id,
        creator: caller,
        title,
        description,
        startHeight: now,
        endHeight: now + duration,
        status: 'active',
        yesWeight: 0,
        noWeight: 0,
        executed: false,
        minVotesRequired: quorumThreshold(governance.totalStaked, this.settings.quorumDivisor),
        createdAt: isoNow(),
      };

      governance.proposals[String(id)] = created;
      governance.proposalCount = id;
      state.metrics.proposalsCreated += 1;
      return created;
    });

    eventBus.emit('proposal.created', proposal);
    await this.logger.log('info', 'proposal.created', {
      proposalId: proposal.id,
      creator: proposal.creator,
      endHeight: proposal.endHeight,
      minVotesRequired: proposal.minVotesRequired,
    });

    return proposal;
  }

  getProposal(proposalId: number): Proposal | null {
    return this.store.read((state) => state.governance.proposals[String(proposalId)] ?? null);
  }

  describeProposal(proposalId: number): ProposalView | null {
    const proposal = this.getProposal(proposalId);
    return proposal ? toProposalView(proposal, this.clock.now()) : null;
  }

  /** Newest first. */
  listProposals(filter: ListProposalsFilter = {}): ProposalView[] {
    const now = this.clock.now();
    const proposals = this.store.read((state) => Object.values(state.governance.proposals));

    return proposals
      .filter((proposal) => !filter.creator || proposal.creator === filter.creator)
      .map((proposal) => toProposalView(proposal, now))
      .filter((view) => !filter.phase || view.phase === filter.phase)
      .sort((a, b) => b.id - a.id);
  }

  getProposalCount(): number {
    return this.store.read((state) => state.governance.proposalCount);
  }
}

import { isExecutable } from '../domain/governance/executionOracle.js';
import { Proposal } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { BlockClock } from '../infra/clock/chainClock.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { isoNow } from '../utils/time.js';

/**
 * Moves executable proposals to their terminal `executed` state. Anyone may
 * trigger execution once the oracle allows it.
 */
export class ProposalExecutionService {
  constructor(
    private readonly store: StateStore,
    private readonly clock: BlockClock,
    private readonly logger: EventLogger,
  ) {}

  /** Unknown proposals are never executable. */
  isExecutable(proposalId: number): boolean {
    const proposal = this.store.read((state) => state.governance.proposals[String(proposalId)]);
    return proposal ? isExecutable(proposal, this.clock.now()) : false;
  }

  async executeProposal(caller: string, proposalId: number): Promise<Proposal> {
    const executed = await this.store.transaction((state) => {
      const proposal = state.governance.proposals[String(proposalId)];
      const now = this.clock.now();

      if (!proposal || !isExecutable(proposal, now)) {
        throw new DomainError(ErrorCode.InvalidState, 409, 'Proposal cannot be executed.', {
          proposalId,
          height: now,
          ...(proposal ? {
            status: proposal.status,
            endHeight: proposal.endHeight,
            yesWeight: proposal.yesWeight,
            noWeight: proposal.noWeight,
            minVotesRequired: proposal.minVotesRequired,
          } : {}),
        });
      }

      proposal.status = 'executed';
      proposal.executed = true;
      proposal.executedAt = isoNow();
      proposal.executedBy = caller;
      state.metrics.proposalsExecuted += 1;

      return { ...proposal };
    });

    eventBus.emit('proposal.executed', executed);
    await this.logger.log('info', 'proposal.executed', {
      proposalId: executed.id,
      executedBy: caller,
      yesWeight: executed.yesWeight,
      noWeight: executed.noWeight,
    });

    return executed;
  }
}

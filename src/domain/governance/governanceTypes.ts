/**
 * Stake-weighted governance types.
 *
 * Participants stake value for voting weight, open time-bound proposals,
 * cast one weighted vote per proposal and execute proposals that met
 * quorum and majority once their window has closed.
 */

/** Persisted lifecycle. `executed` is terminal. */
export type ProposalStatus = 'active' | 'executed';

/**
 * Read-time classification of a proposal. Only `executed` is ever stored;
 * the rest are derived from the tallies and the current block height.
 */
export type ProposalPhase = 'voting' | 'passed' | 'defeated' | 'executed';

export interface StakeRecord {
  principal: string;
  stakedAmount: number;
  updatedAt: string;
}

export interface Proposal {
  id: number;
  creator: string;
  title: string;
  description: string;
  startHeight: number;
  endHeight: number;
  status: ProposalStatus;
  yesWeight: number;
  noWeight: number;
  executed: boolean;
  minVotesRequired: number;
  createdAt: string;
  executedAt?: string;
  executedBy?: string;
}

export interface VoteRecord {
  proposalId: number;
  voter: string;
  support: boolean;
  weight: number;
  castAtHeight: number;
  castAt: string;
}

export interface ProposalView extends Proposal {
  phase: ProposalPhase;
  totalVotes: number;
  quorumReached: boolean;
  majorityReached: boolean;
  executable: boolean;
  blocksRemaining: number;
}

export interface GovernanceState {
  stakes: Record<string, StakeRecord>;
  totalStaked: number;
  proposals: Record<string, Proposal>;
  proposalCount: number;
  /** Keyed by `voteKey(proposalId, voter)`. */
  votes: Record<string, VoteRecord>;
}

export const voteKey = (proposalId: number, voter: string): string => `${proposalId}:${voter}`;

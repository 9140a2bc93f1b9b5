/**
 * Execution oracle: pure decisions over a proposal record and a block height.
 */

import { Proposal, ProposalPhase, ProposalView } from './governanceTypes.js';

/** Quorum bar fixed on a proposal at creation time. */
export const quorumThreshold = (totalStaked: number, quorumDivisor: number): number => (
  Math.floor(totalStaked / quorumDivisor)
);

export const totalVotes = (proposal: Proposal): number => proposal.yesWeight + proposal.noWeight;

export const quorumReached = (proposal: Proposal): boolean => (
  totalVotes(proposal) >= proposal.minVotesRequired
);

/** Strict majority; a tie fails. */
export const majorityReached = (proposal: Proposal): boolean => proposal.yesWeight > proposal.noWeight;

export const votingOpen = (proposal: Proposal, now: number): boolean => (
  proposal.status === 'active'
  && proposal.startHeight <= now
  && now <= proposal.endHeight
);

/**
 * True iff quorum and strict majority hold, the proposal has not been
 * executed and the voting window has fully elapsed.
 */
export const isExecutable = (proposal: Proposal, now: number): boolean => (
  quorumReached(proposal)
  && majorityReached(proposal)
  && !proposal.executed
  && now >= proposal.endHeight
);

export const derivePhase = (proposal: Proposal, now: number): ProposalPhase => {
  if (proposal.executed) return 'executed';
  if (now <= proposal.endHeight) return 'voting';
  return isExecutable(proposal, now) ? 'passed' : 'defeated';
};

export const toProposalView = (proposal: Proposal, now: number): ProposalView => ({
  ...proposal,
  phase: derivePhase(proposal, now),
  totalVotes: totalVotes(proposal),
  quorumReached: quorumReached(proposal),
  majorityReached: majorityReached(proposal),
  executable: isExecutable(proposal, now),
  blocksRemaining: Math.max(0, proposal.endHeight - now),
});

// Stake-weighted governance API: SDK entry point
export { GovernanceClient, GovernanceAPIError } from './client.js';
export type { GovernanceClientOptions } from './client.js';
export type {
  // Core unions
  ProposalStatus,
  ProposalPhase,

  // Participants
  Participant,
  RegisterParticipantResponse,
  ParticipantProfile,

  // Stake
  StakeReceipt,
  StakeBalance,

  // Proposals
  CreateProposalOpts,
  CreateProposalResponse,
  ListProposalsOpts,
  Proposal,
  ExecutableResponse,

  // Votes
  Vote,

  // Custody / system
  CustodyBalance,
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';

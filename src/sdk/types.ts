// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained response types for the governance API. They mirror the
// server's payloads without importing server modules.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalStatus = 'active' | 'executed';
export type ProposalPhase = 'voting' | 'passed' | 'defeated' | 'executed';

// ─── Participants ──────────────────────────────────────────────────────────

export interface Participant {
  principal: string;
  name: string;
  createdAt: string;
}

export interface RegisterParticipantResponse {
  participant: Participant;
  apiKey: string;
  note: string;
}

export interface ParticipantProfile {
  participant: Participant;
  stakedAmount: number;
}

// ─── Stake ─────────────────────────────────────────────────────────────────

export interface StakeReceipt {
  principal: string;
  amount: number;
  stakedAmount: number;
  totalStaked: number;
}

export interface StakeBalance {
  principal: string;
  stakedAmount: number;
}

// ─── Proposals ─────────────────────────────────────────────────────────────

export interface CreateProposalOpts {
  title: string;
  description: string;
  duration?: number;
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
  phase: ProposalPhase;
  totalVotes: number;
  quorumReached: boolean;
  majorityReached: boolean;
  executable: boolean;
  blocksRemaining: number;
}

export interface CreateProposalResponse {
  proposalId: number;
  proposal: Proposal;
}

export interface ListProposalsOpts {
  phase?: ProposalPhase;
  creator?: string;
}

export interface ExecutableResponse {
  proposalId: number;
  height: number;
  executable: boolean;
}

// ─── Votes ─────────────────────────────────────────────────────────────────

export interface Vote {
  proposalId: number;
  voter: string;
  support: boolean;
  weight: number;
  castAtHeight: number;
  castAt: string;
}

// ─── Custody / clock / system ──────────────────────────────────────────────

export interface CustodyBalance {
  principal: string;
  balance: number;
}

export interface HealthResponse {
  status: string;
  env: string;
  height: number;
  uptimeSeconds: number;
  stateSummary: {
    participants: number;
    proposals: number;
    votes: number;
    totalStaked: number;
  };
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

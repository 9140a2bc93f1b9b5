import { GovernanceState } from './domain/governance/governanceTypes.js';

export interface Participant {
  principal: string;
  name: string;
  apiKey: string;
  createdAt: string;
}

export interface ChainState {
  height: number;
  advancedAt: string | null;
}

export interface MetricsState {
  startedAt: string;
  participantsRegistered: number;
  stakesCommitted: number;
  proposalsCreated: number;
  votesCast: number;
  proposalsExecuted: number;
  blocksAdvanced: number;
}

export interface AppState {
  participants: Record<string, Participant>;
  governance: GovernanceState;
  chain: ChainState;
  metrics: MetricsState;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  rejectionsByCode: Record<string, number>;
  ticker: {
    running: boolean;
    ticks: number;
    failures: number;
    lastError: string | null;
  };
  logger: {
    failedWrites: number;
    lastError: string | null;
  };
}

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';
import { createDefaultState } from './defaultState.js';

const counter = z.number().int().nonnegative().default(0);

const participantSchema = z.object({
  principal: z.string(),
  name: z.string(),
  apiKey: z.string(),
  createdAt: z.string(),
});

const stakeRecordSchema = z.object({
  principal: z.string(),
  stakedAmount: z.number().int().nonnegative(),
  updatedAt: z.string(),
});

const proposalSchema = z.object({
  id: z.number().int().positive(),
  creator: z.string(),
  title: z.string(),
  description: z.string(),
  startHeight: z.number().int().nonnegative(),
  endHeight: z.number().int().nonnegative(),
  status: z.enum(['active', 'executed']),
  yesWeight: z.number().int().nonnegative(),
  noWeight: z.number().int().nonnegative(),
  executed: z.boolean(),
  minVotesRequired: z.number().int().nonnegative(),
  createdAt: z.string(),
  executedAt: z.string().optional(),
  executedBy: z.string().optional(),
});

const voteRecordSchema = z.object({
  proposalId: z.number().int().positive(),
  voter: z.string(),
  support: z.boolean(),
  weight: z.number().int().positive(),
  castAtHeight: z.number().int().nonnegative(),
  castAt: z.string(),
});

const persistedStateSchema = z.object({
  participants: z.record(z.string(), participantSchema).default({}),
  governance: z.object({
    stakes: z.record(z.string(), stakeRecordSchema).default({}),
    totalStaked: counter,
    proposals: z.record(z.string(), proposalSchema).default({}),
    proposalCount: counter,
    votes: z.record(z.string(), voteRecordSchema).default({}),
  }).default({}),
  chain: z.object({
    height: counter,
    advancedAt: z.string().nullable().default(null),
  }).default({}),
  metrics: z.object({
    startedAt: z.string().default(() => isoNow()),
    participantsRegistered: counter,
    stakesCommitted: counter,
    proposalsCreated: counter,
    votesCast: counter,
    proposalsExecuted: counter,
    blocksAdvanced: counter,
  }).default({}),
});

const normalizeState = (raw: unknown): AppState => {
  const parsed = persistedStateSchema.parse(raw ?? {});
  const { governance } = parsed;

  // Counters are derived from the records they summarize.
  const totalStaked = Object.values(governance.stakes)
    .reduce((sum, record) => sum + record.stakedAmount, 0);
  const highestProposalId = Object.values(governance.proposals)
    .reduce((max, proposal) => Math.max(max, proposal.id), 0);

  return {
    ...parsed,
    governance: {
      ...governance,
      totalStaked,
      proposalCount: Math.max(governance.proposalCount, highestProposalId),
    },
  };
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export class StateStore {
  private state: AppState = createDefaultState();
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly stateFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState();
      await this.persist();
      return;
    }

    this.state = normalizeState(JSON.parse(raw));
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /** Copy of a slice of the committed state. */
  read<T>(selector: (state: Readonly<AppState>) => T): T {
    return structuredClone(selector(this.state));
  }

  /**
   * Runs `work` against a draft of the state, one transaction at a time.
   * The draft replaces the committed state only when `work` resolves; a
   * thrown error leaves the committed state untouched.
   */
  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      await this.persist(draft);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(state: AppState = this.state): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}

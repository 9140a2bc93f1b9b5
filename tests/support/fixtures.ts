import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AppConfig, config as baseConfig, GovernanceSettings } from '../../src/config.js';
import { Proposal } from '../../src/domain/governance/governanceTypes.js';
import { BlockClock } from '../../src/infra/clock/chainClock.js';
import { EventLogger } from '../../src/infra/logger.js';
import { StateStore } from '../../src/infra/storage/stateStore.js';
import { InMemoryCustody } from '../../src/integrations/custody/custody.js';
import { ProposalExecutionService } from '../../src/services/proposalExecutionService.js';
import { ProposalRegistryService } from '../../src/services/proposalRegistryService.js';
import { StakeLedgerService } from '../../src/services/stakeLedgerService.js';
import { VoteTallyService } from '../../src/services/voteTallyService.js';

export const VAULT = 'governance-vault';

export class ManualClock implements BlockClock {
  constructor(public height = 0) {}

  now(): number {
    return this.height;
  }
}

export const testSettings = (overrides: Partial<GovernanceSettings> = {}): GovernanceSettings => ({
  minProposalStake: 100_000,
  defaultProposalDuration: 144,
  quorumDivisor: 10,
  titleMaxLength: 50,
  descriptionMaxLength: 500,
  ...overrides,
});

export const makeProposal = (overrides: Partial<Proposal> = {}): Proposal => ({
  id: 1,
  creator: 'alice',
  title: 'Fund audits',
  description: 'Pay for an external audit of the vault.',
  startHeight: 0,
  endHeight: 144,
  status: 'active',
  yesWeight: 0,
  noWeight: 0,
  executed: false,
  minVotesRequired: 10_000,
  createdAt: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

export interface TempStore {
  dir: string;
  store: StateStore;
  logger: EventLogger;
  cleanup: () => Promise<void>;
}

export async function createTempStore(): Promise<TempStore> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'governance-test-'));
  const store = new StateStore(path.join(dir, 'state.json'));
  await store.init();
  const logger = new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();

  return {
    dir,
    store,
    logger,
    cleanup: async () => {
      await store.flush();
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

export interface GovernanceHarness extends TempStore {
  clock: ManualClock;
  custody: InMemoryCustody;
  stakeLedger: StakeLedgerService;
  registry: ProposalRegistryService;
  tally: VoteTallyService;
  execution: ProposalExecutionService;
  /** Credits custody and stakes the full amount. */
  fundAndStake: (principal: string, amount: number) => Promise<void>;
}

export async function createGovernanceHarness(
  settings: GovernanceSettings = testSettings(),
): Promise<GovernanceHarness> {
  const temp = await createTempStore();
  const clock = new ManualClock(0);
  const custody = new InMemoryCustody();
  const stakeLedger = new StakeLedgerService(temp.store, custody, temp.logger, VAULT);
  const registry = new ProposalRegistryService(temp.store, clock, temp.logger, settings);
  const tally = new VoteTallyService(temp.store, clock, temp.logger);
  const execution = new ProposalExecutionService(temp.store, clock, temp.logger);

  return {
    ...temp,
    clock,
    custody,
    stakeLedger,
    registry,
    tally,
    execution,
    fundAndStake: async (principal, amount) => {
      custody.credit(principal, amount);
      await stakeLedger.commitStake(principal, amount);
    },
  };
}

/** App config rooted in a temp directory, with the custody faucet on. */
export const makeTestConfig = (dir: string, overrides: Partial<AppConfig> = {}): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'state.json'),
    logFile: path.join(dir, 'events.ndjson'),
  },
  governance: testSettings(),
  clock: { ...baseConfig.clock, autoAdvance: false, manualAdvanceEnabled: true },
  custody: { ...baseConfig.custody, vaultPrincipal: VAULT, faucetEnabled: true, faucetMaxCredit: 1_000_000 },
  ...overrides,
});

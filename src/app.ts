import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { LiveFeed, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { ChainClock } from './infra/clock/chainClock.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { InMemoryCustody } from './integrations/custody/custody.js';
import { BlockTicker } from './services/blockTicker.js';
import { ParticipantService } from './services/participantService.js';
import { ProposalExecutionService } from './services/proposalExecutionService.js';
import { ProposalRegistryService } from './services/proposalRegistryService.js';
import { StakeLedgerService } from './services/stakeLedgerService.js';
import { VoteTallyService } from './services/voteTallyService.js';

export interface AppContext {
  app: FastifyInstance;
  stateStore: StateStore;
  logger: EventLogger;
  clock: ChainClock;
  ticker: BlockTicker;
  custody: InMemoryCustody;
  liveFeed: LiveFeed;
}

export async function buildApp(config: AppConfig): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const clock = new ChainClock(stateStore);
  clock.init();

  const custody = new InMemoryCustody();
  const ticker = new BlockTicker(clock, config.clock.blockIntervalMs);

  const participantService = new ParticipantService(stateStore, logger);
  const stakeLedger = new StakeLedgerService(stateStore, custody, logger, config.custody.vaultPrincipal);
  const proposalRegistry = new ProposalRegistryService(stateStore, clock, logger, config.governance);
  const voteTally = new VoteTallyService(stateStore, clock, logger);
  const proposalExecution = new ProposalExecutionService(stateStore, clock, logger);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    store: stateStore,
    clock,
    custody,
    participantService,
    stakeLedger,
    proposalRegistry,
    voteTally,
    proposalExecution,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      ticker: ticker.status(),
      logger: logger.status(),
    }),
  });

  const liveFeed = await registerWebSocket(app);
  app.addHook('onClose', async () => {
    ticker.stop();
    liveFeed.close();
  });

  return {
    app,
    stateStore,
    logger,
    clock,
    ticker,
    custody,
    liveFeed,
  };
}

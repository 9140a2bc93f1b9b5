import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { ChainClock } from '../infra/clock/chainClock.js';
import { eventBus } from '../infra/eventBus.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { InMemoryCustody } from '../integrations/custody/custody.js';
import { resolveCaller } from '../services/auth.js';
import { ParticipantService } from '../services/participantService.js';
import { ProposalExecutionService } from '../services/proposalExecutionService.js';
import { ProposalRegistryService } from '../services/proposalRegistryService.js';
import { StakeLedgerService } from '../services/stakeLedgerService.js';
import { VoteTallyService } from '../services/voteTallyService.js';
import { RuntimeMetrics } from '../types.js';

interface RouteDeps {
  config: AppConfig;
  store: StateStore;
  clock: ChainClock;
  custody: InMemoryCustody;
  participantService: ParticipantService;
  stakeLedger: StakeLedgerService;
  proposalRegistry: ProposalRegistryService;
  voteTally: VoteTallyService;
  proposalExecution: ProposalExecutionService;
  getRuntimeMetrics: () => Omit<RuntimeMetrics, 'rejectionsByCode'>;
}

const registerParticipantSchema = z.object({
  name: z.string().min(2).max(120),
});

// Amounts and lengths are checked by the services so that each call reports
// its domain error code rather than a generic payload error.
const stakeSchema = z.object({
  amount: z.number(),
});

const createProposalSchema = z.object({
  title: z.string(),
  description: z.string(),
  duration: z.number().optional(),
});

const castVoteSchema = z.object({
  support: z.boolean(),
});

const proposalParamsSchema = z.object({
  proposalId: z.coerce.number().int().positive(),
});

const listProposalsQuerySchema = z.object({
  phase: z.enum(['voting', 'passed', 'defeated', 'executed']).optional(),
  creator: z.string().min(1).optional(),
});

const advanceClockSchema = z.object({
  blocks: z.number().default(1),
});

const faucetCreditSchema = z.object({
  amount: z.number().int().positive(),
});

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const rejectionsByCode: Record<string, number> = {};

  const reject = (
    reply: FastifyReply,
    statusCode: number,
    code: ErrorCode,
    message: string,
    details?: unknown,
  ): FastifyReply => {
    rejectionsByCode[code] = (rejectionsByCode[code] ?? 0) + 1;
    return reply.code(statusCode).send(toErrorEnvelope(code, message, details));
  };

  const sendDomainError = (reply: FastifyReply, error: unknown): void => {
    if (error instanceof DomainError) {
      void reject(reply, error.statusCode, error.code, error.message, error.details);
      return;
    }

    app.log.error({ err: error }, 'unhandled route error');
    void reject(reply, 500, ErrorCode.InternalError, 'Unexpected internal error', { error: String(error) });
  };

  const parseProposalId = (params: unknown, reply: FastifyReply): number | null => {
    const parse = proposalParamsSchema.safeParse(params);
    if (!parse.success) {
      void reject(reply, 400, ErrorCode.InvalidPayload, 'Proposal id must be a positive integer.', parse.error.flatten());
      return null;
    }
    return parse.data.proposalId;
  };

  // ─── System ─────────────────────────────────────────────────────────

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    height: deps.clock.now(),
  }));

  app.get('/health', async () => {
    const summary = deps.store.read((state) => ({
      participants: Object.keys(state.participants).length,
      proposals: state.governance.proposalCount,
      votes: Object.keys(state.governance.votes).length,
      totalStaked: state.governance.totalStaked,
    }));

    return {
      status: 'ok',
      env: deps.config.app.env,
      height: deps.clock.now(),
      uptimeSeconds: deps.getRuntimeMetrics().uptimeSeconds,
      stateSummary: summary,
    };
  });

  app.get('/metrics', async () => ({
    metrics: deps.store.read((state) => state.metrics),
    runtime: {
      ...deps.getRuntimeMetrics(),
      rejectionsByCode: { ...rejectionsByCode },
    } satisfies RuntimeMetrics,
  }));

  // ─── Participants ───────────────────────────────────────────────────

  app.post('/participants/register', async (request, reply) => {
    const parse = registerParticipantSchema.safeParse(request.body);
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid request payload.', parse.error.flatten());
    }

    try {
      const participant = await deps.participantService.register(parse.data);
      return reply.code(201).send({
        participant: {
          principal: participant.principal,
          name: participant.name,
          createdAt: participant.createdAt,
        },
        apiKey: participant.apiKey,
        note: 'Store apiKey securely. It identifies you on every governance call.',
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/participants/:principal', async (request, reply) => {
    const { principal } = request.params as { principal: string };
    const participant = deps.participantService.getByPrincipal(principal);
    if (!participant) {
      return reject(reply, 404, ErrorCode.ParticipantNotFound, 'Participant not found.');
    }

    return {
      participant: {
        principal: participant.principal,
        name: participant.name,
        createdAt: participant.createdAt,
      },
      stakedAmount: deps.stakeLedger.getStake(principal),
    };
  });

  // ─── Stake ledger ───────────────────────────────────────────────────

  app.post('/stake', async (request, reply) => {
    const caller = resolveCaller(request, reply, deps.participantService);
    if (!caller) return undefined;

    const parse = stakeSchema.safeParse(request.body);
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid request payload.', parse.error.flatten());
    }

    try {
      return await deps.stakeLedger.commitStake(caller.principal, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/stakes/total', async () => ({
    totalStaked: deps.stakeLedger.getTotalStaked(),
  }));

  app.get('/stakes/:principal', async (request) => {
    const { principal } = request.params as { principal: string };
    return {
      principal,
      stakedAmount: deps.stakeLedger.getStake(principal),
    };
  });

  // ─── Proposals ──────────────────────────────────────────────────────

  app.post('/proposals', async (request, reply) => {
    const caller = resolveCaller(request, reply, deps.participantService);
    if (!caller) return undefined;

    const parse = createProposalSchema.safeParse(request.body);
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid request payload.', parse.error.flatten());
    }

    try {
      const proposal = await deps.proposalRegistry.createProposal(caller.principal, parse.data);
      return reply.code(201).send({
        proposalId: proposal.id,
        proposal: deps.proposalRegistry.describeProposal(proposal.id),
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/proposals', async (request, reply) => {
    const parse = listProposalsQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid query params.', parse.error.flatten());
    }

    return {
      height: deps.clock.now(),
      proposals: deps.proposalRegistry.listProposals(parse.data),
    };
  });

  app.get('/proposals/:proposalId', async (request, reply) => {
    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    const proposal = deps.proposalRegistry.describeProposal(proposalId);
    if (!proposal) {
      return reject(reply, 404, ErrorCode.ProposalNotFound, 'Proposal not found.', { proposalId });
    }

    return { proposal };
  });

  app.get('/proposals/:proposalId/executable', async (request, reply) => {
    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    return {
      proposalId,
      height: deps.clock.now(),
      executable: deps.proposalExecution.isExecutable(proposalId),
    };
  });

  app.post('/proposals/:proposalId/execute', async (request, reply) => {
    const caller = resolveCaller(request, reply, deps.participantService);
    if (!caller) return undefined;

    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    try {
      const executed = await deps.proposalExecution.executeProposal(caller.principal, proposalId);
      return { proposal: deps.proposalRegistry.describeProposal(executed.id) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Votes ──────────────────────────────────────────────────────────

  app.post('/proposals/:proposalId/votes', async (request, reply) => {
    const caller = resolveCaller(request, reply, deps.participantService);
    if (!caller) return undefined;

    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    const parse = castVoteSchema.safeParse(request.body);
    if (!parse.success) {
      // An unknown proposal outranks a malformed vote.
      if (!deps.proposalRegistry.getProposal(proposalId)) {
        return reject(reply, 404, ErrorCode.ProposalNotFound, 'Proposal not found.', { proposalId });
      }
      return reject(reply, 400, ErrorCode.InvalidVote, 'Vote must carry a boolean "support".', parse.error.flatten());
    }

    try {
      const vote = await deps.voteTally.castVote(caller.principal, proposalId, parse.data.support);
      return reply.code(201).send({ vote });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/proposals/:proposalId/votes', async (request, reply) => {
    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    if (!deps.proposalRegistry.getProposal(proposalId)) {
      return reject(reply, 404, ErrorCode.ProposalNotFound, 'Proposal not found.', { proposalId });
    }

    return {
      proposalId,
      votes: deps.voteTally.listVotes(proposalId),
    };
  });

  app.get('/proposals/:proposalId/votes/:principal', async (request, reply) => {
    const proposalId = parseProposalId(request.params, reply);
    if (proposalId === null) return undefined;

    const { principal } = request.params as { principal: string };
    const vote = deps.voteTally.getVote(proposalId, principal);
    if (!vote) {
      return reject(reply, 404, ErrorCode.VoteNotFound, 'No vote recorded for this principal.', { proposalId, principal });
    }

    return { vote };
  });

  // ─── Clock ──────────────────────────────────────────────────────────

  app.get('/clock', async () => ({
    height: deps.clock.now(),
  }));

  app.post('/clock/advance', async (request, reply) => {
    if (!deps.config.clock.manualAdvanceEnabled) {
      return reject(reply, 403, ErrorCode.FeatureDisabled, 'Manual clock advance is disabled.');
    }

    const parse = advanceClockSchema.safeParse(request.body ?? {});
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid request payload.', parse.error.flatten());
    }

    try {
      const height = await deps.clock.advance(parse.data.blocks);
      return { height };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Custody ────────────────────────────────────────────────────────

  app.post('/custody/credit', async (request, reply) => {
    if (!deps.config.custody.faucetEnabled) {
      return reject(reply, 403, ErrorCode.FeatureDisabled, 'Custody faucet is disabled.');
    }

    const caller = resolveCaller(request, reply, deps.participantService);
    if (!caller) return undefined;

    const parse = faucetCreditSchema.safeParse(request.body);
    if (!parse.success) {
      return reject(reply, 400, ErrorCode.InvalidPayload, 'Invalid request payload.', parse.error.flatten());
    }

    if (parse.data.amount > deps.config.custody.faucetMaxCredit) {
      return reject(reply, 400, ErrorCode.InvalidAmount, `Faucet credits are capped at ${deps.config.custody.faucetMaxCredit}.`);
    }

    const balance = deps.custody.credit(caller.principal, parse.data.amount);
    eventBus.emit('custody.credited', { principal: caller.principal, amount: parse.data.amount, balance });
    return { principal: caller.principal, balance };
  });

  app.get('/custody/:principal', async (request) => {
    const { principal } = request.params as { principal: string };
    return {
      principal,
      balance: deps.custody.balanceOf(principal),
    };
  });
}

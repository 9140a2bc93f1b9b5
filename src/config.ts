import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const positiveInt = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const governanceSettingsSchema = z.object({
  minProposalStake: positiveInt,
  defaultProposalDuration: positiveInt,
  // Quorum is floor(totalStaked / quorumDivisor), i.e. 10% by default.
  quorumDivisor: positiveInt,
  titleMaxLength: positiveInt,
  descriptionMaxLength: positiveInt,
});

export type GovernanceSettings = z.infer<typeof governanceSettingsSchema>;

/** Throws on values a proposal could not be created or reloaded with. */
export const loadGovernanceSettings = (env: NodeJS.ProcessEnv): GovernanceSettings => {
  const parsed = governanceSettingsSchema.safeParse({
    minProposalStake: parseNumber(env.MIN_PROPOSAL_STAKE, 100_000),
    defaultProposalDuration: parseNumber(env.DEFAULT_PROPOSAL_DURATION, 144),
    quorumDivisor: parseNumber(env.QUORUM_DIVISOR, 10),
    titleMaxLength: 50,
    descriptionMaxLength: 500,
  });

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid governance settings (${fields}): expected positive integers.`);
  }

  return parsed.data;
};

const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

export const config = {
  app: {
    name: 'stake-governance-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir,
    stateFile: process.env.STATE_FILE ?? path.resolve(dataDir, 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(dataDir, 'events.ndjson'),
  },
  governance: loadGovernanceSettings(process.env),
  clock: {
    autoAdvance: parseBool(process.env.CLOCK_AUTO_ADVANCE, false),
    blockIntervalMs: parseNumber(process.env.CLOCK_BLOCK_INTERVAL_MS, 10_000),
    manualAdvanceEnabled: parseBool(process.env.CLOCK_MANUAL_ADVANCE_ENABLED, true),
  },
  custody: {
    vaultPrincipal: process.env.CUSTODY_VAULT_PRINCIPAL ?? 'governance-vault',
    faucetEnabled: parseBool(process.env.CUSTODY_FAUCET_ENABLED, false),
    faucetMaxCredit: parseNumber(process.env.CUSTODY_FAUCET_MAX_CREDIT, 1_000_000),
  },
};

export type AppConfig = typeof config;

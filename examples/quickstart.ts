#!/usr/bin/env npx tsx
// ─── Governance SDK: Quick-Start ──────────────────────────────────────────
// Full flow: register → fund custody → stake → propose → vote → wait → execute
//
// Requires a server started with CUSTODY_FAUCET_ENABLED=true and
// CLOCK_MANUAL_ADVANCE_ENABLED=true.
//
// Usage:
//   npx tsx examples/quickstart.ts                         # uses localhost:8787
//   API_URL=https://your-server.com npx tsx examples/quickstart.ts
// ────────────────────────────────────────────────────────────────────────────

import { GovernanceAPIError, GovernanceClient } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';

async function main(): Promise<void> {
  console.log(`\nGovernance SDK quick-start against ${API_URL}\n`);

  const publicClient = new GovernanceClient(API_URL);
  const health = await publicClient.health();
  console.log(`Health: ${health.status} | height=${health.height} | totalStaked=${health.stateSummary.totalStaked}`);

  // ── 1. Two participants ───────────────────────────────────────────────
  const alice = await publicClient.registerParticipant('alice');
  const bob = await publicClient.registerParticipant('bob');
  const aliceClient = publicClient.withApiKey(alice.apiKey);
  const bobClient = publicClient.withApiKey(bob.apiKey);

  // ── 2. Fund custody and stake ─────────────────────────────────────────
  await aliceClient.creditCustody(150_000);
  await bobClient.creditCustody(50_000);
  const aliceStake = await aliceClient.stake(120_000);
  await bobClient.stake(40_000);
  console.log(`Alice staked ${aliceStake.stakedAmount}, total staked ${aliceStake.totalStaked}`);

  // ── 3. Propose ────────────────────────────────────────────────────────
  const { proposalId, proposal } = await aliceClient.createProposal({
    title: 'Raise treasury cap',
    description: 'Lift the treasury spending cap for the next epoch.',
    duration: 10,
  });
  console.log(`Proposal #${proposalId} open until block ${proposal.endHeight}, quorum ${proposal.minVotesRequired}`);

  // ── 4. Vote ───────────────────────────────────────────────────────────
  await aliceClient.vote(proposalId, true);
  await bobClient.vote(proposalId, false);

  try {
    await bobClient.vote(proposalId, true);
  } catch (error) {
    if (error instanceof GovernanceAPIError) {
      console.log(`Second vote rejected as expected: ${error.code}`);
    } else {
      throw error;
    }
  }

  // ── 5. Close the window and execute ───────────────────────────────────
  await publicClient.advanceClock(10);
  console.log(`Executable: ${await publicClient.isExecutable(proposalId)}`);

  const executed = await bobClient.executeProposal(proposalId);
  console.log(`Proposal #${executed.id} is now ${executed.status} (yes=${executed.yesWeight}, no=${executed.noWeight})`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { eventBus } from '../src/infra/eventBus.js';
import { createGovernanceHarness, GovernanceHarness, testSettings } from './support/fixtures.js';

describe('VoteTallyService', () => {
  let h: GovernanceHarness;
  let proposalId: number;

  beforeEach(async () => {
    eventBus.clear();
    h = await createGovernanceHarness(testSettings({ minProposalStake: 50_000 }));
    await h.fundAndStake('alice', 60_000);
    await h.fundAndStake('bob', 40_000);
    const proposal = await h.registry.createProposal('alice', {
      title: 'Rotate signers',
      description: 'Replace two of the vault signers.',
      duration: 144,
    });
    proposalId = proposal.id;
  });

  afterEach(async () => {
    await h.cleanup();
  });

  it('tallies each vote with the voter stake', async () => {
    const yes = await h.tally.castVote('alice', proposalId, true);
    const no = await h.tally.castVote('bob', proposalId, false);

    expect(yes).toMatchObject({ proposalId, voter: 'alice', support: true, weight: 60_000, castAtHeight: 0 });
    expect(no).toMatchObject({ proposalId, voter: 'bob', support: false, weight: 40_000 });

    const proposal = h.registry.getProposal(proposalId);
    expect(proposal?.yesWeight).toBe(60_000);
    expect(proposal?.noWeight).toBe(40_000);
    expect(proposal?.minVotesRequired).toBe(10_000);
  });

  it('rejects a second vote from the same principal without touching tallies', async () => {
    await h.tally.castVote('alice', proposalId, true);
    await h.tally.castVote('bob', proposalId, false);

    await expect(h.tally.castVote('bob', proposalId, true)).rejects.toMatchObject({
      code: 'already_voted',
      statusCode: 409,
    });

    const proposal = h.registry.getProposal(proposalId);
    expect(proposal?.yesWeight).toBe(60_000);
    expect(proposal?.noWeight).toBe(40_000);
    expect(h.tally.getVote(proposalId, 'bob')?.support).toBe(false);
  });

  it('rejects participants without stake', async () => {
    await expect(h.tally.castVote('dave', proposalId, true)).rejects.toMatchObject({
      code: 'insufficient_stake',
      statusCode: 403,
    });
    expect(h.tally.getVote(proposalId, 'dave')).toBeNull();
  });

  it('reports an unknown proposal before checking stake', async () => {
    await expect(h.tally.castVote('dave', 42, true)).rejects.toMatchObject({
      code: 'proposal_not_found',
      statusCode: 404,
    });
  });

  it('reports a closed window before checking stake or duplicates', async () => {
    await h.tally.castVote('alice', proposalId, true);
    h.clock.height = 145;

    await expect(h.tally.castVote('dave', proposalId, true)).rejects.toMatchObject({ code: 'proposal_not_active' });
    await expect(h.tally.castVote('alice', proposalId, true)).rejects.toMatchObject({ code: 'proposal_not_active' });
  });

  it('accepts a vote exactly at the end height and refuses one block later', async () => {
    h.clock.height = 144;
    await expect(h.tally.castVote('alice', proposalId, true)).resolves.toMatchObject({ castAtHeight: 144 });

    h.clock.height = 145;
    await expect(h.tally.castVote('bob', proposalId, false)).rejects.toMatchObject({
      code: 'proposal_not_active',
      details: { endHeight: 144, height: 145 },
    });
  });

  it('refuses votes on executed proposals', async () => {
    await h.tally.castVote('alice', proposalId, true);
    h.clock.height = 144;
    await h.execution.executeProposal('alice', proposalId);

    await expect(h.tally.castVote('bob', proposalId, false)).rejects.toMatchObject({ code: 'proposal_not_active' });
  });

  it('captures weight at cast time while new stake counts on other proposals', async () => {
    await h.tally.castVote('bob', proposalId, false);
    await h.fundAndStake('bob', 25_000);

    expect(h.tally.getVote(proposalId, 'bob')?.weight).toBe(40_000);
    expect(h.registry.getProposal(proposalId)?.noWeight).toBe(40_000);

    const second = await h.registry.createProposal('alice', {
      title: 'Second',
      description: 'Another proposal.',
    });
    const vote = await h.tally.castVote('bob', second.id, false);
    expect(vote.weight).toBe(65_000);
  });

  it('lets one stake back votes on several open proposals', async () => {
    const second = await h.registry.createProposal('alice', {
      title: 'Second',
      description: 'Another proposal.',
    });

    await h.tally.castVote('alice', proposalId, true);
    await h.tally.castVote('alice', second.id, true);

    expect(h.registry.getProposal(proposalId)?.yesWeight).toBe(60_000);
    expect(h.registry.getProposal(second.id)?.yesWeight).toBe(60_000);
  });

  it('keeps tallies equal to the sum of recorded vote weights', async () => {
    await h.fundAndStake('carol', 7_000);
    await h.tally.castVote('alice', proposalId, true);
    await h.tally.castVote('bob', proposalId, false);
    await h.tally.castVote('carol', proposalId, true);

    const votes = h.tally.listVotes(proposalId);
    const proposal = h.registry.getProposal(proposalId);
    const yes = votes.filter((v) => v.support).reduce((sum, v) => sum + v.weight, 0);
    const no = votes.filter((v) => !v.support).reduce((sum, v) => sum + v.weight, 0);

    expect(votes.map((v) => v.voter)).toEqual(['alice', 'bob', 'carol']);
    expect(proposal?.yesWeight).toBe(yes);
    expect(proposal?.noWeight).toBe(no);
    expect(yes).toBe(67_000);
  });

  it('emits vote.cast with the recorded vote', async () => {
    const received: unknown[] = [];
    eventBus.on('vote.cast', (_event, data) => received.push(data));

    const vote = await h.tally.castVote('alice', proposalId, true);

    expect(received).toEqual([vote]);
  });
});

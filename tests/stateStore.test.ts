import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { createTempStore, makeProposal, TempStore } from './support/fixtures.js';

describe('StateStore', () => {
  let temp: TempStore;
  let stateFile: string;

  beforeEach(async () => {
    temp = await createTempStore();
    stateFile = path.join(temp.dir, 'state.json');
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('writes a default state file on first init', async () => {
    const raw = JSON.parse(await fs.readFile(stateFile, 'utf-8')) as Record<string, unknown>;

    expect(raw.chain).toEqual({ height: 0, advancedAt: null });
    expect(raw.governance).toEqual({
      stakes: {},
      totalStaked: 0,
      proposals: {},
      proposalCount: 0,
      votes: {},
    });
  });

  it('reloads committed transactions from disk', async () => {
    await temp.store.transaction((state) => {
      state.governance.stakes.alice = { principal: 'alice', stakedAmount: 500, updatedAt: '2026-01-01T00:00:00.000Z' };
      state.governance.totalStaked = 500;
      state.chain.height = 12;
    });

    const reopened = new StateStore(stateFile);
    await reopened.init();

    expect(reopened.read((state) => state.governance.stakes.alice?.stakedAmount)).toBe(500);
    expect(reopened.read((state) => state.chain.height)).toBe(12);
  });

  it('rolls back the draft when the transaction throws', async () => {
    await expect(temp.store.transaction((state) => {
      state.governance.totalStaked = 999;
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect(temp.store.read((state) => state.governance.totalStaked)).toBe(0);

    const reopened = new StateStore(stateFile);
    await reopened.init();
    expect(reopened.read((state) => state.governance.totalStaked)).toBe(0);
  });

  it('runs transactions one at a time in call order', async () => {
    const order: number[] = [];

    await Promise.all([1, 2, 3].map((n) => temp.store.transaction(async (state) => {
      await new Promise((resolve) => setTimeout(resolve, 5 * (4 - n)));
      order.push(n);
      state.governance.proposalCount += 1;
    })));

    expect(order).toEqual([1, 2, 3]);
    expect(temp.store.read((state) => state.governance.proposalCount)).toBe(3);
  });

  it('hands out copies from read', async () => {
    const stakes = temp.store.read((state) => state.governance.stakes);
    stakes.mallory = { principal: 'mallory', stakedAmount: 1, updatedAt: 'x' };

    expect(temp.store.read((state) => state.governance.stakes)).toEqual({});
  });

  it('derives counters from stored records on load', async () => {
    await fs.writeFile(stateFile, JSON.stringify({
      governance: {
        stakes: {
          alice: { principal: 'alice', stakedAmount: 300, updatedAt: 'a' },
          bob: { principal: 'bob', stakedAmount: 200, updatedAt: 'b' },
        },
        totalStaked: 1,
        proposals: { 4: makeProposal({ id: 4 }) },
        proposalCount: 2,
      },
    }));

    const reopened = new StateStore(stateFile);
    await reopened.init();

    expect(reopened.read((state) => state.governance.totalStaked)).toBe(500);
    expect(reopened.read((state) => state.governance.proposalCount)).toBe(4);
    expect(reopened.read((state) => state.governance.votes)).toEqual({});
    expect(reopened.read((state) => state.metrics.votesCast)).toBe(0);
  });

  it('refuses a state file it cannot parse', async () => {
    await fs.writeFile(stateFile, '{ not json');

    await expect(new StateStore(stateFile).init()).rejects.toThrow(SyntaxError);
  });

  it('refuses records with the wrong shape', async () => {
    await fs.writeFile(stateFile, JSON.stringify({
      governance: { stakes: { alice: { principal: 'alice', stakedAmount: -1, updatedAt: 'a' } } },
    }));

    await expect(new StateStore(stateFile).init()).rejects.toThrow();
  });
});

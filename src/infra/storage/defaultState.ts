import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const createDefaultState = (): AppState => ({
  participants: {},
  governance: {
    stakes: {},
    totalStaked: 0,
    proposals: {},
    proposalCount: 0,
    votes: {},
  },
  chain: {
    height: 0,
    advancedAt: null,
  },
  metrics: {
    startedAt: isoNow(),
    participantsRegistered: 0,
    stakesCommitted: 0,
    proposalsCreated: 0,
    votesCast: 0,
    proposalsExecuted: 0,
    blocksAdvanced: 0,
  },
});

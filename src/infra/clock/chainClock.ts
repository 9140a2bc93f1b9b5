import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { eventBus } from '../eventBus.js';
import { StateStore } from '../storage/stateStore.js';
import { isoNow } from '../../utils/time.js';

/** Monotonic block height. Governance operations read it and never move it. */
export interface BlockClock {
  now(): number;
}

/**
 * Block height persisted in the state file. Advances go through the store's
 * transaction queue, so they are ordered with every other mutating call.
 */
export class ChainClock implements BlockClock {
  private height = 0;

  constructor(private readonly store: StateStore) {}

  init(): void {
    this.height = this.store.read((state) => state.chain.height);
  }

  now(): number {
    return this.height;
  }

  async advance(blocks = 1): Promise<number> {
    if (!Number.isSafeInteger(blocks) || blocks <= 0) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Blocks to advance must be a positive integer.', { blocks });
    }

    const height = await this.store.transaction((state) => {
      if (!Number.isSafeInteger(state.chain.height + blocks)) {
        throw new DomainError(ErrorCode.InvalidAmount, 400, 'Advance runs past the largest representable height.', {
          blocks,
          height: state.chain.height,
        });
      }
      state.chain.height += blocks;
      state.chain.advancedAt = isoNow();
      state.metrics.blocksAdvanced += blocks;
      return state.chain.height;
    });

    this.height = height;
    eventBus.emit('clock.advanced', { height, blocks });
    return height;
  }
}

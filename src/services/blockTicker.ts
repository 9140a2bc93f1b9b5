import { ChainClock } from '../infra/clock/chainClock.js';

export type AdvancingClock = Pick<ChainClock, 'advance'>;

export interface BlockTickerStatus {
  running: boolean;
  ticks: number;
  failures: number;
  lastError: string | null;
}

/**
 * Host-side block producer: advances the chain clock by one block per
 * interval. Governance services only ever read the clock.
 */
export class BlockTicker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private ticks = 0;
  private failures = 0;
  private lastError: string | null = null;

  constructor(
    private readonly clock: AdvancingClock,
    private readonly intervalMs: number,
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<void> {
    // Skip if the previous advance is still waiting on the store.
    if (this.ticking) return;
    this.ticking = true;

    try {
      await this.clock.advance(1);
      this.ticks += 1;
    } catch (error) {
      this.failures += 1;
      this.lastError = error instanceof Error ? error.message : String(error);
    } finally {
      this.ticking = false;
    }
  }

  status(): BlockTickerStatus {
    return {
      running: this.timer !== null,
      ticks: this.ticks,
      failures: this.failures,
      lastError: this.lastError,
    };
  }
}

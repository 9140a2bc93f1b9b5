/**
 * Stake ledger.
 *
 * Stake only grows: each commit moves funds into the governance vault and
 * raises both the participant's record and the global total by the same
 * amount, so `totalStaked` always equals the sum of all records.
 */

import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { ValueCustody } from '../integrations/custody/custody.js';
import { mapCustodyError } from '../integrations/custody/errorMapping.js';
import { StakeRecord } from '../domain/governance/governanceTypes.js';
import { isoNow } from '../utils/time.js';

export interface StakeReceipt {
  principal: string;
  amount: number;
  stakedAmount: number;
  totalStaked: number;
}

export class StakeLedgerService {
  constructor(
    private readonly store: StateStore,
    private readonly custody: ValueCustody,
    private readonly logger: EventLogger,
    private readonly vaultPrincipal: string,
  ) {}

  /**
   * Lock `amount` from the caller into custody. A rejected transfer aborts
   * the call before the ledger is touched; if the ledger cannot be committed
   * after the transfer went through, the funds are returned to the caller.
   */
  async commitStake(caller: string, amount: number): Promise<StakeReceipt> {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Stake amount must be a positive integer.', { amount });
    }

    let transferred = false;
    let receipt: StakeReceipt;
    try {
      receipt = await this.store.transaction(async (state) => {
        const { governance } = state;
        const stakedAmount = (governance.stakes[caller]?.stakedAmount ?? 0) + amount;
        const totalStaked = governance.totalStaked + amount;

        if (!Number.isSafeInteger(stakedAmount) || !Number.isSafeInteger(totalStaked)) {
          throw new DomainError(ErrorCode.InvalidAmount, 400, 'Stake would exceed the largest representable amount.', {
            amount,
            stakedAmount: governance.stakes[caller]?.stakedAmount ?? 0,
            totalStaked: governance.totalStaked,
          });
        }

        try {
          await this.custody.transfer({ amount, from: caller, to: this.vaultPrincipal });
        } catch (error) {
          throw mapCustodyError(error);
        }
        transferred = true;

        governance.stakes[caller] = { principal: caller, stakedAmount, updatedAt: isoNow() };
        governance.totalStaked = totalStaked;
        state.metrics.stakesCommitted += 1;

        return {
          principal: caller,
          amount,
          stakedAmount,
          totalStaked,
        } satisfies StakeReceipt;
      });
    } catch (error) {
      if (transferred) {
        await this.refund(caller, amount);
      }
      throw error;
    }

    eventBus.emit('stake.committed', receipt);
    await this.logger.log('info', 'stake.committed', { ...receipt });

    return receipt;
  }

  private async refund(caller: string, amount: number): Promise<void> {
    try {
      await this.custody.transfer({ amount, from: this.vaultPrincipal, to: caller });
    } catch (error) {
      await this.logger.log('error', 'stake.refund_failed', {
        principal: caller,
        amount,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DomainError(ErrorCode.InternalError, 500, 'Stake was not recorded and the refund failed.', {
        principal: caller,
        amount,
      });
    }
    await this.logger.log('warn', 'stake.refunded', { principal: caller, amount });
  }

  /** Unstaked participants simply have zero stake. */
  getStake(principal: string): number {
    return this.store.read((state) => state.governance.stakes[principal]?.stakedAmount ?? 0);
  }

  getStakeRecord(principal: string): StakeRecord | null {
    return this.store.read((state) => state.governance.stakes[principal] ?? null);
  }

  getTotalStaked(): number {
    return this.store.read((state) => state.governance.totalStaked);
  }
}

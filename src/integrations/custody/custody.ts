/**
 * Value custody boundary. Staking moves funds from a participant into the
 * governance vault through `transfer`, which either fully succeeds or throws.
 */

export interface TransferRequest {
  amount: number;
  from: string;
  to: string;
}

export interface ValueCustody {
  transfer(request: TransferRequest): Promise<void>;
}

export type CustodyFailureReason = 'insufficient_funds' | 'invalid_amount' | 'self_transfer';

export class CustodyTransferError extends Error {
  constructor(
    public readonly reason: CustodyFailureReason,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CustodyTransferError';
  }
}

/** Process-local balances, used for development and tests. */
export class InMemoryCustody implements ValueCustody {
  private readonly balances: Map<string, number> = new Map();

  constructor(initialBalances: Record<string, number> = {}) {
    for (const [principal, amount] of Object.entries(initialBalances)) {
      this.balances.set(principal, amount);
    }
  }

  balanceOf(principal: string): number {
    return this.balances.get(principal) ?? 0;
  }

  credit(principal: string, amount: number): number {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new CustodyTransferError('invalid_amount', 'Credit amount must be a positive integer.', { amount });
    }
    const next = this.balanceOf(principal) + amount;
    if (!Number.isSafeInteger(next)) {
      throw new CustodyTransferError('invalid_amount', 'Credit would overflow the balance.', {
        principal,
        balance: this.balanceOf(principal),
        amount,
      });
    }
    this.balances.set(principal, next);
    return next;
  }

  async transfer({ amount, from, to }: TransferRequest): Promise<void> {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new CustodyTransferError('invalid_amount', 'Transfer amount must be a positive integer.', { amount });
    }
    if (from === to) {
      throw new CustodyTransferError('self_transfer', 'Sender and recipient must differ.', { principal: from });
    }

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new CustodyTransferError('insufficient_funds', 'Insufficient funds for transfer.', {
        principal: from,
        available,
        requested: amount,
      });
    }

    const received = this.balanceOf(to) + amount;
    if (!Number.isSafeInteger(received)) {
      throw new CustodyTransferError('invalid_amount', 'Transfer would overflow the recipient balance.', {
        principal: to,
        amount,
      });
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, received);
  }
}

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { CustodyTransferError } from './custody.js';

export const mapCustodyError = (error: unknown): DomainError => {
  if (error instanceof DomainError) {
    return error;
  }

  if (error instanceof CustodyTransferError) {
    return new DomainError(
      ErrorCode.TransferFailed,
      402,
      'Stake transfer into custody was rejected.',
      {
        reason: error.reason,
        ...(error.details ?? {}),
      },
    );
  }

  return new DomainError(
    ErrorCode.TransferFailed,
    502,
    'Custody transfer failed.',
    { error: error instanceof Error ? error.message : String(error) },
  );
};

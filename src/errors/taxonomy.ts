export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  NotAuthorized: 'not_authorized',
  ProposalNotFound: 'proposal_not_found',
  InvalidAmount: 'invalid_amount',
  AlreadyVoted: 'already_voted',
  ProposalExpired: 'proposal_expired',
  InsufficientStake: 'insufficient_stake',
  ProposalNotActive: 'proposal_not_active',
  InvalidState: 'invalid_state',
  InvalidTitle: 'invalid_title',
  InvalidDescription: 'invalid_description',
  InvalidVote: 'invalid_vote',
  VoteNotFound: 'vote_not_found',
  TransferFailed: 'transfer_failed',
  ParticipantNotFound: 'participant_not_found',
  MissingApiKey: 'missing_api_key',
  InvalidApiKey: 'invalid_api_key',
  FeatureDisabled: 'feature_disabled',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});

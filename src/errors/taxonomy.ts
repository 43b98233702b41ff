export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAmount: 'invalid_amount',
  Unauthorized: 'unauthorized',
  ProposalNotFound: 'proposal_not_found',
  ExternalCallFailed: 'external_call_failed',
  Reentrancy: 'reentrancy',
  StateCorrupted: 'state_corrupted',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Usual HTTP status per code. Call sites may still pick another one, e.g. 401
 * for a missing caller or 504 for a source timeout.
 */
export const ErrorStatus: Readonly<Record<ErrorCode, number>> = {
  invalid_payload: 400,
  invalid_amount: 400,
  unauthorized: 403,
  proposal_not_found: 404,
  external_call_failed: 502,
  reentrancy: 409,
  state_corrupted: 500,
  internal_error: 500,
};

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

export const isDomainError = (error: unknown, code?: ErrorCode): error is DomainError => (
  error instanceof DomainError && (code === undefined || error.code === code)
);

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
}

export const toErrorEnvelope = (code: ErrorCode, message: string, details?: unknown): ErrorEnvelope => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});

/** Status and body for anything a handler caught. */
export const describeFailure = (error: unknown): { statusCode: number; body: ErrorEnvelope } => {
  if (error instanceof DomainError) {
    return { statusCode: error.statusCode, body: toErrorEnvelope(error.code, error.message, error.details) };
  }
  return {
    statusCode: ErrorStatus.internal_error,
    body: toErrorEnvelope(ErrorCode.InternalError, 'Unexpected internal error', { error: String(error) }),
  };
};

import { DomainError, ErrorCode, isDomainError } from '../../errors/taxonomy.js';

export class PriceSourceHttpError extends Error {
  constructor(
    public readonly address: string,
    public readonly statusCode: number,
    public readonly bodyText: string,
  ) {
    super(`price source ${address} responded with status ${statusCode}`);
    this.name = 'PriceSourceHttpError';
  }
}

export class PriceSourceNetworkError extends Error {
  constructor(public readonly address: string, message: string) {
    super(message);
    this.name = 'PriceSourceNetworkError';
  }
}

export class PriceSourceResponseError extends Error {
  constructor(public readonly address: string, message: string) {
    super(message);
    this.name = 'PriceSourceResponseError';
  }
}

export class PriceSourceTimeoutError extends Error {
  constructor(public readonly address: string, public readonly timeoutMs: number) {
    super(`price source ${address} did not answer within ${timeoutMs}ms`);
    this.name = 'PriceSourceTimeoutError';
  }
}

const summarizeBody = (raw: string): string | undefined => {
  const trimmed = raw.trim();
  return trimmed ? trimmed.slice(0, 300) : undefined;
};

/**
 * Fold anything a source call can throw into `external_call_failed`.
 * A re-entrancy refusal keeps its own code.
 */
export const mapPriceSourceError = (error: unknown, address: string, asset: string): DomainError => {
  if (isDomainError(error, ErrorCode.ExternalCallFailed) || isDomainError(error, ErrorCode.Reentrancy)) {
    return error;
  }

  const details: Record<string, unknown> = { source: address, asset };

  if (error instanceof PriceSourceHttpError) {
    return new DomainError(ErrorCode.ExternalCallFailed, 502, 'Price source returned an error status.', {
      ...details,
      upstreamStatus: error.statusCode,
      upstreamMessage: summarizeBody(error.bodyText),
    });
  }

  if (error instanceof PriceSourceTimeoutError) {
    return new DomainError(ErrorCode.ExternalCallFailed, 504, 'Price source timed out.', {
      ...details,
      timeoutMs: error.timeoutMs,
    });
  }

  if (error instanceof PriceSourceResponseError) {
    return new DomainError(ErrorCode.ExternalCallFailed, 502, 'Price source returned a malformed price.', {
      ...details,
      reason: error.message,
    });
  }

  return new DomainError(ErrorCode.ExternalCallFailed, 502, 'Price source call failed.', {
    ...details,
    reason: error instanceof Error ? error.message : String(error),
  });
};

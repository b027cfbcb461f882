import createError from '@fastify/error';

// Chain layer errors (CHAIN_*)
//
// Every constructor takes (operation, key) so a caller can tell which
// canonical operation failed and for which address/hash/unit.

/** Requested ledger entity does not exist on the backend (404) */
export const ChainNotFoundError = createError<[string, string]>(
  'CHAIN_NOT_FOUND',
  '%s: resource not found: %s',
  404
);

/** Address or stake credential string is malformed (400) */
export const ChainInvalidAddressError = createError<[string, string]>(
  'CHAIN_INVALID_ADDRESS',
  '%s: invalid address or credential: %s',
  400
);

/** Asset unit is malformed (400) */
export const ChainInvalidUnitError = createError<[string, string]>(
  'CHAIN_INVALID_UNIT',
  '%s: invalid unit: %s',
  400
);

/** Any other caller input that cannot be used (400) */
export const ChainInvalidInputError = createError<[string, string]>(
  'CHAIN_INVALID_INPUT',
  '%s: invalid input: %s',
  400
);

/** More than one holder or UTXO where exactly one is expected (409) */
export const ChainAmbiguousResultError = createError<[string, string]>(
  'CHAIN_AMBIGUOUS_RESULT',
  '%s: ambiguous result: %s',
  409
);

/** Script evaluation rejected by the backend (422) */
export const ChainEvaluationError = createError<[string, string]>(
  'CHAIN_EVALUATION_FAILED',
  '%s: transaction evaluation failed: %s',
  422
);

/** Transaction submission rejected by the backend (422) */
export const ChainSubmissionError = createError<[string, string]>(
  'CHAIN_SUBMISSION_FAILED',
  '%s: transaction submission failed: %s',
  422
);

/** Caller cancelled the operation or its deadline expired (499) */
export const ChainCancelledError = createError<[string, string]>(
  'CHAIN_CANCELLED',
  '%s: operation cancelled: %s',
  499
);

/** Backend answered 429 (503) */
export const ChainRateLimitedError = createError<[string, string]>(
  'CHAIN_RATE_LIMITED',
  '%s: rate limited by provider: %s',
  503
);

/** Unexpected backend or transport failure (502) */
export const ChainProviderError = createError<[string, string]>(
  'CHAIN_PROVIDER_ERROR',
  '%s: provider error: %s',
  502
);

/** Malformed hex, CBOR or JSON payload from a backend (502) */
export const ChainDecodeError = createError<[string, string]>(
  'CHAIN_DECODE_FAILED',
  '%s: failed to decode backend payload: %s',
  502
);

/** Operation is not offered by the configured backend (501) */
export const ChainNotImplementedError = createError<[string, string]>(
  'CHAIN_NOT_IMPLEMENTED',
  '%s: not implemented by the %s backend',
  501
);

export type ChainErrorCode =
  | 'CHAIN_NOT_FOUND'
  | 'CHAIN_INVALID_ADDRESS'
  | 'CHAIN_INVALID_UNIT'
  | 'CHAIN_INVALID_INPUT'
  | 'CHAIN_AMBIGUOUS_RESULT'
  | 'CHAIN_EVALUATION_FAILED'
  | 'CHAIN_SUBMISSION_FAILED'
  | 'CHAIN_CANCELLED'
  | 'CHAIN_RATE_LIMITED'
  | 'CHAIN_PROVIDER_ERROR'
  | 'CHAIN_DECODE_FAILED'
  | 'CHAIN_NOT_IMPLEMENTED';

/**
 * Narrow an unknown thrown value to a chain error, optionally of one code.
 */
export function isChainError(
  error: unknown,
  code?: ChainErrorCode
): error is Error & { code: ChainErrorCode; statusCode: number } {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  if (!error.code.startsWith('CHAIN_')) {
    return false;
  }
  return code === undefined || error.code === code;
}

/** Human-readable message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

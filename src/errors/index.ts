import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Request errors (REQUEST_*)
export const InvalidRequestError = createError<[string]>(
  'REQUEST_INVALID',
  'Invalid request: %s',
  400
);

// Ledger errors (CHAIN_*) - re-exported from the chain layer
export {
  ChainAmbiguousResultError,
  ChainCancelledError,
  ChainDecodeError,
  ChainEvaluationError,
  ChainInvalidAddressError,
  ChainInvalidInputError,
  ChainInvalidUnitError,
  ChainNotFoundError,
  ChainNotImplementedError,
  ChainProviderError,
  ChainRateLimitedError,
  ChainSubmissionError,
  isChainError,
} from '../chain/errors.js';

// Type for all application errors
export type AppError =
  | typeof ConfigInvalidError
  | typeof ConfigMissingError
  | typeof ConfigParseError
  | typeof InvalidRequestError;

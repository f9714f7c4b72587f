import { ConcordanceError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  exitCode: number; // Process exit code hint
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Handle known ConcordanceError
  if (error instanceof ConcordanceError) {
    return {
      message: error.message,
      code: error.code,
      exitCode: getExitCodeForErrorCode(error.code),
      details: error.context,
    };
  }

  // 2. Handle standard errors
  if (error instanceof Error) {
    logger.warn({ error: error.message }, 'Unmapped internal error');
    return {
      message: error.message,
      code: ErrorCodes.INTERNAL_ERROR,
      exitCode: 1,
    };
  }

  // 3. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
    exitCode: 1,
  };
}

/**
 * Usage errors exit with 2, scheme defects with 3, anything else with 1
 */
export function getExitCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.CONFIG_INVALID:
      return 2;

    case ErrorCodes.SCHEME_DEFINITION:
    case ErrorCodes.SCHEME_INCOMPLETE:
    case ErrorCodes.UNREACHABLE_COMPARISON:
      return 3;

    default:
      return 1;
  }
}

/**
 * CLI error reporting
 *
 * Failures are written to stderr as a JSON document so scripts can parse
 * them; stdout only ever carries results.
 */

import { mapError, type MappedError } from '../../utils/error-mapper.js';

export interface CliErrorPayload {
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

export function toCliErrorPayload(mapped: MappedError): CliErrorPayload {
  const payload: CliErrorPayload = { error: mapped.message, code: mapped.code };
  if (mapped.details !== undefined) {
    payload.details = mapped.details;
  }
  return payload;
}

/**
 * Report an error and exit with its mapped code
 */
export function handleCliError(error: unknown): never {
  const mapped = mapError(error);
  console.error(JSON.stringify(toCliErrorPayload(mapped), null, 2));
  process.exit(mapped.exitCode);
}

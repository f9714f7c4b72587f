/**
 * Env value parsers
 *
 * Each parser turns the raw text of one environment variable into a typed
 * value. Unrecognized text yields the fallback, so a typo never produces a
 * half-valid config; zod still checks the assembled result.
 */

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Package root, from both src/config/registry and dist/config/registry */
export const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

const TRUE_WORDS: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['0', 'false', 'no', 'off']);

/** Trimmed text, or undefined when the variable is unset or blank */
function present(raw: string | undefined): string | undefined {
  const text = raw?.trim();
  return text ? text : undefined;
}

/**
 * `1/true/yes/on` and `0/false/no/off`, case-insensitive. Anything else is
 * the fallback.
 */
export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  const word = present(raw)?.toLowerCase();
  if (word === undefined) return fallback;
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return fallback;
}

/**
 * Lowercased text, restricted to `allowed` when given
 */
export function parseString(
  raw: string | undefined,
  fallback: string,
  allowed?: readonly string[]
): string {
  const value = present(raw)?.toLowerCase();
  if (value === undefined) return fallback;
  return allowed === undefined || allowed.includes(value) ? value : fallback;
}

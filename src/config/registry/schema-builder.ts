/**
 * Registry evaluation
 *
 * Turns registry metadata into raw config values,
 * validates the result with zod and lists the variables for the `env` command.
 */

import type { z } from 'zod';
import type { ConfigRegistry, ConfigOptionMeta } from './types.js';
import { parseBoolean, parseString } from './parsers.js';
import { createConfigError } from '../../core/errors.js';

/** One `path: message` line per zod issue */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
}

/**
 * @throws ConcordanceError (E1005) when `config` does not match `schema`
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);
  if (result.success) {
    return result.data;
  }
  throw createConfigError(formatZodErrors(result.error));
}

/**
 * Raw value for one option. Unset or blank yields the default; the value is
 * only checked against the option schema later, by validateConfig.
 */
export function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const { defaultValue, allowedValues } = option;
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  if (typeof defaultValue === 'boolean') {
    return parseBoolean(envValue, defaultValue);
  }
  return allowedValues === undefined
    ? envValue
    : parseString(envValue, String(defaultValue), allowedValues);
}

/**
 * Raw (unvalidated) config, one object per registry section, read from
 * process.env
 */
export function buildConfigFromRegistry(
  registry: ConfigRegistry
): Record<string, Record<string, unknown>> {
  return Object.fromEntries(
    Object.entries(registry.sections).map(([sectionKey, section]) => [
      sectionKey,
      Object.fromEntries(
        Object.entries(section.options).map(
          ([key, option]) => [key, parseEnvValue(option, process.env[option.envKey])] as const
        )
      ),
    ] as const)
  );
}

// =============================================================================
// DOCUMENTATION
// =============================================================================

/** e.g. "boolean" or "`info` | `debug`" */
export function describeOptionType(option: ConfigOptionMeta): string {
  return option.allowedValues
    ? option.allowedValues.map((value) => `\`${value}\``).join(' | ')
    : typeof option.defaultValue;
}

export interface EnvVarInfo {
  envKey: string;
  description: string;
  defaultValue: unknown;
  type: string;
  section: string;
}

/** Every variable of the registry, in section then option order */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarInfo[] {
  return Object.entries(registry.sections).flatMap(([section, meta]) =>
    Object.values(meta.options).map((option) => ({
      envKey: option.envKey,
      description: option.description,
      defaultValue: option.defaultValue,
      type: describeOptionType(option),
      section,
    }))
  );
}

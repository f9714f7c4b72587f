/**
 * Application configuration
 *
 * Built once, at import time, from the option registry in ./registry and the
 * current process environment. The CLI entry point loads `.env` before this
 * module is first imported.
 *
 * New options go in a section under ./registry/sections, then into `Config`
 * and `configSchema` below.
 */

import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  concordanceSection,
  runtimeSection,
  type LOG_LEVELS,
} from './registry/index.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  logging: {
    level: LogLevel;
    /** Forces the log level to debug */
    debug: boolean;
  };
  concordance: {
    /** Select the missing-as-no-call table instead of ga4gh */
    missingAsNoCall: boolean;
    /** Throw on unreachable (NA) pairs instead of counting nothing */
    strictUnreachable: boolean;
  };
  runtime: {
    nodeEnv: string;
  };
}

const { options: logging } = loggingSection;
const { options: concordance } = concordanceSection;
const { options: runtime } = runtimeSection;

const configSchema: z.ZodType<Config> = z.object({
  logging: z.object({ level: logging.level.schema, debug: logging.debug.schema }),
  concordance: z.object({
    missingAsNoCall: concordance.missingAsNoCall.schema,
    strictUnreachable: concordance.strictUnreachable.schema,
  }),
  runtime: z.object({ nodeEnv: runtime.nodeEnv.schema }),
});

/**
 * @throws ConcordanceError (E1005) listing every option that failed its schema
 */
export function buildConfig(): Config {
  return validateConfig(buildConfigFromRegistry(configRegistry), configSchema);
}

export const config: Config = buildConfig();

// =============================================================================
// TEST SUPPORT
// =============================================================================

/**
 * Copy `source` into the live config object. Modules hold a reference to
 * `config`, so it is updated in place rather than replaced.
 */
export function restoreConfig(source: Config): void {
  Object.assign(config.logging, source.logging);
  Object.assign(config.concordance, source.concordance);
  Object.assign(config.runtime, source.runtime);
}

export function snapshotConfig(): Config {
  return structuredClone(config);
}

/** Rebuild from the current environment. Tests only. */
export function reloadConfig(): void {
  restoreConfig(buildConfig());
}

function setEnv(values: Record<string, string | undefined>): void {
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

/**
 * Run `testFn` with some environment variables set (or, for `undefined`,
 * removed) and the config rebuilt from them. Both are put back afterwards.
 *
 * @example
 * await withTestEnv({ CONCORDANCE_MISSING_AS_NO_CALL: 'true' }, () => {
 *   expect(createClassifier().policy).toBe('missing-as-no-call');
 * });
 */
export async function withTestEnv<T>(
  overrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const savedConfig = snapshotConfig();
  const savedEnv = Object.fromEntries(
    Object.keys(overrides).map((key) => [key, process.env[key]] as const)
  );

  try {
    setEnv(overrides);
    reloadConfig();
    return await testFn();
  } finally {
    setEnv(savedEnv);
    restoreConfig(savedConfig);
  }
}

export { configRegistry, getAllEnvVars } from './registry/index.js';

export default config;

/**
 * Config registry types
 *
 * An option is described once (env key, default, zod schema) and both the
 * runtime config and the `env` CLI listing are derived from that description.
 * A boolean default selects the boolean parser; every other option is text.
 */

import type { z } from 'zod';

export interface ConfigOptionMeta<T = unknown> {
  envKey: string;
  defaultValue: T;
  description: string;
  schema: z.ZodType<T>;
  /** Closed set of accepted strings; anything else falls back to the default */
  allowedValues?: readonly string[];
}

export interface ConfigSectionMeta {
  name: string;
  description: string;
  options: Record<string, ConfigOptionMeta>;
}

export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}

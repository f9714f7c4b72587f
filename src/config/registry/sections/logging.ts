/**
 * Logging section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

/** pino level names, most to least severe */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export const loggingSection = {
  name: 'logging',
  description: 'Log level of the stderr logger.',
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: `Minimum level logged (${LOG_LEVELS.join(', ')}). Unknown names fall back to info.`,
      schema: z.enum(LOG_LEVELS),
      allowedValues: LOG_LEVELS,
    },
    debug: {
      envKey: 'CONCORDANCE_DEBUG',
      defaultValue: false,
      description: 'Shorthand for LOG_LEVEL=debug; takes precedence over LOG_LEVEL.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;

/**
 * Runtime section: which environment the process runs in
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const runtimeSection = {
  name: 'runtime',
  description: 'Process environment.',
  options: {
    nodeEnv: {
      envKey: 'NODE_ENV',
      defaultValue: 'development',
      description: 'Selects log output: JSON in production, pretty-printed otherwise, none under test.',
      schema: z.string().min(1),
    },
  },
} satisfies ConfigSectionMeta;

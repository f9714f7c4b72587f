/**
 * Concordance Configuration Section
 *
 * Scheme selection and handling of unreachable comparisons.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const concordanceSection = {
  name: 'concordance',
  description: 'Genotype concordance scheme settings.',
  options: {
    missingAsNoCall: {
      envKey: 'CONCORDANCE_MISSING_AS_NO_CALL',
      defaultValue: false,
      description:
        'Score truth sites absent from the truth set as no-calls instead of homozygous reference.',
      schema: z.boolean(),
    },
    strictUnreachable: {
      envKey: 'CONCORDANCE_STRICT_UNREACHABLE',
      defaultValue: true,
      description:
        'Throw when an NA (unreachable) pair is classified. When false the pair is logged and counts nothing.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;

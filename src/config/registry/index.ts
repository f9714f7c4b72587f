/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';
import { loggingSection } from './sections/logging.js';
import { concordanceSection } from './sections/concordance.js';
import { runtimeSection } from './sections/runtime.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry: ConfigRegistry = {
  sections: {
    logging: loggingSection,
    concordance: concordanceSection,
    runtime: runtimeSection,
  },
};

export { loggingSection, concordanceSection, runtimeSection };
export { LOG_LEVELS } from './sections/logging.js';

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  validateConfig,
  getAllEnvVars,
  buildConfigFromRegistry,
  type EnvVarInfo,
} from './schema-builder.js';

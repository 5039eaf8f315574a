/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 */

import type { ConfigRegistry } from './types.js';

import { pathsSection } from './sections/paths.js';
import { generationSection } from './sections/generation.js';
import { chunkingSection } from './sections/chunking.js';
import { summarySection } from './sections/summary.js';
import { outputSection } from './sections/output.js';
import { loggingSection } from './sections/logging.js';
import { retrySection } from './sections/retry.js';
import { runtimeSection } from './sections/runtime.js';

export const configRegistry: ConfigRegistry = {
  sections: {
    paths: pathsSection,
    generation: generationSection,
    chunking: chunkingSection,
    summary: summarySection,
    output: outputSection,
    logging: loggingSection,
    retry: retrySection,
    runtime: runtimeSection,
  },
};

export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  buildConfigSchema,
  getAllEnvVars,
  buildConfigFromRegistry,
} from './schema-builder.js';
export type { EnvVarDoc } from './schema-builder.js';

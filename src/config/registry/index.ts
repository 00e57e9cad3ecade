/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigOptionMeta } from './types.js';

import { databaseSection } from './sections/database.js';
import { postgresqlSection } from './sections/postgresql.js';
import { loggingSection } from './sections/logging.js';
import { paginationSection } from './sections/pagination.js';
import { runtimeSection, pathsSection } from './sections/runtime.js';

// =============================================================================
// TOP-LEVEL OPTIONS
// =============================================================================

export const dbTypeOption = {
  envKey: 'FOTOREPORT_DB_TYPE',
  defaultValue: 'sqlite',
  description: 'Database backend: sqlite (default) or postgresql.',
  schema: z.enum(['sqlite', 'postgresql']),
  allowedValues: ['sqlite', 'postgresql'] as const,
} satisfies ConfigOptionMeta;

// =============================================================================
// COMPLETE REGISTRY
// =============================================================================

export const configRegistry: ConfigRegistry = {
  topLevel: {
    dbType: dbTypeOption,
  },
  sections: {
    database: databaseSection,
    postgresql: postgresqlSection,
    logging: loggingSection,
    pagination: paginationSection,
    runtime: runtimeSection,
    paths: pathsSection,
  },
};

export { databaseSection, postgresqlSection, loggingSection, paginationSection, runtimeSection, pathsSection };
export type { ConfigRegistry, ConfigOptionMeta, ConfigSectionMeta, ParserType } from './types.js';
export {
  buildConfigFromRegistry,
  validateConfig,
  formatZodErrors,
  getAllEnvVars,
} from './schema-builder.js';

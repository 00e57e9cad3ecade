/**
 * Centralized configuration module for FotoReport
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Optionally add parse: 'int' | 'boolean' | 'path' | custom function
 *   4. Reference its schema in `configSchema` below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.database.path);
 */

import { z } from 'zod';
import {
  configRegistry,
  dbTypeOption,
  databaseSection,
  postgresqlSection,
  loggingSection,
  paginationSection,
  runtimeSection,
  pathsSection,
  buildConfigFromRegistry,
  validateConfig,
} from './registry/index.js';
import { projectRoot } from './registry/parsers.js';

// =============================================================================
// CONFIG SCHEMA (option schemas come from the registry)
// =============================================================================

const db = databaseSection.options;
const pg = postgresqlSection.options;

export const configSchema = z.object({
  dbType: dbTypeOption.schema,
  database: z.object({
    path: db.path.schema,
    skipInit: db.skipInit.schema,
    verbose: db.verbose.schema,
    busyTimeoutMs: db.busyTimeoutMs.schema,
  }),
  postgresql: z.object({
    connectionString: pg.connectionString.schema,
    host: pg.host.schema,
    port: pg.port.schema,
    database: pg.database.schema,
    user: pg.user.schema,
    password: pg.password.schema,
    ssl: pg.ssl.schema,
    sslRejectUnauthorized: pg.sslRejectUnauthorized.schema,
    poolMin: pg.poolMin.schema,
    poolMax: pg.poolMax.schema,
    idleTimeoutMs: pg.idleTimeoutMs.schema,
    connectionTimeoutMs: pg.connectionTimeoutMs.schema,
    statementTimeoutMs: pg.statementTimeoutMs.schema,
  }),
  logging: z.object({
    level: loggingSection.options.level.schema,
    debug: loggingSection.options.debug.schema,
  }),
  pagination: z
    .object({
      defaultLimit: paginationSection.options.defaultLimit.schema,
      maxLimit: paginationSection.options.maxLimit.schema,
    })
    .refine((p) => p.defaultLimit <= p.maxLimit, {
      message: 'defaultLimit must not exceed maxLimit',
    }),
  runtime: z.object({
    nodeEnv: runtimeSection.options.nodeEnv.schema,
    projectRoot: z.string(),
  }),
  paths: z.object({
    dataDir: pathsSection.options.dataDir.schema,
  }),
});

/** Database type: SQLite (default) or PostgreSQL */
export type DatabaseType = z.infer<typeof dbTypeOption.schema>;

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata and validate it.
 *
 * @throws FotoReportError when an option fails its schema
 */
export function buildConfig(): Config {
  const raw = buildConfigFromRegistry(configRegistry);
  const runtime = typeof raw.runtime === 'object' && raw.runtime !== null ? raw.runtime : {};

  return validateConfig(
    {
      ...raw,
      runtime: { ...runtime, projectRoot },
    },
    configSchema
  );
}

// Create the singleton config instance
export const config: Config = buildConfig();

const SECTION_KEYS = [
  'database',
  'postgresql',
  'logging',
  'pagination',
  'runtime',
  'paths',
] as const;

function replaceSection(target: object, source: object): void {
  for (const key of Object.keys(target)) {
    if (!(key in source)) {
      Reflect.deleteProperty(target, key);
    }
  }
  Object.assign(target, source);
}

function applyConfig(source: Config): void {
  config.dbType = source.dbType;
  for (const key of SECTION_KEYS) {
    replaceSection(config[key], source[key]);
  }
}

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 */
export function reloadConfig(): void {
  applyConfig(buildConfig());
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

export function snapshotConfig(): Config {
  return structuredClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  applyConfig(structuredClone(snapshot));
}

/**
 * Run a function with temporary environment variable overrides.
 * Saves config state, applies env changes, and restores on completion.
 *
 * @param envOverrides - Environment variables to set (use undefined to delete)
 *
 * @example
 * await withTestEnv({ FOTOREPORT_DB_TYPE: 'postgresql' }, () => {
 *   expect(config.dbType).toBe('postgresql');
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  try {
    for (const [key, value] of Object.entries(envOverrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    reloadConfig();

    return await testFn();
  } finally {
    for (const [key, value] of Object.entries(envSnapshot)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    restoreConfig(configSnapshot);
  }
}

// Re-export registry for documentation generation
export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';

export default config;

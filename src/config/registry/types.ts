/**
 * Config Registry Type Definitions
 *
 * Each config option declares envKey, default, description, zod schema and parser.
 */

import type { z } from 'zod';

/**
 * Built-in parser types for env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int' // parseInt
  | 'port' // parseInt with 1-65535 validation
  | 'path'; // Resolve relative to data dir

export type CustomParser<T> = (envValue: string | undefined, defaultValue: T) => T;

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'FOTOREPORT_DB_PATH') */
  envKey: string;
  defaultValue: T;
  description: string;
  schema: z.ZodType<T>;
  parse?: ParserType | CustomParser<T>;
  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];
  /** Passwords and connection strings; defaults hidden by `getAllEnvVars` */
  sensitive?: boolean;
}

export interface ConfigSectionMeta {
  name: string;
  description: string;
  options: Record<string, ConfigOptionMeta>;
}

export interface ConfigRegistry {
  topLevel: Record<string, ConfigOptionMeta>;
  sections: Record<string, ConfigSectionMeta>;
}

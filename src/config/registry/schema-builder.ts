/**
 * Zod Schema Builder
 *
 * Builds config objects from the registry and validates them with zod.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import {
  parseBoolean,
  parseNumber,
  parseInt_,
  parsePort,
  parseString,
  resolveDataPath,
} from './parsers.js';
import { createValidationError } from '../../core/errors.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a config object against the registry schema.
 * Throws a validation error listing every failing option.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw createValidationError(
      'config',
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  return result.data;
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  sensitive: boolean;
  section: string;
}

/**
 * Get all environment variables from the registry.
 * Defaults of sensitive options are hidden.
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDoc[] {
  const toDoc = (option: ConfigOptionMeta, section: string): EnvVarDoc => ({
    envKey: option.envKey,
    description: option.description,
    defaultValue: option.sensitive ? undefined : option.defaultValue,
    sensitive: option.sensitive ?? false,
    section,
  });

  const envVars: EnvVarDoc[] = [];
  for (const option of Object.values(registry.topLevel)) {
    envVars.push(toDoc(option, '(top-level)'));
  }
  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push(toDoc(option, sectionKey));
    }
  }
  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodType): ParserType {
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  // Path defaults are resolved too, not only explicit values
  if (parserType === 'path') {
    return resolveDataPath(envValue, String(defaultValue));
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);
    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);
    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);
    case 'port':
      return parsePort(envValue, typeof defaultValue === 'number' ? defaultValue : 0);
    case 'string':
      if (option.allowedValues) {
        return parseString(envValue, String(defaultValue), option.allowedValues);
      }
      return envValue;
    default:
      return envValue;
  }
}

function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, process.env[option.envKey]);
  }

  return result;
}

/**
 * Build the raw config object from registry metadata.
 * Callers validate it with `validateConfig` to get a typed config.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(registry.topLevel)) {
    result[key] = parseEnvValue(option, process.env[option.envKey]);
  }

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}

/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 */

import { resolve, dirname, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// PROJECT ROOT
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const projectRoot = resolve(__dirname, '../../..');

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as a valid port number (1-65535).
 */
export function parsePort(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed >= 65536) {
    return fallback;
  }
  return parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 * Values outside the allowed set fall back to the default.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Expand tilde (~) to home directory in file paths.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Get the base data directory.
 * FOTOREPORT_DATA_DIR wins; otherwise projectRoot/data.
 */
export function getDataDir(): string {
  const dataDir = process.env.FOTOREPORT_DATA_DIR;
  if (dataDir) {
    return resolve(expandTilde(dataDir));
  }
  return resolve(projectRoot, 'data');
}

/**
 * Resolve a data path. Absolute values are kept, relative ones land in the
 * data dir. The SQLite special name ':memory:' passes through untouched.
 */
export function resolveDataPath(envValue: string | undefined, relativePath: string): string {
  const value = envValue ? expandTilde(envValue) : relativePath;
  if (value === ':memory:' || isAbsolute(value)) {
    return value;
  }
  return resolve(getDataDir(), value);
}

/**
 * Database Utilities for Tests
 *
 * Shared utilities for database setup and cleanup in tests.
 */

import { existsSync, unlinkSync, mkdirSync } from 'node:fs';

/**
 * Remove a SQLite database file along with its WAL and SHM files.
 */
export function cleanupDbFiles(dbPath: string): void {
  for (const suffix of ['', '-wal', '-shm']) {
    const path = `${dbPath}${suffix}`;
    if (existsSync(path)) {
      unlinkSync(path);
    }
  }
}

export function ensureDirectory(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Ensure ./data/test exists for file-backed test databases.
 */
export function ensureTestDataDirectory(): string {
  const dir = './data/test';
  ensureDirectory(dir);
  return dir;
}

/**
 * Database Schema
 *
 * Re-exports all schema definitions from the modular schema/ directory.
 * Import from this file for convenience.
 */

export * from './schema/index.js';

/**
 * PostgreSQL schema. Same logical model as the SQLite schema, with
 * BIGSERIAL keys, native booleans, TIMESTAMPTZ, DATE and BYTEA columns.
 */

import { users } from './users.js';
import { clients, locations, assignments } from './sites.js';
import { reports, photos } from './visits.js';

export * from './types.js';
export * from './users.js';
export * from './sites.js';
export * from './visits.js';

export const appSchema = { users, clients, locations, assignments, reports, photos };

export type AppSchema = typeof appSchema;

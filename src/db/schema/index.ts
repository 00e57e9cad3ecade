/**
 * SQLite schema: six tables of the field-visit data model.
 *
 * Ownership: clientes -> locales -> reportes -> fotos, with usuarios
 * owning asignaciones and authored reportes. Every foreign key cascades.
 */

import { users } from './users.js';
import { clients, locations, assignments } from './sites.js';
import { reports, photos } from './visits.js';

export * from './types.js';
export * from './users.js';
export * from './sites.js';
export * from './visits.js';

/**
 * Table map handed to drizzle() for the relational query API.
 */
export const appSchema = { users, clients, locations, assignments, reports, photos };

export type AppSchema = typeof appSchema;

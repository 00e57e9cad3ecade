/**
 * Shared type definitions for PostgreSQL database schema
 *
 * Re-exports from the common types module so both dialects agree.
 */

export { USER_ROLES, USER_ROLES_SQL, type UserRole } from '../types.js';

/**
 * Shared type definitions for database schema
 */

/**
 * User roles. Enforced by a CHECK constraint in both dialects.
 */
export const USER_ROLES = ['admin', 'worker'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/**
 * Allowed `rol` values as an SQL list literal, for CHECK constraints.
 */
export const USER_ROLES_SQL = USER_ROLES.map((role) => `'${role}'`).join(', ');

/**
 * PostgreSQL Users table
 */

import { pgTable, bigserial, text, boolean, timestamp, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { USER_ROLES, USER_ROLES_SQL } from './types.js';
import { bytea } from './bytea.js';

export const users = pgTable(
  'usuarios',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    usuario: text('usuario').notNull().unique(),
    nombreCompleto: text('nombre_completo').notNull(),
    email: text('email'),
    rol: text('rol', { enum: USER_ROLES }).notNull(),
    pwSalt: bytea('pw_salt').notNull(),
    pwHash: bytea('pw_hash').notNull(),
    activo: boolean('activo').default(true).notNull(),
    creadoEn: timestamp('creado_en', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_usuarios_rol_activo').on(table.rol, table.activo),
    check('usuarios_rol_check', sql`${table.rol} IN (${sql.raw(USER_ROLES_SQL)})`),
  ]
);

// Type exports
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

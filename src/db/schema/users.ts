/**
 * Users - field workers and administrators
 */

import { sqliteTable, text, integer, blob, index, check } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { USER_ROLES, USER_ROLES_SQL } from './types.js';
import { isoNow } from './timestamps.js';

export const users = sqliteTable(
  'usuarios',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    usuario: text('usuario').notNull().unique(),
    nombreCompleto: text('nombre_completo').notNull(),
    email: text('email'),
    rol: text('rol', { enum: USER_ROLES }).notNull(),
    pwSalt: blob('pw_salt', { mode: 'buffer' }).notNull(),
    pwHash: blob('pw_hash', { mode: 'buffer' }).notNull(),
    activo: integer('activo', { mode: 'boolean' }).default(true).notNull(),
    creadoEn: text('creado_en').default(isoNow).notNull(),
  },
  (table) => [
    index('idx_usuarios_rol_activo').on(table.rol, table.activo),
    check('usuarios_rol_check', sql`${table.rol} IN (${sql.raw(USER_ROLES_SQL)})`),
  ]
);

// Type exports
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

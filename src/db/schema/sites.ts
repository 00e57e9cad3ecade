/**
 * Site tables: Clients, Locations, Assignments
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { users } from './users.js';
import { isoNow } from './timestamps.js';

/**
 * Clients - organizations whose sites are visited
 */
export const clients = sqliteTable(
  'clientes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    nombre: text('nombre').notNull().unique(),
    activo: integer('activo', { mode: 'boolean' }).default(true).notNull(),
    creadoEn: text('creado_en').default(isoNow).notNull(),
  },
  (table) => [index('idx_clientes_activo').on(table.activo)]
);

/**
 * Locations - physical sites, owned by exactly one client
 */
export const locations = sqliteTable(
  'locales',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    clienteId: integer('cliente_id')
      .notNull()
      .references(() => clients.id, { onDelete: 'cascade' }),
    codigoLocal: text('codigo_local'),
    nombreLocal: text('nombre_local').notNull(),
    direccion: text('direccion'),
    ciudad: text('ciudad'),
    activo: integer('activo', { mode: 'boolean' }).default(true).notNull(),
    creadoEn: text('creado_en').default(isoNow).notNull(),
  },
  (table) => [
    index('idx_locales_cliente').on(table.clienteId),
    index('idx_locales_activo').on(table.activo),
  ]
);

/**
 * Assignments - which users are responsible for which locations.
 * One row per (user, location) pair, whatever its active flag.
 */
export const assignments = sqliteTable(
  'asignaciones',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    usuarioId: integer('usuario_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    localId: integer('local_id')
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    activo: integer('activo', { mode: 'boolean' }).default(true).notNull(),
    asignadoEn: text('asignado_en').default(isoNow).notNull(),
  },
  (table) => [
    uniqueIndex('asignaciones_usuario_local_unique').on(table.usuarioId, table.localId),
    index('idx_asignaciones_usuario').on(table.usuarioId),
    index('idx_asignaciones_local').on(table.localId),
  ]
);

// Type exports
export type Client = typeof clients.$inferSelect;
export type NewClient = typeof clients.$inferInsert;

export type Location = typeof locations.$inferSelect;
export type NewLocation = typeof locations.$inferInsert;

export type Assignment = typeof assignments.$inferSelect;
export type NewAssignment = typeof assignments.$inferInsert;

/**
 * PostgreSQL Site tables: Clients, Locations, Assignments
 */

import {
  pgTable,
  bigserial,
  bigint,
  text,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const clients = pgTable(
  'clientes',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    nombre: text('nombre').notNull().unique(),
    activo: boolean('activo').default(true).notNull(),
    creadoEn: timestamp('creado_en', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_clientes_activo').on(table.activo)]
);

export const locations = pgTable(
  'locales',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    clienteId: bigint('cliente_id', { mode: 'number' })
      .notNull()
      .references(() => clients.id, { onDelete: 'cascade' }),
    codigoLocal: text('codigo_local'),
    nombreLocal: text('nombre_local').notNull(),
    direccion: text('direccion'),
    ciudad: text('ciudad'),
    activo: boolean('activo').default(true).notNull(),
    creadoEn: timestamp('creado_en', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_locales_cliente').on(table.clienteId),
    index('idx_locales_activo').on(table.activo),
  ]
);

export const assignments = pgTable(
  'asignaciones',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    usuarioId: bigint('usuario_id', { mode: 'number' })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    localId: bigint('local_id', { mode: 'number' })
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    activo: boolean('activo').default(true).notNull(),
    asignadoEn: timestamp('asignado_en', { withTimezone: true }).defaultNow().notNull(),
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

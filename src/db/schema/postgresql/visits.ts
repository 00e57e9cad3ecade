/**
 * PostgreSQL Visit tables: Reports and Photos
 */

import { pgTable, bigserial, bigint, text, date, timestamp, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { locations } from './sites.js';
import { bytea } from './bytea.js';

export const reports = pgTable(
  'reportes',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    localId: bigint('local_id', { mode: 'number' })
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    usuarioId: bigint('usuario_id', { mode: 'number' })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    fechaVisita: date('fecha_visita', { mode: 'string' }).notNull(),
    notas: text('notas'),
    creadoEn: timestamp('creado_en', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_reportes_local_fecha').on(table.localId, table.fechaVisita),
    index('idx_reportes_usuario_fecha').on(table.usuarioId, table.fechaVisita),
  ]
);

export const photos = pgTable(
  'fotos',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    reporteId: bigint('reporte_id', { mode: 'number' })
      .notNull()
      .references(() => reports.id, { onDelete: 'cascade' }),
    nombreArchivo: text('nombre_archivo'),
    mime: text('mime').notNull(),
    imagenBytes: bytea('imagen_bytes').notNull(),
    comentario: text('comentario'),
    creadoEn: timestamp('creado_en', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_fotos_reporte').on(table.reporteId)]
);

// Type exports
export type Report = typeof reports.$inferSelect;
export type NewReport = typeof reports.$inferInsert;

export type Photo = typeof photos.$inferSelect;
export type NewPhoto = typeof photos.$inferInsert;

/**
 * Visit tables: Reports and their Photos
 */

import { sqliteTable, text, integer, blob, index } from 'drizzle-orm/sqlite-core';
import { users } from './users.js';
import { locations } from './sites.js';
import { isoNow } from './timestamps.js';

/**
 * Reports - one visit by one user to one location on a calendar date
 */
export const reports = sqliteTable(
  'reportes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    localId: integer('local_id')
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    usuarioId: integer('usuario_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    // 'YYYY-MM-DD'
    fechaVisita: text('fecha_visita').notNull(),
    notas: text('notas'),
    creadoEn: text('creado_en').default(isoNow).notNull(),
  },
  (table) => [
    // Per-client date range and "my reports"
    index('idx_reportes_local_fecha').on(table.localId, table.fechaVisita),
    index('idx_reportes_usuario_fecha').on(table.usuarioId, table.fechaVisita),
  ]
);

/**
 * Photos - image payloads attached to a report
 */
export const photos = sqliteTable(
  'fotos',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    reporteId: integer('reporte_id')
      .notNull()
      .references(() => reports.id, { onDelete: 'cascade' }),
    nombreArchivo: text('nombre_archivo'),
    // image/jpeg, image/png
    mime: text('mime').notNull(),
    imagenBytes: blob('imagen_bytes', { mode: 'buffer' }).notNull(),
    comentario: text('comentario'),
    creadoEn: text('creado_en').default(isoNow).notNull(),
  },
  (table) => [index('idx_fotos_reporte').on(table.reporteId)]
);

// Type exports
export type Report = typeof reports.$inferSelect;
export type NewReport = typeof reports.$inferInsert;

export type Photo = typeof photos.$inferSelect;
export type NewPhoto = typeof photos.$inferInsert;

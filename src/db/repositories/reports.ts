/**
 * Report Repository
 *
 * Visit reports and their listings: "my reports", the admin range view,
 * and the per-client range used to assemble client deliverables.
 */

import { eq, and, asc, desc, between, type SQL } from 'drizzle-orm';
import {
  reports,
  locations,
  clients,
  users,
  type Report,
  type NewReport,
} from '../schema.js';
import { assertIsoDate, assertDateRange } from './base.js';
import type { DatabaseDeps, DateRange } from '../../core/types.js';
import type {
  IReportRepository,
  CreateReportInput,
  ReportView,
} from '../../core/interfaces/repositories.js';

export type { CreateReportInput, ReportView } from '../../core/interfaces/repositories.js';

const reportViewColumns = {
  id: reports.id,
  fechaVisita: reports.fechaVisita,
  notas: reports.notas,
  localId: reports.localId,
  nombreLocal: locations.nombreLocal,
  codigoLocal: locations.codigoLocal,
  direccion: locations.direccion,
  ciudad: locations.ciudad,
  cliente: clients.nombre,
  usuarioId: reports.usuarioId,
  trabajador: users.nombreCompleto,
};

/**
 * Create a report repository with injected database dependencies
 */
export function createReportRepository(deps: DatabaseDeps): IReportRepository {
  const { db } = deps;

  function selectViews(where: SQL | undefined) {
    return db
      .select(reportViewColumns)
      .from(reports)
      .innerJoin(locations, eq(locations.id, reports.localId))
      .innerJoin(clients, eq(clients.id, locations.clienteId))
      .innerJoin(users, eq(users.id, reports.usuarioId))
      .where(where);
  }

  function inRange(range: DateRange): SQL {
    const { from, to } = assertDateRange(range);
    return between(reports.fechaVisita, from, to);
  }

  const repo: IReportRepository = {
    create(input: CreateReportInput): Report {
      const report: NewReport = {
        localId: input.localId,
        usuarioId: input.usuarioId,
        fechaVisita: assertIsoDate('fechaVisita', input.fechaVisita),
        notas: (input.notas ?? '').trim(),
      };

      return db.insert(reports).values(report).returning().get();
    },

    getById(id: number): Report | undefined {
      return db.select().from(reports).where(eq(reports.id, id)).get();
    },

    listForUser(usuarioId: number, range: DateRange): ReportView[] {
      return selectViews(and(eq(reports.usuarioId, usuarioId), inRange(range)))
        .orderBy(desc(reports.fechaVisita), desc(reports.id))
        .all();
    },

    listInRange(range: DateRange): ReportView[] {
      return selectViews(inRange(range))
        .orderBy(desc(reports.fechaVisita), desc(reports.id))
        .all();
    },

    listForClient(clienteId: number, range: DateRange): ReportView[] {
      return selectViews(and(eq(locations.clienteId, clienteId), inRange(range)))
        .orderBy(asc(reports.fechaVisita), asc(locations.nombreLocal), asc(reports.id))
        .all();
    },

    delete(id: number): boolean {
      const result = db.delete(reports).where(eq(reports.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

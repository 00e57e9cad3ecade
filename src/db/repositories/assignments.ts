/**
 * Assignment Repository
 *
 * One row per (user, location) pair. create() is a plain insert and fails
 * on a duplicate pair; ensure() is the insert-or-ignore variant.
 */

import { eq, and, asc } from 'drizzle-orm';
import {
  assignments,
  users,
  locations,
  clients,
  type Assignment,
  type NewAssignment,
} from '../schema.js';
import { resolvePagination } from './base.js';
import { locationViewColumns } from './locations.js';
import { createNotFoundError } from '../../core/errors.js';
import type { DatabaseDeps, PaginationOptions } from '../../core/types.js';
import type {
  IAssignmentRepository,
  CreateAssignmentInput,
  AssignmentView,
  LocationView,
} from '../../core/interfaces/repositories.js';

export type { CreateAssignmentInput, AssignmentView } from '../../core/interfaces/repositories.js';

/**
 * Create an assignment repository with injected database dependencies
 */
export function createAssignmentRepository(deps: DatabaseDeps): IAssignmentRepository {
  const { db } = deps;

  function toRow(input: CreateAssignmentInput): NewAssignment {
    return {
      usuarioId: input.usuarioId,
      localId: input.localId,
      activo: input.activo ?? true,
    };
  }

  const repo: IAssignmentRepository = {
    create(input: CreateAssignmentInput): Assignment {
      return db.insert(assignments).values(toRow(input)).returning().get();
    },

    ensure(input: CreateAssignmentInput): Assignment {
      db.insert(assignments)
        .values(toRow(input))
        .onConflictDoNothing({ target: [assignments.usuarioId, assignments.localId] })
        .run();

      const stored = repo.getByPair(input.usuarioId, input.localId);
      if (!stored) {
        throw createNotFoundError('assignment', `${input.usuarioId}/${input.localId}`);
      }
      return stored;
    },

    getById(id: number): Assignment | undefined {
      return db.select().from(assignments).where(eq(assignments.id, id)).get();
    },

    getByPair(usuarioId: number, localId: number): Assignment | undefined {
      return db
        .select()
        .from(assignments)
        .where(and(eq(assignments.usuarioId, usuarioId), eq(assignments.localId, localId)))
        .get();
    },

    listByUser(usuarioId: number): Assignment[] {
      return db
        .select()
        .from(assignments)
        .where(eq(assignments.usuarioId, usuarioId))
        .orderBy(asc(assignments.id))
        .all();
    },

    listByLocation(localId: number): Assignment[] {
      return db
        .select()
        .from(assignments)
        .where(eq(assignments.localId, localId))
        .orderBy(asc(assignments.id))
        .all();
    },

    listDetailed(options: PaginationOptions = {}): AssignmentView[] {
      const { limit, offset } = resolvePagination(options);

      return db
        .select({
          id: assignments.id,
          usuarioId: assignments.usuarioId,
          usuario: users.usuario,
          nombreCompleto: users.nombreCompleto,
          localId: assignments.localId,
          cliente: clients.nombre,
          nombreLocal: locations.nombreLocal,
          activo: assignments.activo,
          asignadoEn: assignments.asignadoEn,
        })
        .from(assignments)
        .innerJoin(users, eq(users.id, assignments.usuarioId))
        .innerJoin(locations, eq(locations.id, assignments.localId))
        .innerJoin(clients, eq(clients.id, locations.clienteId))
        .orderBy(asc(users.usuario), asc(clients.nombre), asc(locations.nombreLocal))
        .limit(limit)
        .offset(offset)
        .all();
    },

    listAssignedLocations(usuarioId: number): LocationView[] {
      return db
        .select(locationViewColumns)
        .from(assignments)
        .innerJoin(locations, eq(locations.id, assignments.localId))
        .innerJoin(clients, eq(clients.id, locations.clienteId))
        .where(
          and(
            eq(assignments.usuarioId, usuarioId),
            eq(assignments.activo, true),
            eq(locations.activo, true),
            eq(clients.activo, true)
          )
        )
        .orderBy(asc(clients.nombre), asc(locations.nombreLocal))
        .all();
    },

    setActive(id: number, activo: boolean): Assignment | undefined {
      return db
        .update(assignments)
        .set({ activo })
        .where(eq(assignments.id, id))
        .returning()
        .get();
    },

    delete(id: number): boolean {
      const result = db.delete(assignments).where(eq(assignments.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

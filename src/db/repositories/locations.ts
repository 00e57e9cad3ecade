/**
 * Location Repository
 */

import { eq, and, asc } from 'drizzle-orm';
import { locations, clients, type Location, type NewLocation } from '../schema.js';
import { resolvePagination, requireText, optionalText } from './base.js';
import type { DatabaseDeps, PaginationOptions } from '../../core/types.js';
import type {
  ILocationRepository,
  CreateLocationInput,
  UpdateLocationInput,
  LocationView,
} from '../../core/interfaces/repositories.js';

export type {
  CreateLocationInput,
  UpdateLocationInput,
  LocationView,
} from '../../core/interfaces/repositories.js';

/**
 * Columns of a LocationView; the query must join clients.
 */
export const locationViewColumns = {
  id: locations.id,
  clienteId: locations.clienteId,
  cliente: clients.nombre,
  codigoLocal: locations.codigoLocal,
  nombreLocal: locations.nombreLocal,
  direccion: locations.direccion,
  ciudad: locations.ciudad,
};

/**
 * Create a location repository with injected database dependencies
 */
export function createLocationRepository(deps: DatabaseDeps): ILocationRepository {
  const { db } = deps;

  const repo: ILocationRepository = {
    create(input: CreateLocationInput): Location {
      const location: NewLocation = {
        clienteId: input.clienteId,
        codigoLocal: optionalText(input.codigoLocal),
        nombreLocal: requireText('nombreLocal', input.nombreLocal),
        direccion: optionalText(input.direccion),
        ciudad: optionalText(input.ciudad),
        activo: input.activo ?? true,
      };

      return db.insert(locations).values(location).returning().get();
    },

    getById(id: number): Location | undefined {
      return db.select().from(locations).where(eq(locations.id, id)).get();
    },

    listByClient(clienteId: number, options: PaginationOptions = {}): Location[] {
      const { limit, offset } = resolvePagination(options);

      return db
        .select()
        .from(locations)
        .where(eq(locations.clienteId, clienteId))
        .orderBy(asc(locations.nombreLocal), asc(locations.id))
        .limit(limit)
        .offset(offset)
        .all();
    },

    listActive(): LocationView[] {
      return db
        .select(locationViewColumns)
        .from(locations)
        .innerJoin(clients, eq(clients.id, locations.clienteId))
        .where(and(eq(locations.activo, true), eq(clients.activo, true)))
        .orderBy(asc(clients.nombre), asc(locations.nombreLocal))
        .all();
    },

    update(id: number, input: UpdateLocationInput): Location | undefined {
      const existing = repo.getById(id);
      if (!existing) return undefined;

      const changes: Partial<NewLocation> = {
        ...(input.codigoLocal !== undefined && { codigoLocal: optionalText(input.codigoLocal) }),
        ...(input.nombreLocal !== undefined && {
          nombreLocal: requireText('nombreLocal', input.nombreLocal),
        }),
        ...(input.direccion !== undefined && { direccion: optionalText(input.direccion) }),
        ...(input.ciudad !== undefined && { ciudad: optionalText(input.ciudad) }),
      };

      if (Object.keys(changes).length === 0) return existing;

      return db.update(locations).set(changes).where(eq(locations.id, id)).returning().get();
    },

    setActive(id: number, activo: boolean): Location | undefined {
      return db.update(locations).set({ activo }).where(eq(locations.id, id)).returning().get();
    },

    delete(id: number): boolean {
      const result = db.delete(locations).where(eq(locations.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

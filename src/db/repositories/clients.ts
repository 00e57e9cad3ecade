/**
 * Client Repository
 */

import { eq, asc } from 'drizzle-orm';
import { clients, type Client, type NewClient } from '../schema.js';
import { resolvePagination, requireText } from './base.js';
import type { DatabaseDeps, PaginationOptions } from '../../core/types.js';
import type {
  IClientRepository,
  CreateClientInput,
  ListClientsFilter,
} from '../../core/interfaces/repositories.js';

export type { CreateClientInput, ListClientsFilter } from '../../core/interfaces/repositories.js';

/**
 * Create a client repository with injected database dependencies
 */
export function createClientRepository(deps: DatabaseDeps): IClientRepository {
  const { db } = deps;

  const repo: IClientRepository = {
    create(input: CreateClientInput): Client {
      const client: NewClient = {
        nombre: requireText('nombre', input.nombre),
        activo: input.activo ?? true,
      };

      return db.insert(clients).values(client).returning().get();
    },

    getById(id: number): Client | undefined {
      return db.select().from(clients).where(eq(clients.id, id)).get();
    },

    getByName(nombre: string): Client | undefined {
      return db.select().from(clients).where(eq(clients.nombre, nombre.trim())).get();
    },

    list(filter: ListClientsFilter = {}, options: PaginationOptions = {}): Client[] {
      const { limit, offset } = resolvePagination(options);

      return db
        .select()
        .from(clients)
        .where(filter.activo !== undefined ? eq(clients.activo, filter.activo) : undefined)
        .orderBy(asc(clients.nombre))
        .limit(limit)
        .offset(offset)
        .all();
    },

    setActive(id: number, activo: boolean): Client | undefined {
      return db.update(clients).set({ activo }).where(eq(clients.id, id)).returning().get();
    },

    rename(id: number, nombre: string): Client | undefined {
      return db
        .update(clients)
        .set({ nombre: requireText('nombre', nombre) })
        .where(eq(clients.id, id))
        .returning()
        .get();
    },

    delete(id: number): boolean {
      const result = db.delete(clients).where(eq(clients.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

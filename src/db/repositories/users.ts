/**
 * User Repository
 *
 * Factory function that accepts DatabaseDeps for dependency injection.
 */

import { eq, and, asc, count, type SQL } from 'drizzle-orm';
import { users, type User, type NewUser } from '../schema.js';
import { resolvePagination, requireText, optionalText } from './base.js';
import type { DatabaseDeps, PaginationOptions } from '../../core/types.js';
import type {
  IUserRepository,
  CreateUserInput,
  ListUsersFilter,
} from '../../core/interfaces/repositories.js';

export type { CreateUserInput, ListUsersFilter } from '../../core/interfaces/repositories.js';

/**
 * Login handles are compared trimmed and lower-cased.
 */
export function normalizeUsername(usuario: string): string {
  return usuario.trim().toLowerCase();
}

/**
 * Create a user repository with injected database dependencies
 */
export function createUserRepository(deps: DatabaseDeps): IUserRepository {
  const { db } = deps;

  const repo: IUserRepository = {
    create(input: CreateUserInput): User {
      const user: NewUser = {
        usuario: requireText('usuario', normalizeUsername(input.usuario)),
        nombreCompleto: requireText('nombreCompleto', input.nombreCompleto),
        email: optionalText(input.email),
        rol: input.rol,
        pwSalt: input.pwSalt,
        pwHash: input.pwHash,
        activo: input.activo ?? true,
      };

      return db.insert(users).values(user).returning().get();
    },

    getById(id: number): User | undefined {
      return db.select().from(users).where(eq(users.id, id)).get();
    },

    getByUsername(usuario: string): User | undefined {
      return db
        .select()
        .from(users)
        .where(eq(users.usuario, normalizeUsername(usuario)))
        .get();
    },

    list(filter: ListUsersFilter = {}, options: PaginationOptions = {}): User[] {
      const { limit, offset } = resolvePagination(options);
      const conditions: SQL[] = [];
      if (filter.rol !== undefined) conditions.push(eq(users.rol, filter.rol));
      if (filter.activo !== undefined) conditions.push(eq(users.activo, filter.activo));

      return db
        .select()
        .from(users)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(asc(users.rol), asc(users.usuario))
        .limit(limit)
        .offset(offset)
        .all();
    },

    adminsExist(): boolean {
      const row = db
        .select({ n: count() })
        .from(users)
        .where(and(eq(users.rol, 'admin'), eq(users.activo, true)))
        .get();
      return (row?.n ?? 0) > 0;
    },

    setActive(id: number, activo: boolean): User | undefined {
      return db.update(users).set({ activo }).where(eq(users.id, id)).returning().get();
    },

    delete(id: number): boolean {
      const result = db.delete(users).where(eq(users.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

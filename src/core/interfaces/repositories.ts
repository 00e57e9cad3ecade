/**
 * Repository Interfaces
 *
 * Contracts for the data-access layer. Implementations live in
 * src/db/repositories and run synchronously on better-sqlite3.
 *
 * Engine integrity errors (unique, foreign key, check) are thrown as the
 * driver raised them; see db/constraint-errors.ts to classify them.
 */

import type {
  User,
  UserRole,
  Client,
  Location,
  Assignment,
  Report,
  Photo,
} from '../../db/schema.js';
import type { PaginationOptions, DateRange } from '../types.js';

// =============================================================================
// USER REPOSITORY
// =============================================================================

export interface CreateUserInput {
  /** Login handle; stored trimmed and lower-cased */
  usuario: string;
  nombreCompleto: string;
  email?: string | null;
  rol: UserRole;
  pwSalt: Buffer;
  pwHash: Buffer;
  activo?: boolean;
}

export interface ListUsersFilter {
  rol?: UserRole;
  activo?: boolean;
}

export interface IUserRepository {
  create(input: CreateUserInput): User;
  getById(id: number): User | undefined;
  /** Lookup by login handle, normalised the same way as create() */
  getByUsername(usuario: string): User | undefined;
  /** Ordered by role, then login handle */
  list(filter?: ListUsersFilter, options?: PaginationOptions): User[];
  /** True when at least one active admin exists */
  adminsExist(): boolean;
  setActive(id: number, activo: boolean): User | undefined;
  delete(id: number): boolean;
}

// =============================================================================
// CLIENT REPOSITORY
// =============================================================================

export interface CreateClientInput {
  nombre: string;
  activo?: boolean;
}

export interface ListClientsFilter {
  activo?: boolean;
}

export interface IClientRepository {
  create(input: CreateClientInput): Client;
  getById(id: number): Client | undefined;
  getByName(nombre: string): Client | undefined;
  /** Ordered by name */
  list(filter?: ListClientsFilter, options?: PaginationOptions): Client[];
  setActive(id: number, activo: boolean): Client | undefined;
  rename(id: number, nombre: string): Client | undefined;
  delete(id: number): boolean;
}

// =============================================================================
// LOCATION REPOSITORY
// =============================================================================

export interface CreateLocationInput {
  clienteId: number;
  codigoLocal?: string | null;
  nombreLocal: string;
  direccion?: string | null;
  ciudad?: string | null;
  activo?: boolean;
}

export interface UpdateLocationInput {
  codigoLocal?: string | null;
  nombreLocal?: string;
  direccion?: string | null;
  ciudad?: string | null;
}

/**
 * A location joined with its client's name, as offered for new reports.
 */
export interface LocationView {
  id: number;
  clienteId: number;
  cliente: string;
  codigoLocal: string | null;
  nombreLocal: string;
  direccion: string | null;
  ciudad: string | null;
}

export interface ILocationRepository {
  create(input: CreateLocationInput): Location;
  getById(id: number): Location | undefined;
  /** All locations of a client, active or not, ordered by name */
  listByClient(clienteId: number, options?: PaginationOptions): Location[];
  /** Active locations of active clients, ordered by client name then location name */
  listActive(): LocationView[];
  update(id: number, input: UpdateLocationInput): Location | undefined;
  setActive(id: number, activo: boolean): Location | undefined;
  delete(id: number): boolean;
}

// =============================================================================
// ASSIGNMENT REPOSITORY
// =============================================================================

export interface CreateAssignmentInput {
  usuarioId: number;
  localId: number;
  activo?: boolean;
}

/**
 * An assignment joined with user, client and location names.
 */
export interface AssignmentView {
  id: number;
  usuarioId: number;
  usuario: string;
  nombreCompleto: string;
  localId: number;
  cliente: string;
  nombreLocal: string;
  activo: boolean;
  asignadoEn: string;
}

export interface IAssignmentRepository {
  /** Plain insert; a duplicate (user, location) pair fails */
  create(input: CreateAssignmentInput): Assignment;
  /** Insert unless the pair exists; returns the stored row either way */
  ensure(input: CreateAssignmentInput): Assignment;
  getById(id: number): Assignment | undefined;
  getByPair(usuarioId: number, localId: number): Assignment | undefined;
  listByUser(usuarioId: number): Assignment[];
  listByLocation(localId: number): Assignment[];
  /** Ordered by login handle, client name, location name */
  listDetailed(options?: PaginationOptions): AssignmentView[];
  /**
   * Locations a user may report on: active assignment, active location,
   * active client. Same ordering as ILocationRepository.listActive().
   */
  listAssignedLocations(usuarioId: number): LocationView[];
  setActive(id: number, activo: boolean): Assignment | undefined;
  delete(id: number): boolean;
}

// =============================================================================
// REPORT REPOSITORY
// =============================================================================

export interface CreateReportInput {
  localId: number;
  usuarioId: number;
  /** 'YYYY-MM-DD' */
  fechaVisita: string;
  notas?: string | null;
}

/**
 * A report row as listed: joined with location, client and author.
 */
export interface ReportView {
  id: number;
  fechaVisita: string;
  notas: string | null;
  localId: number;
  nombreLocal: string;
  codigoLocal: string | null;
  direccion: string | null;
  ciudad: string | null;
  cliente: string;
  usuarioId: number;
  trabajador: string;
}

export interface IReportRepository {
  create(input: CreateReportInput): Report;
  getById(id: number): Report | undefined;
  /** One user's reports in the range, newest visit first */
  listForUser(usuarioId: number, range: DateRange): ReportView[];
  /** Every report in the range, newest visit first */
  listInRange(range: DateRange): ReportView[];
  /** One client's reports in the range, ordered by visit date, location name, id */
  listForClient(clienteId: number, range: DateRange): ReportView[];
  delete(id: number): boolean;
}

// =============================================================================
// PHOTO REPOSITORY
// =============================================================================

export interface CreatePhotoInput {
  reporteId: number;
  nombreArchivo?: string | null;
  /** Must be an image/* type */
  mime: string;
  imagenBytes: Buffer;
  comentario?: string | null;
}

export interface IPhotoRepository {
  create(input: CreatePhotoInput): Photo;
  getById(id: number): Photo | undefined;
  /** Ordered by id */
  listByReport(reporteId: number): Photo[];
  countByReport(reporteId: number): number;
  delete(id: number): boolean;
}

// =============================================================================
// AGGREGATE
// =============================================================================

export interface Repositories {
  users: IUserRepository;
  clients: IClientRepository;
  locations: ILocationRepository;
  assignments: IAssignmentRepository;
  reports: IReportRepository;
  photos: IPhotoRepository;
}

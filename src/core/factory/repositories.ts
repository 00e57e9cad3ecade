/**
 * Repository factory functions
 *
 * Creates all repository instances with injected database dependencies.
 */

import type { DatabaseDeps } from '../types.js';
import type { Repositories } from '../interfaces/repositories.js';
import { createUserRepository } from '../../db/repositories/users.js';
import { createClientRepository } from '../../db/repositories/clients.js';
import { createLocationRepository } from '../../db/repositories/locations.js';
import { createAssignmentRepository } from '../../db/repositories/assignments.js';
import { createReportRepository } from '../../db/repositories/reports.js';
import { createPhotoRepository } from '../../db/repositories/photos.js';

/**
 * Create all repositories with injected dependencies
 *
 * @param deps - Database dependencies (db, sqlite)
 */
export function createRepositories(deps: DatabaseDeps): Repositories {
  return {
    users: createUserRepository(deps),
    clients: createClientRepository(deps),
    locations: createLocationRepository(deps),
    assignments: createAssignmentRepository(deps),
    reports: createReportRepository(deps),
    photos: createPhotoRepository(deps),
  };
}

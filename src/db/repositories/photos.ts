/**
 * Photo Repository
 */

import { eq, asc, count } from 'drizzle-orm';
import { photos, type Photo, type NewPhoto } from '../schema.js';
import { optionalText } from './base.js';
import { createInvalidParameterError, createValidationError, ErrorCodes } from '../../core/errors.js';
import type { DatabaseDeps } from '../../core/types.js';
import type { IPhotoRepository, CreatePhotoInput } from '../../core/interfaces/repositories.js';

export type { CreatePhotoInput } from '../../core/interfaces/repositories.js';

const IMAGE_MIME = /^image\/[a-z0-9.+-]+$/;

export function assertImageMime(mime: string): string {
  const normalized = mime.trim().toLowerCase();
  if (!IMAGE_MIME.test(normalized)) {
    throw createInvalidParameterError(
      'mime',
      `expected an image/* type, got "${mime}"`,
      ErrorCodes.INVALID_MIME_TYPE
    );
  }
  return normalized;
}

/**
 * Create a photo repository with injected database dependencies
 */
export function createPhotoRepository(deps: DatabaseDeps): IPhotoRepository {
  const { db } = deps;

  const repo: IPhotoRepository = {
    create(input: CreatePhotoInput): Photo {
      if (input.imagenBytes.length === 0) {
        throw createValidationError('imagenBytes', 'image payload is empty');
      }

      const photo: NewPhoto = {
        reporteId: input.reporteId,
        nombreArchivo: optionalText(input.nombreArchivo),
        mime: assertImageMime(input.mime),
        imagenBytes: input.imagenBytes,
        comentario: optionalText(input.comentario),
      };

      return db.insert(photos).values(photo).returning().get();
    },

    getById(id: number): Photo | undefined {
      return db.select().from(photos).where(eq(photos.id, id)).get();
    },

    listByReport(reporteId: number): Photo[] {
      return db
        .select()
        .from(photos)
        .where(eq(photos.reporteId, reporteId))
        .orderBy(asc(photos.id))
        .all();
    },

    countByReport(reporteId: number): number {
      const row = db
        .select({ n: count() })
        .from(photos)
        .where(eq(photos.reporteId, reporteId))
        .get();
      return row?.n ?? 0;
    },

    delete(id: number): boolean {
      const result = db.delete(photos).where(eq(photos.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}

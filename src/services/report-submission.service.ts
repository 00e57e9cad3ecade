/**
 * Report Submission Service
 *
 * Saves a visit report together with its buffered photos. Either the
 * report and every photo are stored, or nothing is.
 */

import { transactionWithDb } from '../db/connection.js';
import { createComponentLogger } from '../utils/logger.js';
import type { DatabaseDeps } from '../core/types.js';
import type { Repositories, CreateReportInput } from '../core/interfaces/repositories.js';
import type { Report, Photo } from '../db/schema.js';

const logger = createComponentLogger('report-submission');

/**
 * A photo waiting to be attached to a report that does not exist yet.
 */
export interface BufferedPhoto {
  nombreArchivo?: string | null;
  mime: string;
  imagenBytes: Buffer;
  comentario?: string | null;
}

export interface SubmittedReport {
  report: Report;
  photos: Photo[];
}

/**
 * Store a report and its photos in one transaction.
 *
 * Validation or integrity errors roll the whole submission back and are
 * rethrown unchanged.
 */
export function createReportWithPhotos(
  deps: DatabaseDeps,
  repos: Pick<Repositories, 'reports' | 'photos'>,
  input: CreateReportInput,
  buffered: BufferedPhoto[]
): SubmittedReport {
  const submitted = transactionWithDb(deps.sqlite, () => {
    const report = repos.reports.create(input);
    const photos = buffered.map((photo) =>
      repos.photos.create({
        reporteId: report.id,
        nombreArchivo: photo.nombreArchivo,
        mime: photo.mime,
        imagenBytes: photo.imagenBytes,
        comentario: photo.comentario,
      })
    );
    return { report, photos };
  });

  logger.debug(
    { reportId: submitted.report.id, photoCount: submitted.photos.length },
    'Report submitted'
  );

  return submitted;
}

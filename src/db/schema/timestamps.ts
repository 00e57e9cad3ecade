import { sql } from 'drizzle-orm';

/**
 * Column default producing the same ISO-8601 UTC text as
 * `new Date().toISOString()`, e.g. 2026-01-02T03:04:05.678Z.
 */
export const isoNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

/**
 * Database Configuration Section
 *
 * SQLite database settings (used when dbType = 'sqlite')
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const databaseSection = {
  name: 'database',
  description: 'SQLite database configuration (used when dbType = "sqlite")',
  options: {
    path: {
      envKey: 'FOTOREPORT_DB_PATH',
      defaultValue: 'fotoreport.db',
      description:
        'Path to SQLite database file. Supports ~ expansion and ":memory:". Relative paths resolved from FOTOREPORT_DATA_DIR.',
      schema: z.string(),
      parse: 'path',
    },
    skipInit: {
      envKey: 'FOTOREPORT_SKIP_INIT',
      defaultValue: false,
      description: 'Skip applying migrations when the database is opened.',
      schema: z.boolean(),
    },
    verbose: {
      envKey: 'FOTOREPORT_DB_VERBOSE',
      defaultValue: false,
      description: 'Log each migration as it is applied.',
      schema: z.boolean(),
    },
    busyTimeoutMs: {
      envKey: 'FOTOREPORT_DB_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'SQLite busy timeout in milliseconds. How long to wait for locks.',
      schema: z.number().int().positive(),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;

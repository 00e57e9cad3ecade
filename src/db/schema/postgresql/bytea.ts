import { customType } from 'drizzle-orm/pg-core';

/**
 * Custom Drizzle type for PostgreSQL's bytea. node-postgres reads bytea
 * columns as Buffer and writes Buffer parameters as bytea.
 */
export const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return 'bytea';
  },
});

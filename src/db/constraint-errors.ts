/**
 * Integrity-violation classification
 *
 * Recognises unique, foreign-key, check and not-null violations raised by
 * better-sqlite3 (SQLITE_CONSTRAINT_* codes) or node-postgres (SQLSTATE
 * class 23). The original error is returned as `cause`, unchanged.
 */

export type ConstraintKind = 'unique' | 'foreign_key' | 'check' | 'not_null';

export interface ConstraintViolation {
  kind: ConstraintKind;
  /** Table named by the engine, when it names one */
  table?: string;
  /** Columns named by the engine, in the order given */
  columns?: string[];
  /** Constraint name (PostgreSQL, and SQLite CHECK constraints) */
  constraint?: string;
  cause: Error;
}

const SQLITE_CODES: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_CHECK: 'check',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
};

const PG_SQLSTATES: Record<string, ConstraintKind> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23514': 'check',
  '23502': 'not_null',
};

function readStringProp(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Parse "UNIQUE constraint failed: usuarios.usuario" style messages.
 * CHECK messages name the constraint instead of columns.
 */
function parseSqliteMessage(
  kind: ConstraintKind,
  message: string
): Pick<ConstraintViolation, 'table' | 'columns' | 'constraint'> {
  const match = /constraint failed: (.+)$/.exec(message);
  const detail = match?.[1]?.trim();
  if (!detail) return {};

  if (kind === 'check') {
    return { constraint: detail };
  }

  const qualified = detail.split(',').map((part) => part.trim());
  const columns: string[] = [];
  let table: string | undefined;
  for (const name of qualified) {
    const dot = name.indexOf('.');
    if (dot === -1) {
      columns.push(name);
      continue;
    }
    table ??= name.slice(0, dot);
    columns.push(name.slice(dot + 1));
  }
  return { table, columns };
}

function classifyOne(error: Error): ConstraintViolation | undefined {
  const code = readStringProp(error, 'code');
  if (code === undefined) return undefined;

  const sqliteKind = SQLITE_CODES[code];
  if (sqliteKind) {
    return { kind: sqliteKind, ...parseSqliteMessage(sqliteKind, error.message), cause: error };
  }

  const pgKind = PG_SQLSTATES[code];
  if (pgKind) {
    const column = readStringProp(error, 'column');
    return {
      kind: pgKind,
      table: readStringProp(error, 'table'),
      columns: column ? [column] : undefined,
      constraint: readStringProp(error, 'constraint'),
      cause: error,
    };
  }

  return undefined;
}

/**
 * Classify an integrity violation, looking through `cause` chains left by
 * wrappers. Returns undefined for anything else.
 */
export function getConstraintViolation(error: unknown): ConstraintViolation | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const violation = classifyOne(current);
    if (violation) return violation;
    current = current.cause;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return getConstraintViolation(error)?.kind === 'unique';
}

export function isForeignKeyViolation(error: unknown): boolean {
  return getConstraintViolation(error)?.kind === 'foreign_key';
}

export function isCheckViolation(error: unknown): boolean {
  return getConstraintViolation(error)?.kind === 'check';
}

export function isNotNullViolation(error: unknown): boolean {
  return getConstraintViolation(error)?.kind === 'not_null';
}

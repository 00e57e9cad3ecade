import { describe, it, expect } from 'vitest';
import { mapError } from '../../src/utils/error-mapper.js';
import { createNotFoundError, ErrorCodes } from '../../src/core/errors.js';

describe('mapError', () => {
  it('should pass application errors through', () => {
    const mapped = mapError(createNotFoundError('client', 3));
    expect(mapped.code).toBe(ErrorCodes.NOT_FOUND);
    expect(mapped.message).toBe('client not found: 3');
    expect(mapped.details).toMatchObject({ resource: 'client', identifier: 3 });
  });

  it('should map a unique violation to ALREADY_EXISTS', () => {
    const error = Object.assign(new Error('UNIQUE constraint failed: clientes.nombre'), {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });
    expect(mapError(error)).toEqual({
      message: 'UNIQUE constraint failed: clientes.nombre',
      code: ErrorCodes.ALREADY_EXISTS,
      details: { kind: 'unique', table: 'clientes', columns: ['nombre'] },
    });
  });

  it('should map a foreign key violation to REFERENCE_NOT_FOUND', () => {
    const error = Object.assign(new Error('insert violates foreign key'), {
      code: '23503',
      table: 'locales',
      constraint: 'locales_cliente_id_clientes_id_fk',
    });
    expect(mapError(error)).toEqual({
      message: 'insert violates foreign key',
      code: ErrorCodes.REFERENCE_NOT_FOUND,
      details: {
        kind: 'foreign_key',
        table: 'locales',
        constraint: 'locales_cliente_id_clientes_id_fk',
      },
    });
  });

  it('should map a check violation to CHECK_VIOLATION', () => {
    const error = Object.assign(new Error('CHECK constraint failed: usuarios_rol_check'), {
      code: 'SQLITE_CONSTRAINT_CHECK',
    });
    expect(mapError(error).code).toBe(ErrorCodes.CHECK_VIOLATION);
  });

  it('should map other errors to INTERNAL_ERROR', () => {
    expect(mapError(new Error('boom'))).toEqual({ message: 'boom', code: ErrorCodes.INTERNAL_ERROR });
  });

  it('should map non-errors to UNKNOWN_ERROR', () => {
    expect(mapError('boom')).toEqual({ message: 'boom', code: ErrorCodes.UNKNOWN_ERROR });
  });
});

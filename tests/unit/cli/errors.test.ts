import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatCliError, handleCliError } from '../../../src/cli/utils/errors.js';
import { createNotFoundError } from '../../../src/core/errors.js';

describe('CLI errors', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format application errors with their context', () => {
    expect(JSON.parse(formatCliError(createNotFoundError('client', 9)))).toEqual({
      error: 'client not found: 9',
      code: 'E2000',
      details: {
        resource: 'client',
        identifier: 9,
        suggestion: 'Check that the client exists and you have the correct ID',
      },
    });
  });

  it('should format integrity violations', () => {
    const error = Object.assign(new Error('FOREIGN KEY constraint failed'), {
      code: 'SQLITE_CONSTRAINT_FOREIGNKEY',
    });
    expect(JSON.parse(formatCliError(error))).toEqual({
      error: 'FOREIGN KEY constraint failed',
      code: 'E2002',
      details: { kind: 'foreign_key' },
    });
  });

  it('should omit details when there are none', () => {
    expect(formatCliError(new Error('boom'))).toBe('{\n  "error": "boom",\n  "code": "E5001"\n}');
  });

  it('should write to stderr and exit with status 1', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    expect(() => handleCliError(new Error('boom'))).toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith('{\n  "error": "boom",\n  "code": "E5001"\n}');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});

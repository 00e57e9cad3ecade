/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsTable(result);
}

/**
 * Write a formatted result to stdout
 */
export function printOutput(result: unknown, format: OutputFormat = 'json'): void {
  console.log(formatOutput(result, format));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Response keys that hold the rows of a list command
const LIST_KEYS = ['clients', 'locations', 'assignments', 'users', 'reports', 'migrations'];

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }

  if (!isRecord(result)) {
    return String(result);
  }

  for (const key of LIST_KEYS) {
    const rows = result[key];
    if (Array.isArray(rows)) {
      return formatMeta(result) + formatArrayAsTable(rows);
    }
  }

  return formatObjectAsKeyValue(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first || rows.length !== items.length) {
    return items.map(formatValue).join('\n');
  }

  const allKeys = Object.keys(first);
  const priorityKeys = ['id', 'nombre', 'usuario', 'cliente', 'nombreLocal', 'fechaVisita', 'activo'];
  const keys = priorityKeys.filter((k) => allKeys.includes(k));

  // Remaining keys up to 8 columns
  for (const k of allKeys) {
    if (!keys.includes(k) && keys.length < 8) {
      keys.push(k);
    }
  }

  const widths = keys.map((key) => {
    const maxValue = Math.max(...rows.map((row) => formatValue(row[key]).length));
    return Math.max(key.length, Math.min(maxValue, 40));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(widths[i] ?? k.length)).join('-+-');

  const lines = rows.map((row) =>
    keys
      .map((k, i) => {
        const width = widths[i] ?? k.length;
        return formatValue(row[k]).slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...lines].join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > 40 ? str.slice(0, 37) + '...' : str;
  }
  return String(value);
}

function formatMeta(obj: Record<string, unknown>): string {
  return 'count' in obj ? `Count: ${String(obj.count)}\n\n` : '';
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    const formatted =
      typeof value === 'object' && value !== null && !Buffer.isBuffer(value)
        ? JSON.stringify(value, null, 2)
        : formatValue(value);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}

/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

const LIST_KEYS = ['chunks', 'failures', 'options'];
const PRIORITY_KEYS = ['index', 'section', 'tokens', 'split', 'path', 'code', 'envKey'];
const SUMMARY_KEYS = ['total', 'succeeded', 'failed', 'sections'];
const MAX_COLUMNS = 8;
const MAX_WIDTH = 40;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsTable(result);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (!isRecord(result)) {
    return String(result);
  }

  // Response objects with a known list key: summary line, then the list
  for (const key of LIST_KEYS) {
    const list = result[key];
    if (Array.isArray(list)) {
      return formatSummary(result) + formatArrayAsTable(list);
    }
  }

  return formatObjectAsKeyValue(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first || rows.length !== items.length) {
    return items.map(String).join('\n');
  }

  // Priority keys first, then the rest up to the column limit
  const allKeys = Object.keys(first);
  const keys = PRIORITY_KEYS.filter((k) => allKeys.includes(k));
  for (const k of allKeys) {
    if (!keys.includes(k) && keys.length < MAX_COLUMNS) {
      keys.push(k);
    }
  }

  const widths = calculateColumnWidths(rows, keys);

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
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > MAX_WIDTH ? str.slice(0, MAX_WIDTH - 3) + '...' : str;
  }
  return String(value).replace(/\n/g, ' ');
}

function calculateColumnWidths(items: Record<string, unknown>[], keys: string[]): number[] {
  return keys.map((key) => {
    const maxValue = Math.max(...items.map((item) => formatValue(item[key]).length));
    return Math.max(key.length, Math.min(maxValue, MAX_WIDTH));
  });
}

function formatSummary(obj: Record<string, unknown>): string {
  const parts = SUMMARY_KEYS.filter((key) => key in obj).map((key) => `${key}: ${String(obj[key])}`);
  return parts.length > 0 ? parts.join(' | ') + '\n\n' : '';
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    const formatted =
      typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}

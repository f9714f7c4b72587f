/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export const OUTPUT_FORMATS = ['json', 'table'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  // Table format
  return formatAsTable(result);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (isRecord(result)) {
    return formatObjectAsKeyValue(result);
  }
  return String(result);
}

/**
 * Render records as aligned columns. Keys come from the first record unless
 * given explicitly.
 */
export function formatArrayAsTable(items: readonly unknown[], columns?: readonly string[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first) {
    return items.map(String).join('\n');
  }

  const keys = columns ?? Object.keys(first);
  const widths = calculateColumnWidths(rows, keys);

  const header = keys.map((k, i) => k.padEnd(widths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(widths[i] ?? k.length)).join('-+-');

  const body = rows.map((row) =>
    keys
      .map((k, i) => {
        const width = widths[i] ?? k.length;
        return formatValue(row[k]).slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...body].join('\n');
}

const MAX_COLUMN_WIDTH = 40;

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'object') return String(value);
  const json = JSON.stringify(value);
  return json.length > MAX_COLUMN_WIDTH ? `${json.slice(0, MAX_COLUMN_WIDTH - 3)}...` : json;
}

function calculateColumnWidths(
  items: readonly Record<string, unknown>[],
  keys: readonly string[]
): number[] {
  return keys.map((key) => {
    const widest = items.reduce((max, item) => Math.max(max, formatValue(item[key]).length), 0);
    return Math.max(key.length, Math.min(widest, MAX_COLUMN_WIDTH));
  });
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  return Object.entries(obj)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) =>
      typeof value === 'object' && value !== null
        ? `${key}: ${JSON.stringify(value)}`
        : `${key}: ${String(value)}`
    )
    .join('\n');
}

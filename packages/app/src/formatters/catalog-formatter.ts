/**
 * Output helpers shared by the data commands
 */

import { formatPrice, nanosToIso } from '@barvault/contracts';
import type { Bar } from '@barvault/contracts';

/**
 * JSON with bigint values written as decimal strings
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item), 2);
}

export function formatRange(start: bigint, end: bigint): string {
  return `${nanosToIso(start)} -> ${nanosToIso(end)}`;
}

/**
 * Boxed table, columns padded to their widest cell
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const line = (left: string, fill: string, join: string, right: string) =>
    `${left}${widths.map((width) => fill.repeat(width + 2)).join(join)}${right}`;
  const cells = (row: readonly string[]) =>
    `│${widths.map((width, column) => ` ${(row[column] ?? '').padEnd(width)} `).join('│')}│`;

  const lines = [line('┌', '─', '┬', '┐'), cells(headers), line('├', '─', '┼', '┤')];
  for (const row of rows) {
    lines.push(cells(row));
  }
  lines.push(line('└', '─', '┴', '┘'));
  return lines.join('\n');
}

export const BAR_COLUMNS = ['Time', 'Open', 'High', 'Low', 'Close', 'Volume'] as const;

export function barRow(bar: Bar): string[] {
  return [
    nanosToIso(bar.eventTime),
    formatPrice(bar.open),
    formatPrice(bar.high),
    formatPrice(bar.low),
    formatPrice(bar.close),
    bar.volume.toString(),
  ];
}

/**
 * Bar as a JSON-friendly record with decimal price text
 */
export function barRecord(bar: Bar): Record<string, string> {
  const [time = '', open = '', high = '', low = '', close = '', volume = ''] = barRow(bar);
  return { time, open, high, low, close, volume };
}

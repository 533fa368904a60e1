import type { Lead } from '@leadscout/shared';
import { EXPORT_COLUMNS, EXPORT_HEADERS, type CellValue } from './columns.js';

// Spreadsheets evaluate text cells that start with these as formulas
const FORMULA_TRIGGER = /^[=+\-@\t\r]/;

/**
 * Render one field. Text that a spreadsheet would read as a formula gets a
 * leading `'`; numbers are written as-is. Fields holding a comma, quote, CR
 * or LF are quoted with quotes doubled.
 */
export function escapeCsvField(value: CellValue): string {
  if (value === null) {
    return '';
  }
  const text = typeof value === 'string' && FORMULA_TRIGGER.test(value) ? `'${value}` : String(value);
  const escaped = text.replaceAll('"', '""');
  return /[",\r\n]/.test(escaped) ? `"${escaped}"` : escaped;
}

function toRow(values: readonly CellValue[]): string {
  return values.map(escapeCsvField).join(',');
}

/**
 * Render leads as CSV with a header row. Lines end in CRLF, including the last.
 */
export function leadsToCsv(leads: readonly Lead[]): string {
  const lines = [
    toRow(EXPORT_HEADERS),
    ...leads.map((lead) => toRow(EXPORT_COLUMNS.map((column) => column.value(lead)))),
  ];
  return `${lines.join('\r\n')}\r\n`;
}

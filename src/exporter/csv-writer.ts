/**
 * CSV serialization for exported decks
 * ';'-delimited, quoted only where needed, UTF-8 BOM for spreadsheet apps.
 */

export const CSV_DELIMITER = ';';
export const CSV_LINE_TERMINATOR = '\r\n';
const BOM = '\uFEFF';

function escapeCsvField(value: string): string {
  if (/[;"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(fields: string[]): string {
  return fields.map(escapeCsvField).join(CSV_DELIMITER) + CSV_LINE_TERMINATOR;
}

export function toCsv(rows: string[][]): string {
  return BOM + rows.map(toCsvRow).join('');
}

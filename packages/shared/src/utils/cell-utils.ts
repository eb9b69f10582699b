import type { CellValue, RawTable } from '../types/table-types';

/**
 * Check if a cell counts as missing: null, or a blank string
 */
export function isMissingCell(value: CellValue | undefined): value is null | undefined | '' {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Coerce an arbitrary codec value into a tagged cell.
 * Finite numbers stay numbers, strings are trimmed, everything else is missing
 * except booleans and dates, which are kept as text.
 */
export function toCellValue(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof raw === 'boolean') return String(raw);
  if (raw instanceof Date) return raw.toISOString();
  return null;
}

const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Infer a typed cell from text read out of a delimited file: "42" → 42, "" → null.
 * Only plain decimals become numbers; "0x1A" and "1e3" stay text.
 */
export function inferTextCell(text: string): CellValue {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  if (!DECIMAL_PATTERN.test(trimmed)) return trimmed;
  const num = Number(trimmed);
  return isFinite(num) ? num : trimmed;
}

/**
 * First non-missing cell of a column, or null if every cell is missing
 */
export function firstPresentCell(table: RawTable, column: string): CellValue {
  for (const row of table.rows) {
    const value = row[column];
    if (!isMissingCell(value)) return value;
  }
  return null;
}

/**
 * A column is numeric when it has at least one value and every present value is a number
 */
export function isNumericColumn(table: RawTable, column: string): boolean {
  let seen = 0;
  for (const row of table.rows) {
    const value = row[column];
    if (isMissingCell(value)) continue;
    if (typeof value !== 'number') return false;
    seen++;
  }
  return seen > 0;
}

/**
 * Render a cell for text output (CSV/TSV, error messages)
 */
export function cellToString(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

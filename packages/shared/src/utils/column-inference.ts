import { DEFAULT_COLUMN_CANDIDATES } from '../constants/column-candidates';
import type { ColumnCandidates } from '../constants/column-candidates';
import { LAYOUT_DEFAULTS } from '../constants/limits';
import { PlateLayoutError, isPlateLayoutError } from '../errors/plate-layout-error';
import type { PlateLayoutStage } from '../errors/plate-layout-error';
import type { PlateGeometry, PositionFormat, PositionValue } from '../types/plate-types';
import type {
  CellValue,
  ColumnResolution,
  NormalizeHints,
  PlateDataset,
  PlateRecord,
  PositionStrategy,
  RawTable,
  RowColumnPair,
  ValueStrategy,
} from '../types/table-types';
import { cellToString, firstPresentCell, isMissingCell, isNumericColumn } from './cell-utils';
import { requireColumnFormat } from './format-detector';
import { getPlateDimensions } from './plate-geometry';
import { formatPosition, parsePosition, resolveRowLabel } from './position-codec';

/** Where the position of each row comes from */
export interface PositionSource {
  strategy: PositionStrategy;
  positionColumn?: string;
  rowColumnPair?: Required<RowColumnPair>;
  /** One raw position per table row */
  values: CellValue[];
  /** Column name (or "row+column") used in messages */
  label: string;
  /** Columns that must not be picked as the value column */
  consumed: string[];
}

const LETTERS_ONLY = /^[A-Za-z]+$/;
const DIGITS_ONLY = /^\d+$/;

/**
 * Fail with MISSING_COLUMN unless the table has `column`
 */
export function requireColumn(table: RawTable, column: string, role: string, stage: PlateLayoutStage): string {
  if (!table.columns.includes(column)) {
    throw new PlateLayoutError(
      'MISSING_COLUMN',
      stage,
      `${role} "${column}" not found in data. Available columns: ${table.columns.join(', ') || '(none)'}`,
      { column, role, availableColumns: [...table.columns] },
    );
  }
  return column;
}

function rethrowWithRow(error: unknown, stage: PlateLayoutStage, row: number, column: string): never {
  if (isPlateLayoutError(error)) throw error.withStage(stage, { row, column });
  throw error;
}

function rowLabelFromCell(cell: string | number, rowIsNumeric: boolean, geometry: PlateGeometry): string {
  if (rowIsNumeric) {
    const text = String(cell).trim();
    if (!DIGITS_ONLY.test(text)) {
      throw new PlateLayoutError(
        'INVALID_POSITION_FORMAT',
        'position-column',
        `Row value ${JSON.stringify(cell)} is not a row number`,
        { value: cell, rowIsNumeric },
      );
    }
    return resolveRowLabel(parseInt(text, 10), geometry);
  }
  const text = String(cell).trim();
  if (!LETTERS_ONLY.test(text)) {
    throw new PlateLayoutError(
      'INVALID_POSITION_FORMAT',
      'position-column',
      `Row value ${JSON.stringify(cell)} is not a row letter`,
      { value: cell, rowIsNumeric },
    );
  }
  return text.toUpperCase();
}

function columnNumberFromCell(cell: string | number): string {
  const text = String(cell).trim();
  if (!DIGITS_ONLY.test(text)) {
    throw new PlateLayoutError(
      'INVALID_POSITION_FORMAT',
      'position-column',
      `Column value ${JSON.stringify(cell)} is not a column number`,
      { value: cell },
    );
  }
  return String(parseInt(text, 10));
}

/**
 * Row field is letter-based when its first sample is text containing a letter
 */
function inferRowIsNumeric(table: RawTable, rowField: string): boolean {
  const sample = firstPresentCell(table, rowField);
  return !(typeof sample === 'string' && /[A-Za-z]/.test(sample));
}

/**
 * Build "A1"-style positions from separate row and column fields
 */
function synthesizePositions(table: RawTable, pair: Required<RowColumnPair>, geometry: PlateGeometry): CellValue[] {
  const label = `${pair.rowField}+${pair.columnField}`;
  return table.rows.map((row, rowIndex) => {
    const rowCell = row[pair.rowField];
    const colCell = row[pair.columnField];
    if (isMissingCell(rowCell) || isMissingCell(colCell)) {
      throw new PlateLayoutError(
        'INVALID_POSITION_FORMAT',
        'position-column',
        `Row ${rowIndex + 1} has no value in "${pair.rowField}" or "${pair.columnField}"`,
        { row: rowIndex, column: label },
      );
    }
    try {
      return `${rowLabelFromCell(rowCell, pair.rowIsNumeric, geometry)}${columnNumberFromCell(colCell)}`;
    } catch (error) {
      return rethrowWithRow(error, 'position-column', rowIndex, label);
    }
  });
}

function fromPair(
  table: RawTable,
  pair: Required<RowColumnPair>,
  strategy: PositionStrategy,
  geometry: PlateGeometry,
): PositionSource {
  return {
    strategy,
    rowColumnPair: pair,
    values: synthesizePositions(table, pair, geometry),
    label: `${pair.rowField}+${pair.columnField}`,
    consumed: [pair.rowField, pair.columnField],
  };
}

function fromColumn(table: RawTable, column: string, strategy: PositionStrategy): PositionSource {
  return {
    strategy,
    positionColumn: column,
    values: table.rows.map((row) => row[column] ?? null),
    label: column,
    consumed: [column],
  };
}

/**
 * Resolve the position source. First success wins:
 * pair hint, column hint, candidate column names, candidate row/column pairs.
 */
export function resolvePositionSource(
  table: RawTable,
  hints: NormalizeHints,
  geometry: PlateGeometry,
  candidates: ColumnCandidates = DEFAULT_COLUMN_CANDIDATES,
): PositionSource {
  if (hints.rowColumnPair) {
    const { rowField, columnField } = hints.rowColumnPair;
    requireColumn(table, rowField, 'Row field', 'position-column');
    requireColumn(table, columnField, 'Column field', 'position-column');
    const rowIsNumeric = hints.rowColumnPair.rowIsNumeric ?? inferRowIsNumeric(table, rowField);
    return fromPair(table, { rowField, columnField, rowIsNumeric }, 'row_column_pair_hint', geometry);
  }

  if (hints.positionColumn) {
    requireColumn(table, hints.positionColumn, 'Position column', 'position-column');
    return fromColumn(table, hints.positionColumn, 'position_column_hint');
  }

  const byName = candidates.positionColumns.find((name) => table.columns.includes(name));
  if (byName) return fromColumn(table, byName, 'position_candidate');

  for (const [rowField, columnField] of candidates.rowColumnPairs) {
    if (table.columns.includes(rowField) && table.columns.includes(columnField)) {
      const rowIsNumeric = inferRowIsNumeric(table, rowField);
      return fromPair(table, { rowField, columnField, rowIsNumeric }, 'row_column_pair_candidate', geometry);
    }
  }

  throw new PlateLayoutError(
    'POSITION_COLUMN_NOT_FOUND',
    'position-column',
    'Could not automatically detect position column. Please specify positionColumn or rowColumnPair. ' +
      `Tried columns: ${candidates.positionColumns.join(', ')}; ` +
      `tried pairs: ${candidates.rowColumnPairs.map(([r, c]) => `(${r}, ${c})`).join(', ')}. ` +
      `Available columns: ${table.columns.join(', ') || '(none)'}`,
    {
      triedColumns: [...candidates.positionColumns],
      triedPairs: candidates.rowColumnPairs.map(([r, c]) => [r, c]),
      availableColumns: [...table.columns],
    },
  );
}

/**
 * Resolve the value column: hint, case-insensitive candidate names,
 * then the first numeric column not tied to positions or plates.
 */
export function resolveValueColumn(
  table: RawTable,
  hints: NormalizeHints,
  consumed: readonly string[],
  candidates: ColumnCandidates = DEFAULT_COLUMN_CANDIDATES,
): { column: string; strategy: ValueStrategy } {
  if (hints.valueColumn) {
    return { column: requireColumn(table, hints.valueColumn, 'Value column', 'value-column'), strategy: 'hint' };
  }

  const lowered = table.columns.map((c) => c.toLowerCase());
  for (const name of candidates.valueColumns) {
    const idx = lowered.indexOf(name.toLowerCase());
    const column = table.columns[idx];
    if (idx >= 0 && column !== undefined) return { column, strategy: 'candidate' };
  }

  const excluded = new Set<string>([...consumed, ...candidates.positionRelated]);
  if (hints.plateColumn) excluded.add(hints.plateColumn);
  const numeric = table.columns.find((c) => !excluded.has(c) && isNumericColumn(table, c));
  if (numeric) return { column: numeric, strategy: 'first_numeric' };

  throw new PlateLayoutError(
    'VALUE_COLUMN_NOT_FOUND',
    'value-column',
    'Could not automatically detect value column. Please specify valueColumn. ' +
      `Tried names: ${candidates.valueColumns.join(', ')}; no numeric column left after excluding ${[...excluded].join(', ')}`,
    {
      triedColumns: [...candidates.valueColumns],
      excludedColumns: [...excluded],
      availableColumns: [...table.columns],
    },
  );
}

/**
 * Fail on a position seen twice within the same plate
 */
export function assertUniquePositions(records: readonly PlateRecord[]): void {
  const seen = new Map<string, number>();
  records.forEach((record, rowIndex) => {
    const key = JSON.stringify([record.plate ?? null, record.position]);
    const first = seen.get(key);
    if (first !== undefined) {
      throw new PlateLayoutError(
        'DUPLICATE_POSITION',
        'conversion',
        `Position ${cellToString(record.position)} appears twice` +
          (record.plate === undefined ? '' : ` on plate ${cellToString(record.plate)}`) +
          ` (rows ${first + 1} and ${rowIndex + 1})`,
        { position: record.position, plate: record.plate ?? null, rows: [first, rowIndex] },
      );
    }
    seen.set(key, rowIndex);
  });
}

/**
 * Split records by plate, keeping first-seen order. Single-plate data yields one group keyed null.
 */
export function groupByPlate(records: readonly PlateRecord[]): Map<CellValue, PlateRecord[]> {
  const groups = new Map<CellValue, PlateRecord[]>();
  for (const record of records) {
    const key = record.plate ?? null;
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/**
 * Turn a loosely structured table into (position, value[, plate]) records.
 * Atomic: any row that cannot be resolved or converted fails the whole call.
 */
export function normalizePlateData(
  table: RawTable,
  hints: NormalizeHints = {},
  candidates: ColumnCandidates = DEFAULT_COLUMN_CANDIDATES,
): PlateDataset {
  const plateSize = hints.plateSize ?? LAYOUT_DEFAULTS.PLATE_SIZE;
  const geometry = getPlateDimensions(plateSize);
  const targetFormat: PositionFormat = hints.targetFormat ?? LAYOUT_DEFAULTS.POSITION_FORMAT;

  const source = resolvePositionSource(table, hints, geometry, candidates);
  const value = resolveValueColumn(table, hints, source.consumed, candidates);
  const plateColumn = hints.plateColumn
    ? requireColumn(table, hints.plateColumn, 'Plate column', 'plate-column')
    : undefined;

  const resolution: ColumnResolution = {
    positionStrategy: source.strategy,
    valueStrategy: value.strategy,
    valueColumn: value.column,
  };
  if (source.positionColumn !== undefined) resolution.positionColumn = source.positionColumn;
  if (source.rowColumnPair !== undefined) resolution.rowColumnPair = source.rowColumnPair;
  if (plateColumn !== undefined) resolution.plateColumn = plateColumn;

  if (table.rows.length === 0) {
    return { plateSize, positionFormat: targetFormat, sourceFormat: null, records: [], resolution };
  }

  const sourceFormat = requireColumnFormat(source.values, source.label);

  const records = table.rows.map((row, rowIndex): PlateRecord => {
    const raw = source.values[rowIndex];
    if (raw === undefined || isMissingCell(raw)) {
      throw new PlateLayoutError(
        'INVALID_POSITION_FORMAT',
        'conversion',
        `Row ${rowIndex + 1} has no position in "${source.label}"`,
        { row: rowIndex, column: source.label },
      );
    }

    let position: PositionValue;
    try {
      position = formatPosition(parsePosition(raw, sourceFormat, geometry), targetFormat, geometry);
    } catch (error) {
      return rethrowWithRow(error, 'conversion', rowIndex, source.label);
    }

    const cell = row[value.column];
    const record: PlateRecord = { position, value: isMissingCell(cell) ? null : cell };
    if (plateColumn !== undefined) {
      const plate = row[plateColumn];
      record.plate = isMissingCell(plate) ? null : plate;
    }
    return record;
  });

  assertUniquePositions(records);

  return { plateSize, positionFormat: targetFormat, sourceFormat, records, resolution };
}

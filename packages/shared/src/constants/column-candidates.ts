/**
 * Conventional header names used by plate readers, LIMS exports and
 * hand-made sheets. Order is priority: the first match wins.
 * New instrument conventions go here, not into the inference code.
 */

/** Single combined position columns (exact header match) */
export const POSITION_COLUMN_CANDIDATES: readonly string[] = [
  'position',
  'well',
  'well_id',
  'well_position',
  'wellposition',
  'pos',
  'location',
  'well_loc',
  'wellloc',
];

/** Separate row/column field pairs, as [row, column] (exact header match) */
export const ROW_COLUMN_PAIR_CANDIDATES: ReadonlyArray<readonly [string, string]> = [
  ['row', 'col'],
  ['row', 'column'],
  ['plate_row', 'plate_column'],
  ['plate_row', 'plate_col'],
  ['row_id', 'column_id'],
  ['row_num', 'col_num'],
];

/** Value columns (case-insensitive header match) */
export const VALUE_COLUMN_CANDIDATES: readonly string[] = [
  'value',
  'values',
  'intensity',
  'signal',
  'measurement',
  'reading',
  'result',
  'response',
  'od',
  'concentration',
];

/** Numeric columns never picked as the value column */
export const POSITION_RELATED_COLUMNS: readonly string[] = [
  'row',
  'col',
  'column',
  'plate_row',
  'plate_column',
  'row_id',
  'column_id',
];

/** Replaceable candidate tables for one inference call */
export interface ColumnCandidates {
  positionColumns: readonly string[];
  rowColumnPairs: ReadonlyArray<readonly [string, string]>;
  valueColumns: readonly string[];
  positionRelated: readonly string[];
}

export const DEFAULT_COLUMN_CANDIDATES: ColumnCandidates = {
  positionColumns: POSITION_COLUMN_CANDIDATES,
  rowColumnPairs: ROW_COLUMN_PAIR_CANDIDATES,
  valueColumns: VALUE_COLUMN_CANDIDATES,
  positionRelated: POSITION_RELATED_COLUMNS,
};

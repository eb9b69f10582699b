import type { PlateSize, PositionFormat, PositionValue } from './plate-types';

/** Primitive cell value; null marks a missing cell */
export type CellValue = string | number | null;

/** Untyped table handed over by a file codec */
export interface RawTable {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

/** Separate row/column fields that together form a position */
export interface RowColumnPair {
  rowField: string;
  columnField: string;
  /**
   * Row field holds 1, 2, 3 (true) or A, B, C (false).
   * Inferred from the first row sample when left out.
   */
  rowIsNumeric?: boolean;
}

/** Optional hints steering column inference */
export interface NormalizeHints {
  positionColumn?: string;
  rowColumnPair?: RowColumnPair;
  valueColumn?: string;
  plateColumn?: string;
  targetFormat?: PositionFormat;
  plateSize?: PlateSize;
}

/** Single normalized well record */
export interface PlateRecord {
  position: PositionValue;
  value: CellValue;
  plate?: CellValue;
}

export const POSITION_STRATEGIES = [
  'row_column_pair_hint',
  'position_column_hint',
  'position_candidate',
  'row_column_pair_candidate',
] as const;
export type PositionStrategy = (typeof POSITION_STRATEGIES)[number];

export const VALUE_STRATEGIES = ['hint', 'candidate', 'first_numeric'] as const;
export type ValueStrategy = (typeof VALUE_STRATEGIES)[number];

/** How the engine found its columns */
export interface ColumnResolution {
  positionStrategy: PositionStrategy;
  /** Set when a single combined column was used */
  positionColumn?: string;
  /** Set when positions were synthesized from two fields */
  rowColumnPair?: Required<RowColumnPair>;
  valueStrategy: ValueStrategy;
  valueColumn: string;
  plateColumn?: string;
}

/** Output of column inference */
export interface PlateDataset {
  plateSize: PlateSize;
  positionFormat: PositionFormat;
  /** Notation detected on the input, before conversion */
  sourceFormat: PositionFormat | null;
  records: PlateRecord[];
  resolution: ColumnResolution;
}

/** Template enumeration of a plate */
export interface PlateMap {
  plateSize: PlateSize;
  positionFormat: PositionFormat;
  startPosition: string;
  includeAll: boolean;
  records: Array<{ position: PositionValue }>;
}

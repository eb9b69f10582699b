/** Supported plate sizes (number of wells) */
export const PLATE_SIZES = [6, 12, 24, 48, 96, 384, 1536] as const;
export type PlateSize = (typeof PLATE_SIZES)[number];

/** Well-position notations */
export const POSITION_FORMATS = ['letter_number', 'sequential', 'row_column'] as const;
export type PositionFormat = (typeof POSITION_FORMATS)[number];

/** Detection result: a notation, or nothing recognizable */
export type DetectedFormat = PositionFormat | 'unknown';

/** Plate shape derived from its well count */
export interface PlateGeometry {
  wells: PlateSize;
  rows: number;
  cols: number;
  /** Row labels A, B, ... truncated to `rows` entries */
  rowLabels: readonly string[];
}

/** 1-based logical address of a well */
export interface WellAddress {
  row: number;
  col: number;
}

/**
 * Serialized position: a number for `sequential`,
 * a string ("A1", "1_1") for the other notations.
 */
export type PositionValue = string | number;

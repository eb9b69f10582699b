import type { PlateSize } from '../types/plate-types';

/** Row/column counts per plate size */
export const PLATE_DIMENSIONS: Readonly<Record<PlateSize, { rows: number; cols: number }>> = {
  6: { rows: 2, cols: 3 },
  12: { rows: 3, cols: 4 },
  24: { rows: 4, cols: 6 },
  48: { rows: 6, cols: 8 },
  96: { rows: 8, cols: 12 },
  384: { rows: 16, cols: 24 },
  1536: { rows: 32, cols: 48 },
};

/**
 * Row-label sequence: A..Z, then AA..AF.
 * 1536-well plates have 32 rows, so single letters are not enough.
 */
export const ROW_LABEL_SEQUENCE: readonly string[] = Object.freeze([
  ...Array.from({ length: 26 }, (_, i) => String.fromCharCode(65 + i)),
  'AA', 'AB', 'AC', 'AD', 'AE', 'AF',
]);

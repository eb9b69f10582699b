import { PLATE_DIMENSIONS, ROW_LABEL_SEQUENCE } from '../constants/plate-geometry';
import { PlateLayoutError } from '../errors/plate-layout-error';
import { PLATE_SIZES } from '../types/plate-types';
import type { PlateGeometry, PlateSize } from '../types/plate-types';

/**
 * Check if a value is one of the supported plate sizes
 */
export function isPlateSize(value: unknown): value is PlateSize {
  return typeof value === 'number' && PLATE_SIZES.some((size) => size === value);
}

/**
 * Row labels for a plate with `rows` rows: 8 → A..H, 32 → A..Z, AA..AF
 */
export function buildRowLabels(rows: number): readonly string[] {
  if (!Number.isInteger(rows) || rows < 1 || rows > ROW_LABEL_SEQUENCE.length) {
    throw new PlateLayoutError(
      'INVALID_PLATE_SIZE',
      'geometry',
      `Cannot label ${rows} rows; at most ${ROW_LABEL_SEQUENCE.length} are supported`,
      { rows },
    );
  }
  return ROW_LABEL_SEQUENCE.slice(0, rows);
}

/**
 * Resolve a well count into its plate geometry: 96 → 8 rows × 12 cols
 */
export function getPlateDimensions(wells: unknown): PlateGeometry {
  if (!isPlateSize(wells)) {
    throw new PlateLayoutError(
      'INVALID_PLATE_SIZE',
      'geometry',
      `Selected plate size not available: ${String(wells)}. Valid options are: ${PLATE_SIZES.join(', ')}`,
      { plateSize: wells, validSizes: [...PLATE_SIZES] },
    );
  }
  const { rows, cols } = PLATE_DIMENSIONS[wells];
  return { wells, rows, cols, rowLabels: buildRowLabels(rows) };
}

/**
 * Every supported geometry, smallest plate first
 */
export function listPlateGeometries(): PlateGeometry[] {
  return PLATE_SIZES.map((size) => getPlateDimensions(size));
}

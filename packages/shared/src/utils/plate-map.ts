import { LAYOUT_DEFAULTS } from '../constants/limits';
import { isPlateLayoutError, PlateLayoutError } from '../errors/plate-layout-error';
import type { PlateGeometry, PlateSize, PositionFormat, WellAddress } from '../types/plate-types';
import type { PlateMap } from '../types/table-types';
import { getPlateDimensions } from './plate-geometry';
import { addressToIndex, formatPosition, parsePosition } from './position-codec';

export interface PlateMapOptions {
  plateSize: PlateSize;
  /** letter_number start well, e.g. "A12" for top-right */
  startPosition?: string;
  positionFormat?: PositionFormat;
  /** Wrap back to A1 after the last well (true) or keep only wells right of and below the start (false) */
  includeAll?: boolean;
}

/**
 * All wells in row-major order: A1, A2, ..., A12, B1, ...
 */
export function enumerateWells(geometry: PlateGeometry): WellAddress[] {
  const wells: WellAddress[] = [];
  for (let row = 1; row <= geometry.rows; row++) {
    for (let col = 1; col <= geometry.cols; col++) {
      wells.push({ row, col });
    }
  }
  return wells;
}

function parseStartPosition(startPosition: string, geometry: PlateGeometry): WellAddress {
  try {
    return parsePosition(startPosition, 'letter_number', geometry);
  } catch (error) {
    if (!isPlateLayoutError(error)) throw error;
    throw new PlateLayoutError(
      'INVALID_START_POSITION',
      'plate-map',
      `Invalid start position "${startPosition}". Must be in letter_number format and within a ${geometry.wells}-well plate. ` +
        error.message,
      { startPosition, plateSize: geometry.wells, cause: error.code },
    );
  }
}

/**
 * Generate a plate-map template.
 *
 * Iteration begins at `startPosition` and follows reading order. With
 * `includeAll` the sequence wraps from the last well back to A1 and ends just
 * before the start. Without it neither the column nor the row wraps: only the
 * rectangle from the start well to the bottom-right corner is kept, so "A12"
 * yields the last column. Order is part of the result (pipetting order, sample sheets).
 */
export function createPlateMap(options: PlateMapOptions): PlateMap {
  const geometry = getPlateDimensions(options.plateSize);
  const startPosition = options.startPosition ?? LAYOUT_DEFAULTS.START_POSITION;
  const positionFormat = options.positionFormat ?? LAYOUT_DEFAULTS.POSITION_FORMAT;
  const includeAll = options.includeAll ?? LAYOUT_DEFAULTS.INCLUDE_ALL;

  const wells = enumerateWells(geometry);
  const startAddress = parseStartPosition(startPosition, geometry);
  const start = addressToIndex(startAddress, geometry) - 1;

  const ordered = includeAll
    ? [...wells.slice(start), ...wells.slice(0, start)]
    : wells.filter(({ row, col }) => row >= startAddress.row && col >= startAddress.col);

  return {
    plateSize: geometry.wells,
    positionFormat,
    startPosition,
    includeAll,
    records: ordered.map((address) => ({ position: formatPosition(address, positionFormat, geometry) })),
  };
}

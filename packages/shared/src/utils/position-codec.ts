import { PlateLayoutError } from '../errors/plate-layout-error';
import type { PlateGeometry, PositionFormat, PositionValue, WellAddress } from '../types/plate-types';

const LETTER_NUMBER_PARTS = /^([A-Za-z]+)(\d+)$/;
const ROW_COLUMN_PARTS = /^(\d+)_(\d+)$/;
const DIGITS = /^\d+$/;

function invalidFormat(value: unknown, format: PositionFormat): PlateLayoutError {
  return new PlateLayoutError(
    'INVALID_POSITION_FORMAT',
    'conversion',
    `Position ${JSON.stringify(value)} is not a valid ${format} position`,
    { value, format },
  );
}

function outOfBounds(
  value: unknown,
  geometry: PlateGeometry,
  axis: 'row' | 'column' | 'index',
  limit: number,
): PlateLayoutError {
  return new PlateLayoutError(
    'POSITION_OUT_OF_BOUNDS',
    'conversion',
    `Position ${JSON.stringify(value)} is outside a ${geometry.wells}-well plate (${axis} must be 1..${limit})`,
    { value, axis, limit, plateSize: geometry.wells },
  );
}

function checkAddress(address: WellAddress, geometry: PlateGeometry, value: unknown): WellAddress {
  if (address.row < 1 || address.row > geometry.rows) {
    throw outOfBounds(value, geometry, 'row', geometry.rows);
  }
  if (address.col < 1 || address.col > geometry.cols) {
    throw outOfBounds(value, geometry, 'column', geometry.cols);
  }
  return address;
}

/**
 * Row label → 1-based row number on this plate: "A" → 1, "AF" → 32 (1536 only)
 */
export function resolveRowNumber(label: string, geometry: PlateGeometry): number {
  const idx = geometry.rowLabels.indexOf(label.trim().toUpperCase());
  if (idx < 0) {
    throw new PlateLayoutError(
      'UNKNOWN_ROW_LABEL',
      'conversion',
      `Row label "${label}" does not exist on a ${geometry.wells}-well plate ` +
        `(rows ${geometry.rowLabels[0] ?? ''}..${geometry.rowLabels[geometry.rowLabels.length - 1] ?? ''})`,
      { label, plateSize: geometry.wells, rowLabels: [...geometry.rowLabels] },
    );
  }
  return idx + 1;
}

/**
 * 1-based row number → row label: 1 → "A", 27 → "AA"
 */
export function resolveRowLabel(rowNum: number, geometry: PlateGeometry): string {
  if (!Number.isInteger(rowNum)) {
    throw new PlateLayoutError(
      'INVALID_POSITION_FORMAT',
      'conversion',
      `Row number ${JSON.stringify(rowNum)} is not an integer`,
      { row: rowNum },
    );
  }
  const label = geometry.rowLabels[rowNum - 1];
  if (label === undefined) {
    throw outOfBounds(rowNum, geometry, 'row', geometry.rows);
  }
  return label;
}

/**
 * Sequential index → address, row-major: index 13 on 8×12 → row 2, col 1
 */
export function indexToAddress(index: number, geometry: PlateGeometry): WellAddress {
  if (!Number.isInteger(index)) throw invalidFormat(index, 'sequential');
  if (index < 1 || index > geometry.wells) {
    throw outOfBounds(index, geometry, 'index', geometry.wells);
  }
  return {
    row: Math.ceil(index / geometry.cols),
    col: ((index - 1) % geometry.cols) + 1,
  };
}

/**
 * Address → sequential index: (row-1) * cols + col
 */
export function addressToIndex(address: WellAddress, geometry: PlateGeometry): number {
  checkAddress(address, geometry, address);
  return (address.row - 1) * geometry.cols + address.col;
}

/**
 * Parse a serialized position in a known notation into its address
 */
export function parsePosition(
  value: PositionValue,
  format: PositionFormat,
  geometry: PlateGeometry,
): WellAddress {
  switch (format) {
    case 'letter_number': {
      const match = typeof value === 'string' ? LETTER_NUMBER_PARTS.exec(value.trim()) : null;
      if (!match?.[1] || !match[2]) throw invalidFormat(value, format);
      const row = resolveRowNumber(match[1], geometry);
      return checkAddress({ row, col: parseInt(match[2], 10) }, geometry, value);
    }
    case 'sequential': {
      if (typeof value === 'number') return indexToAddress(value, geometry);
      const text = value.trim();
      if (!DIGITS.test(text)) throw invalidFormat(value, format);
      return indexToAddress(parseInt(text, 10), geometry);
    }
    case 'row_column': {
      const match = typeof value === 'string' ? ROW_COLUMN_PARTS.exec(value.trim()) : null;
      if (!match?.[1] || !match[2]) throw invalidFormat(value, format);
      return checkAddress(
        { row: parseInt(match[1], 10), col: parseInt(match[2], 10) },
        geometry,
        value,
      );
    }
  }
}

/**
 * Serialize an address in the requested notation
 */
export function formatPosition(
  address: WellAddress,
  format: PositionFormat,
  geometry: PlateGeometry,
): PositionValue {
  checkAddress(address, geometry, address);
  switch (format) {
    case 'letter_number':
      return `${resolveRowLabel(address.row, geometry)}${address.col}`;
    case 'sequential':
      return addressToIndex(address, geometry);
    case 'row_column':
      return `${address.row}_${address.col}`;
  }
}

/**
 * Convert one position between notations. Identity conversions return the
 * value untouched; everything else goes through the address.
 */
export function convertPosition(
  value: PositionValue,
  from: PositionFormat,
  to: PositionFormat,
  geometry: PlateGeometry,
): PositionValue {
  if (from === to) return value;
  return formatPosition(parsePosition(value, from, geometry), to, geometry);
}

/**
 * Split a position into separate row-letter and column-number fields,
 * as written by the exporter: "B3" → { plateRow: "B", plateColumn: 3 }
 */
export function splitPosition(
  value: PositionValue,
  format: PositionFormat,
  geometry: PlateGeometry,
): { plateRow: string; plateColumn: number } {
  const { row, col } = parsePosition(value, format, geometry);
  return { plateRow: resolveRowLabel(row, geometry), plateColumn: col };
}

import { describe, it, expect } from 'vitest';
import {
  addressToIndex,
  convertPosition,
  formatPosition,
  indexToAddress,
  parsePosition,
  resolveRowLabel,
  resolveRowNumber,
  splitPosition,
} from '../position-codec';
import { getPlateDimensions, listPlateGeometries } from '../plate-geometry';
import { POSITION_FORMATS } from '../../types/plate-types';
import type { PositionValue } from '../../types/plate-types';
import { enumerateWells } from '../plate-map';
import { captureLayoutError } from './capture-error';

const plate96 = getPlateDimensions(96);
const plate1536 = getPlateDimensions(1536);

describe('boundary wells on a 96-well plate', () => {
  it('maps A1 ↔ 1 ↔ 1_1', () => {
    expect(convertPosition('A1', 'letter_number', 'sequential', plate96)).toBe(1);
    expect(convertPosition('A1', 'letter_number', 'row_column', plate96)).toBe('1_1');
    expect(convertPosition(1, 'sequential', 'letter_number', plate96)).toBe('A1');
    expect(convertPosition('1_1', 'row_column', 'sequential', plate96)).toBe(1);
  });

  it('maps H12 ↔ 96 ↔ 8_12', () => {
    expect(convertPosition('H12', 'letter_number', 'sequential', plate96)).toBe(96);
    expect(convertPosition('H12', 'letter_number', 'row_column', plate96)).toBe('8_12');
    expect(convertPosition(96, 'sequential', 'row_column', plate96)).toBe('8_12');
    expect(convertPosition('8_12', 'row_column', 'letter_number', plate96)).toBe('H12');
  });

  it('wraps sequential indices onto the next row', () => {
    expect(convertPosition(12, 'sequential', 'letter_number', plate96)).toBe('A12');
    expect(convertPosition(13, 'sequential', 'letter_number', plate96)).toBe('B1');
    expect(convertPosition('13', 'sequential', 'row_column', plate96)).toBe('2_1');
  });
});

describe('1536-well plates', () => {
  it('uses two-letter rows past Z', () => {
    expect(convertPosition('AA1', 'letter_number', 'row_column', plate1536)).toBe('27_1');
    expect(convertPosition(1536, 'sequential', 'letter_number', plate1536)).toBe('AF48');
    expect(convertPosition('AB24', 'letter_number', 'sequential', plate1536)).toBe(27 * 48 + 24);
  });
});

describe('identity conversion', () => {
  it('returns the value unchanged', () => {
    expect(convertPosition('A1', 'letter_number', 'letter_number', plate96)).toBe('A1');
    expect(convertPosition(7, 'sequential', 'sequential', plate96)).toBe(7);
    expect(convertPosition('3_4', 'row_column', 'row_column', plate96)).toBe('3_4');
  });
});

describe('round trip', () => {
  it('reproduces every well of every plate for every pair of notations', () => {
    for (const geometry of listPlateGeometries()) {
      for (const address of enumerateWells(geometry)) {
        for (const a of POSITION_FORMATS) {
          const written: PositionValue = formatPosition(address, a, geometry);
          for (const b of POSITION_FORMATS) {
            const there = convertPosition(written, a, b, geometry);
            expect(convertPosition(there, b, a, geometry)).toBe(written);
          }
        }
      }
    }
  });
});

describe('bounds and malformed input', () => {
  it('rejects index 97 on a 96-well plate', () => {
    const err = captureLayoutError(() => convertPosition(97, 'sequential', 'letter_number', plate96));
    expect(err.code).toBe('POSITION_OUT_OF_BOUNDS');
    expect(err.details).toEqual({ value: 97, axis: 'index', limit: 96, plateSize: 96 });
  });

  it('rejects index 0 and columns past the edge', () => {
    expect(captureLayoutError(() => convertPosition(0, 'sequential', 'row_column', plate96)).code).toBe(
      'POSITION_OUT_OF_BOUNDS',
    );
    expect(captureLayoutError(() => convertPosition('A13', 'letter_number', 'sequential', plate96)).code).toBe(
      'POSITION_OUT_OF_BOUNDS',
    );
    expect(captureLayoutError(() => convertPosition('9_1', 'row_column', 'letter_number', plate96)).code).toBe(
      'POSITION_OUT_OF_BOUNDS',
    );
  });

  it('rejects row letters that are not on the plate', () => {
    const err = captureLayoutError(() => convertPosition('I1', 'letter_number', 'sequential', plate96));
    expect(err.code).toBe('UNKNOWN_ROW_LABEL');
    expect(err.details['label']).toBe('I');
  });

  it('rejects values that do not match the declared notation', () => {
    expect(captureLayoutError(() => convertPosition('1_1', 'letter_number', 'sequential', plate96)).code).toBe(
      'INVALID_POSITION_FORMAT',
    );
    expect(captureLayoutError(() => convertPosition(2.5, 'sequential', 'letter_number', plate96)).code).toBe(
      'INVALID_POSITION_FORMAT',
    );
    expect(captureLayoutError(() => convertPosition(5, 'row_column', 'letter_number', plate96)).code).toBe(
      'INVALID_POSITION_FORMAT',
    );
  });
});

describe('parsePosition', () => {
  it('accepts lower-case row letters and padded columns', () => {
    expect(parsePosition('b03', 'letter_number', plate96)).toEqual({ row: 2, col: 3 });
  });

  it('accepts digit strings for sequential positions', () => {
    expect(parsePosition(' 25 ', 'sequential', plate96)).toEqual({ row: 3, col: 1 });
  });
});

describe('row resolution', () => {
  it('resolves labels and numbers both ways', () => {
    expect(resolveRowNumber('h', plate96)).toBe(8);
    expect(resolveRowLabel(8, plate96)).toBe('H');
    expect(resolveRowLabel(32, plate1536)).toBe('AF');
  });

  it('rejects row 9 on a 96-well plate', () => {
    expect(captureLayoutError(() => resolveRowLabel(9, plate96)).code).toBe('POSITION_OUT_OF_BOUNDS');
  });
});

describe('index arithmetic', () => {
  it('is row-major', () => {
    expect(indexToAddress(25, plate96)).toEqual({ row: 3, col: 1 });
    expect(addressToIndex({ row: 3, col: 1 }, plate96)).toBe(25);
  });
});

describe('splitPosition', () => {
  it('splits each notation into row letter and column number', () => {
    expect(splitPosition('B3', 'letter_number', plate96)).toEqual({ plateRow: 'B', plateColumn: 3 });
    expect(splitPosition(15, 'sequential', plate96)).toEqual({ plateRow: 'B', plateColumn: 3 });
    expect(splitPosition('2_3', 'row_column', plate96)).toEqual({ plateRow: 'B', plateColumn: 3 });
  });
});

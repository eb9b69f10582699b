import { describe, it, expect } from 'vitest';
import {
  assertUniquePositions,
  groupByPlate,
  normalizePlateData,
  resolvePositionSource,
  resolveValueColumn,
} from '../column-inference';
import { getPlateDimensions } from '../plate-geometry';
import type { RawTable } from '../../types/table-types';
import { captureLayoutError } from './capture-error';

const plate96 = getPlateDimensions(96);

const splitLayout: RawTable = {
  columns: ['plate_row', 'plate_column', 'sample_type'],
  rows: [
    { plate_row: 'A', plate_column: 1, sample_type: 'blank' },
    { plate_row: 'A', plate_column: 2, sample_type: 'control' },
    { plate_row: 'B', plate_column: 1, sample_type: 'sample' },
    { plate_row: 'B', plate_column: 2, sample_type: 'sample' },
  ],
};

describe('normalizePlateData', () => {
  it('builds positions from separate row and column fields', () => {
    const result = normalizePlateData(splitLayout, {
      rowColumnPair: { rowField: 'plate_row', columnField: 'plate_column' },
      valueColumn: 'sample_type',
    });

    expect(result.records).toEqual([
      { position: 'A1', value: 'blank' },
      { position: 'A2', value: 'control' },
      { position: 'B1', value: 'sample' },
      { position: 'B2', value: 'sample' },
    ]);
    expect(result.plateSize).toBe(96);
    expect(result.positionFormat).toBe('letter_number');
    expect(result.sourceFormat).toBe('letter_number');
    expect(result.resolution).toEqual({
      positionStrategy: 'row_column_pair_hint',
      rowColumnPair: { rowField: 'plate_row', columnField: 'plate_column', rowIsNumeric: false },
      valueStrategy: 'hint',
      valueColumn: 'sample_type',
    });
  });

  it('finds the pair by candidate names when no hint is given', () => {
    const result = normalizePlateData({
      columns: ['plate_row', 'plate_column', 'Signal'],
      rows: [
        { plate_row: 'a', plate_column: '3', Signal: 0.4 },
        { plate_row: 'h', plate_column: 12, Signal: 0.9 },
      ],
    });

    expect(result.records.map((r) => r.position)).toEqual(['A3', 'H12']);
    expect(result.resolution.positionStrategy).toBe('row_column_pair_candidate');
    expect(result.resolution.valueStrategy).toBe('candidate');
    expect(result.resolution.valueColumn).toBe('Signal');
  });

  it('maps numeric row fields through the row labels', () => {
    const result = normalizePlateData(
      {
        columns: ['row', 'col', 'intensity'],
        rows: [
          { row: 1, col: 1, intensity: 10 },
          { row: 8, col: 12, intensity: 20 },
        ],
      },
      { targetFormat: 'sequential' },
    );

    expect(result.records).toEqual([
      { position: 1, value: 10 },
      { position: 96, value: 20 },
    ]);
    expect(result.resolution.rowColumnPair).toEqual({ rowField: 'row', columnField: 'col', rowIsNumeric: true });
  });

  it('converts a candidate position column to the target notation', () => {
    const result = normalizePlateData(
      {
        columns: ['well', 'od'],
        rows: [
          { well: 'A1', od: 0.1 },
          { well: 'B2', od: 0.2 },
        ],
      },
      { targetFormat: 'row_column' },
    );

    expect(result.records).toEqual([
      { position: '1_1', value: 0.1 },
      { position: '2_2', value: 0.2 },
    ]);
    expect(result.sourceFormat).toBe('letter_number');
    expect(result.positionFormat).toBe('row_column');
    expect(result.resolution.positionStrategy).toBe('position_candidate');
    expect(result.resolution.positionColumn).toBe('well');
  });

  it('canonicalizes positions even when notation does not change', () => {
    const result = normalizePlateData({
      columns: ['well', 'value'],
      rows: [{ well: 'c07', value: 1 }],
    });

    expect(result.records).toEqual([{ position: 'C7', value: 1 }]);
  });

  it('falls back to the first numeric column outside the plate column', () => {
    const result = normalizePlateData(
      {
        columns: ['position', 'plate', 'abs_450'],
        rows: [
          { position: '1_1', plate: 1, abs_450: 0.11 },
          { position: '1_1', plate: 2, abs_450: 0.22 },
        ],
      },
      { plateColumn: 'plate' },
    );

    expect(result.resolution.valueStrategy).toBe('first_numeric');
    expect(result.resolution.valueColumn).toBe('abs_450');
    expect(result.records).toEqual([
      { position: 'A1', value: 0.11, plate: 1 },
      { position: 'A1', value: 0.22, plate: 2 },
    ]);
  });

  it('reads 384-well plates', () => {
    const result = normalizePlateData(
      { columns: ['pos', 'value'], rows: [{ pos: 384, value: 5 }] },
      { plateSize: 384 },
    );

    expect(result.records).toEqual([{ position: 'P24', value: 5 }]);
  });

  it('keeps missing values as null', () => {
    const result = normalizePlateData({
      columns: ['well', 'value'],
      rows: [{ well: 'A1', value: '' }],
    });

    expect(result.records).toEqual([{ position: 'A1', value: null }]);
  });

  it('returns no records for an empty table', () => {
    const result = normalizePlateData({ columns: ['well', 'value'], rows: [] });

    expect(result.records).toEqual([]);
    expect(result.sourceFormat).toBeNull();
  });

  it('reports missing hinted columns with the available columns', () => {
    const err = captureLayoutError(() => normalizePlateData(splitLayout, { positionColumn: 'Well' }));

    expect(err.code).toBe('MISSING_COLUMN');
    expect(err.stage).toBe('position-column');
    expect(err.details['availableColumns']).toEqual(['plate_row', 'plate_column', 'sample_type']);
  });

  it('reports a missing plate column at the plate-column stage', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({ columns: ['well', 'value'], rows: [] }, { plateColumn: 'plate_id' }),
    );

    expect(err.code).toBe('MISSING_COLUMN');
    expect(err.stage).toBe('plate-column');
  });

  it('fails when no position column can be found', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({ columns: ['sample', 'value'], rows: [{ sample: 'x', value: 1 }] }),
    );

    expect(err.code).toBe('POSITION_COLUMN_NOT_FOUND');
    expect(err.stage).toBe('position-column');
    expect(err.message).toContain('Please specify positionColumn or rowColumnPair');
  });

  it('fails when no value column can be found', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({ columns: ['well', 'note'], rows: [{ well: 'A1', note: 'edge' }] }),
    );

    expect(err.code).toBe('VALUE_COLUMN_NOT_FOUND');
    expect(err.stage).toBe('value-column');
    expect(err.details['excludedColumns']).toContain('well');
  });

  it('fails on an unrecognized position notation', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({ columns: ['well', 'value'], rows: [{ well: 'well-1', value: 1 }] }),
    );

    expect(err.code).toBe('UNRECOGNIZED_POSITION_FORMAT');
    expect(err.stage).toBe('detection');
    expect(err.details).toEqual({ column: 'well', sample: 'well-1' });
  });

  it('fails the whole call on the first bad row, naming the row', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({
        columns: ['well', 'value'],
        rows: [
          { well: 'A1', value: 1 },
          { well: 'Z1', value: 2 },
        ],
      }),
    );

    expect(err.code).toBe('UNKNOWN_ROW_LABEL');
    expect(err.stage).toBe('conversion');
    expect(err.details['row']).toBe(1);
    expect(err.details['column']).toBe('well');
  });

  it('fails on rows written in a different notation than the first', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({
        columns: ['well', 'value'],
        rows: [
          { well: 'A1', value: 1 },
          { well: 5, value: 2 },
        ],
      }),
    );

    expect(err.code).toBe('INVALID_POSITION_FORMAT');
    expect(err.details['row']).toBe(1);
  });

  it('fails on a row without a position', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({
        columns: ['well', 'value'],
        rows: [
          { well: 'A1', value: 1 },
          { well: null, value: 2 },
        ],
      }),
    );

    expect(err.code).toBe('INVALID_POSITION_FORMAT');
    expect(err.details).toEqual({ row: 1, column: 'well' });
  });

  it('fails on a position repeated on the same plate', () => {
    const err = captureLayoutError(() =>
      normalizePlateData({
        columns: ['well', 'value'],
        rows: [
          { well: 'A1', value: 1 },
          { well: 'a01', value: 2 },
        ],
      }),
    );

    expect(err.code).toBe('DUPLICATE_POSITION');
    expect(err.details['rows']).toEqual([0, 1]);
  });
});

describe('resolvePositionSource', () => {
  it('prefers the pair hint over a position column', () => {
    const table: RawTable = {
      columns: ['well', 'r', 'c'],
      rows: [{ well: 'A1', r: 2, c: 3 }],
    };
    const source = resolvePositionSource(
      table,
      { positionColumn: 'well', rowColumnPair: { rowField: 'r', columnField: 'c', rowIsNumeric: true } },
      plate96,
    );

    expect(source.strategy).toBe('row_column_pair_hint');
    expect(source.values).toEqual(['B3']);
    expect(source.consumed).toEqual(['r', 'c']);
  });

  it('prefers the position column hint over candidates', () => {
    const table: RawTable = {
      columns: ['well', 'dest'],
      rows: [{ well: 'A1', dest: 'H12' }],
    };
    const source = resolvePositionSource(table, { positionColumn: 'dest' }, plate96);

    expect(source.strategy).toBe('position_column_hint');
    expect(source.values).toEqual(['H12']);
  });

  it('checks candidates in priority order', () => {
    const table: RawTable = {
      columns: ['well', 'position'],
      rows: [{ well: 'A1', position: 'B1' }],
    };

    expect(resolvePositionSource(table, {}, plate96).positionColumn).toBe('position');
  });

  it('matches candidate headers exactly', () => {
    const table: RawTable = { columns: ['Well'], rows: [{ Well: 'A1' }] };

    expect(captureLayoutError(() => resolvePositionSource(table, {}, plate96)).code).toBe(
      'POSITION_COLUMN_NOT_FOUND',
    );
  });

  it('rejects a row field that does not match rowIsNumeric', () => {
    const table: RawTable = { columns: ['r', 'c'], rows: [{ r: 'B', c: 1 }] };
    const err = captureLayoutError(() =>
      resolvePositionSource(table, { rowColumnPair: { rowField: 'r', columnField: 'c', rowIsNumeric: true } }, plate96),
    );

    expect(err.code).toBe('INVALID_POSITION_FORMAT');
    expect(err.stage).toBe('position-column');
    expect(err.details['row']).toBe(0);
  });

  it('rejects numeric rows past the plate edge', () => {
    const table: RawTable = { columns: ['r', 'c'], rows: [{ r: 9, c: 1 }] };
    const err = captureLayoutError(() =>
      resolvePositionSource(table, { rowColumnPair: { rowField: 'r', columnField: 'c' } }, plate96),
    );

    expect(err.code).toBe('POSITION_OUT_OF_BOUNDS');
    expect(err.stage).toBe('position-column');
  });
});

describe('resolveValueColumn', () => {
  const table: RawTable = {
    columns: ['well', 'row', 'Reading', 'count'],
    rows: [{ well: 'A1', row: 1, Reading: 'n/a', count: 4 }],
  };

  it('uses the hint first', () => {
    expect(resolveValueColumn(table, { valueColumn: 'count' }, ['well'])).toEqual({
      column: 'count',
      strategy: 'hint',
    });
  });

  it('matches candidate names case-insensitively', () => {
    expect(resolveValueColumn(table, {}, ['well'])).toEqual({ column: 'Reading', strategy: 'candidate' });
  });

  it('skips position-related columns when falling back to numeric columns', () => {
    const noCandidates: RawTable = {
      columns: ['well', 'row', 'count'],
      rows: [{ well: 'A1', row: 1, count: 4 }],
    };

    expect(resolveValueColumn(noCandidates, {}, ['well'])).toEqual({ column: 'count', strategy: 'first_numeric' });
  });
});

describe('assertUniquePositions', () => {
  it('allows the same position on different plates', () => {
    expect(() =>
      assertUniquePositions([
        { position: 'A1', value: 1, plate: 'p1' },
        { position: 'A1', value: 2, plate: 'p2' },
      ]),
    ).not.toThrow();
  });

  it('names both rows of a duplicate', () => {
    const err = captureLayoutError(() =>
      assertUniquePositions([
        { position: 'A1', value: 1 },
        { position: 'A2', value: 2 },
        { position: 'A1', value: 3 },
      ]),
    );

    expect(err.code).toBe('DUPLICATE_POSITION');
    expect(err.message).toBe('Position A1 appears twice (rows 1 and 3)');
    expect(err.details).toEqual({ position: 'A1', plate: null, rows: [0, 2] });
  });
});

describe('groupByPlate', () => {
  it('groups in first-seen order', () => {
    const groups = groupByPlate([
      { position: 'A1', value: 1, plate: 'p2' },
      { position: 'A1', value: 2, plate: 'p1' },
      { position: 'A2', value: 3, plate: 'p2' },
    ]);

    expect([...groups.keys()]).toEqual(['p2', 'p1']);
    expect(groups.get('p2')?.map((r) => r.value)).toEqual([1, 3]);
  });

  it('puts single-plate data under null', () => {
    const groups = groupByPlate([{ position: 'A1', value: 1 }]);

    expect([...groups.keys()]).toEqual([null]);
  });
});

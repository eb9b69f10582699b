import { describe, it, expect } from 'vitest';
import { exportBodySchema, importQuerySchema } from '../transfer-schema';

describe('importQuerySchema', () => {
  it('parses hints from query strings', () => {
    expect(
      importQuerySchema.parse({
        plateSize: '384',
        positionFormat: 'numeric',
        rowColumn: 'plate_row, plate_column',
        rowIsNumeric: 'false',
        valueColumn: 'OD600',
        sheet: '2',
      }),
    ).toEqual({
      plateSize: 384,
      positionFormat: 'sequential',
      rowColumn: ['plate_row', 'plate_column'],
      rowIsNumeric: false,
      valueColumn: 'OD600',
      sheet: 2,
    });
  });

  it('keeps sheet names as text', () => {
    expect(importQuerySchema.parse({ sheet: 'Run 1' }).sheet).toBe('Run 1');
  });

  it('rejects a rowColumn without exactly two fields', () => {
    expect(importQuerySchema.safeParse({ rowColumn: 'plate_row' }).success).toBe(false);
    expect(importQuerySchema.safeParse({ rowColumn: 'a,b,c' }).success).toBe(false);
  });

  it('rejects booleans other than true and false', () => {
    expect(importQuerySchema.safeParse({ rowIsNumeric: 'yes' }).success).toBe(false);
  });
});

describe('exportBodySchema', () => {
  it('fills defaults', () => {
    const body = exportBodySchema.parse({ table: { rows: [{ position: 'A1', value: 1 }] }, format: 'csv' });
    expect(body.positionColumn).toBe('position');
    expect(body.valueColumn).toBe('value');
    expect(body.splitPosition).toBe(false);
    expect(body.positionFormat).toBe('letter_number');
    expect(body.plateSize).toBeUndefined();
  });

  it('rejects unknown export formats', () => {
    expect(exportBodySchema.safeParse({ table: { rows: [] }, format: 'xls' }).success).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { exportBodySchema, PlateLayoutError } from '@wellgrid/shared';
import { TableWriterService } from '../table-writer.service';
import { validateEnv } from '../../../config/env.config';
import type { EnvConfig } from '../../../config/env.config';

function createWriter(env: Record<string, string> = {}): TableWriterService {
  return new TableWriterService(new ConfigService<EnvConfig, true>(validateEnv(env)));
}

describe('TableWriterService', () => {
  const writer = createWriter();

  it('writes CSV with quoting', async () => {
    const file = await writer.write(
      exportBodySchema.parse({
        table: {
          columns: ['position', 'value', 'note'],
          rows: [
            { position: 'A1', value: 0.5, note: 'a,b' },
            { position: 'B2', value: null, note: 'say "x"' },
          ],
        },
        format: 'csv',
      }),
    );

    expect(file.buffer.toString('utf-8')).toBe('position,value,note\nA1,0.5,"a,b"\nB2,,"say ""x"""\n');
    expect(file.fileName).toBe('plate-layout.csv');
    expect(file.contentType).toBe('text/csv; charset=utf-8');
  });

  it('writes TSV with split sequential positions', async () => {
    const file = await writer.write(
      exportBodySchema.parse({
        table: { rows: [{ position: 13, value: 2 }] },
        format: 'tsv',
        positionFormat: 'numeric',
        splitPosition: true,
        fileName: 'run 7.tsv',
      }),
    );

    expect(file.buffer.toString('utf-8')).toBe('position\tvalue\tplate_row\tplate_column\n13\t2\tB\t1\n');
    expect(file.fileName).toBe('run 7.tsv');
  });

  it('splits positions using the configured plate size', async () => {
    const small = createWriter({ DEFAULT_PLATE_SIZE: '24' });
    const table = await small.write(
      exportBodySchema.parse({
        table: { rows: [{ well: 24, od: 1 }, { well: null, od: 2 }] },
        format: 'csv',
        positionColumn: 'well',
        valueColumn: 'od',
        positionFormat: 'sequential',
        splitPosition: true,
      }),
    );

    expect(table.buffer.toString('utf-8')).toBe('well,od,plate_row,plate_column\n24,1,D,6\n,2,,\n');
  });

  it('requires the position and value columns', async () => {
    const body = exportBodySchema.parse({ table: { rows: [{ position: 'A1', od: 1 }] }, format: 'csv' });

    await expect(writer.write(body)).rejects.toBeInstanceOf(PlateLayoutError);
    await expect(writer.write(body)).rejects.toMatchObject({ code: 'MISSING_COLUMN', stage: 'value-column' });
  });

  it('names the row of a position that cannot be split', async () => {
    const body = exportBodySchema.parse({
      table: { rows: [{ position: 'Z1', value: 1 }] },
      format: 'csv',
      splitPosition: true,
    });

    await expect(writer.write(body)).rejects.toMatchObject({
      code: 'UNKNOWN_ROW_LABEL',
      stage: 'conversion',
      details: { label: 'Z', row: 0, column: 'position' },
    });
  });

  it('sanitizes the file name', async () => {
    const file = await writer.write(
      exportBodySchema.parse({
        table: { rows: [{ position: 'A1', value: 1 }] },
        format: 'xlsx',
        fileName: 'plate"1/é.xlsx',
      }),
    );

    expect(file.fileName).toBe('plate_1__.xlsx');
    expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
  });
});

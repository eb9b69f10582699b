import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import ExcelJS from 'exceljs';
import {
  cellToString,
  getPlateDimensions,
  isMissingCell,
  isPlateLayoutError,
  requireColumn,
  splitPosition,
} from '@wellgrid/shared';
import type { CellValue, ExportBodyInput, ExportFormat, PlateGeometry, PositionFormat, RawTable } from '@wellgrid/shared';
import type { EnvConfig } from '../../config/env.config';

export interface ExportedFile {
  buffer: Buffer;
  contentType: string;
  fileName: string;
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  tsv: 'text/tab-separated-values; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

const SPLIT_COLUMNS = ['plate_row', 'plate_column'] as const;

@Injectable()
export class TableWriterService {
  private readonly logger = new Logger(TableWriterService.name);

  constructor(private readonly config: ConfigService<EnvConfig, true>) {}

  /** Serialize a record table to CSV, TSV or XLSX */
  async write(input: ExportBodyInput): Promise<ExportedFile> {
    requireColumn(input.table, input.positionColumn, 'Position column', 'position-column');
    requireColumn(input.table, input.valueColumn, 'Value column', 'value-column');

    const geometry = getPlateDimensions(input.plateSize ?? this.config.get('DEFAULT_PLATE_SIZE', { infer: true }));
    const table = input.splitPosition
      ? this.withSplitPosition(input.table, input.positionColumn, input.positionFormat, geometry)
      : input.table;

    const buffer =
      input.format === 'xlsx'
        ? await this.toXlsx(table)
        : Buffer.from(this.toDelimited(table, input.format === 'tsv' ? '\t' : ','), 'utf-8');

    const fileName = this.buildFileName(input.fileName, input.format);
    this.logger.log(`Exported ${table.rows.length} rows to ${fileName} (${buffer.length} bytes)`);
    return { buffer, contentType: CONTENT_TYPES[input.format], fileName };
  }

  /** Append plate_row (letter) and plate_column (number) derived from each position */
  withSplitPosition(
    table: RawTable,
    positionColumn: string,
    format: PositionFormat,
    geometry: PlateGeometry,
  ): RawTable {
    const columns = [...table.columns.filter((c) => !SPLIT_COLUMNS.some((s) => s === c)), ...SPLIT_COLUMNS];
    const rows = table.rows.map((row, rowIndex) => {
      const position = row[positionColumn];
      if (isMissingCell(position)) return { ...row, plate_row: null, plate_column: null };
      try {
        const { plateRow, plateColumn } = splitPosition(position, format, geometry);
        return { ...row, plate_row: plateRow, plate_column: plateColumn };
      } catch (error) {
        if (isPlateLayoutError(error)) throw error.withStage('conversion', { row: rowIndex, column: positionColumn });
        throw error;
      }
    });
    return { columns, rows };
  }

  toDelimited(table: RawTable, delimiter: string): string {
    const line = (cells: readonly CellValue[]) => cells.map((c) => this.escapeField(cellToString(c), delimiter)).join(delimiter);
    const lines = [
      line(table.columns),
      ...table.rows.map((row) => line(table.columns.map((c) => row[c] ?? null))),
    ];
    return `${lines.join('\n')}\n`;
  }

  private escapeField(value: string, delimiter: string): string {
    if (value.includes(delimiter) || /["\r\n]/.test(value)) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  }

  /** Export to an XLSX buffer (no disk writes) */
  private async toXlsx(table: RawTable): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    const ws = workbook.addWorksheet('Plate layout');

    ws.addRow(table.columns);
    ws.getRow(1).font = { bold: true };
    ws.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
    for (const row of table.rows) {
      ws.addRow(table.columns.map((c) => row[c] ?? null));
    }
    table.columns.forEach((column, idx) => {
      ws.getColumn(idx + 1).width = Math.max(10, column.length + 2);
    });

    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  /** Strip characters that would break a Content-Disposition header, then add the extension */
  private buildFileName(requested: string | undefined, format: ExportFormat): string {
    const base = (requested ?? 'plate-layout')
      .replace(/\.(csv|tsv|xlsx)$/i, '')
      .replace(/[\r\n\t]/g, '')
      .replace(/["\\/]/g, '_')
      .replace(/[^\x20-\x7E]/g, '_');
    return `${base || 'plate-layout'}.${format}`;
  }
}

import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import * as path from 'path';
import { FILE_LIMITS, cellToString, inferTextCell, isMissingCell, toCellValue } from '@wellgrid/shared';
import type { CellValue, ImportExtension, RawTable } from '@wellgrid/shared';

const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const;

function isImportExtension(ext: string): ext is ImportExtension {
  return FILE_LIMITS.ALLOWED_EXTENSIONS.some((allowed) => allowed === ext);
}

/** Flatten an exceljs cell value (formula result, rich text, hyperlink) to a table cell */
function fromExcelValue(raw: ExcelJS.CellValue): CellValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw !== 'object' || raw instanceof Date) return toCellValue(raw);
  if ('result' in raw) return toCellValue(raw.result);
  if ('richText' in raw) return toCellValue(raw.richText.map((r) => r.text).join(''));
  if ('text' in raw) return toCellValue(raw.text);
  return null; // #N/A, #DIV/0! and other error cells
}

/** Blank headers become column_N; repeated ones get a _2, _3 suffix */
function uniqueHeaders(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((raw, idx) => {
    const name = raw.trim() || `column_${idx + 1}`;
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    return count === 1 ? name : `${name}_${count}`;
  });
}

@Injectable()
export class TableReaderService {
  private readonly logger = new Logger(TableReaderService.name);

  /**
   * Parse an uploaded file into a table. The extension picks the codec:
   * .csv (delimiter detected), .tsv/.txt (tab), .xlsx (exceljs).
   * `sheet` is a 1-based index or a sheet name; xlsx only, default first.
   */
  async read(buffer: Buffer, fileName: string, sheet?: number | string): Promise<RawTable> {
    const ext = path.extname(fileName).toLowerCase();
    if (!isImportExtension(ext)) {
      throw new BadRequestException({
        error: 'UNSUPPORTED_FILE_TYPE',
        message: `Unsupported file type "${ext || fileName}". Supported types are: ${FILE_LIMITS.ALLOWED_EXTENSIONS.join(', ')}`,
      });
    }

    if (ext === '.xlsx') return this.parseXlsxBuffer(buffer, sheet);

    const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
    const delimiter = ext === '.csv' ? this.detectDelimiter(text) : '\t';
    const table = this.parseDelimited(text, delimiter);
    this.logger.log(
      `Parsed ${fileName} (delimiter='${delimiter === '\t' ? 'TAB' : delimiter}'): ` +
        `${table.columns.length} columns, ${table.rows.length} rows`,
    );
    return table;
  }

  /** Parse delimited text; the first non-empty line is the header */
  parseDelimited(text: string, delimiter: string): RawTable {
    const [header, ...body] = this.parseCsvContent(text, delimiter);
    if (!header) return { columns: [], rows: [] };
    return this.toTable(header, body.map((row) => row.map(inferTextCell)));
  }

  /** Auto-detect CSV delimiter by counting occurrences in the first few lines */
  detectDelimiter(text: string): string {
    const sampleLines = text.split('\n').slice(0, 5).join('\n');
    let best = ',';
    let bestCount = 0;
    for (const d of DELIMITER_CANDIDATES) {
      const count = sampleLines.split(d).length - 1;
      if (count > bestCount) {
        bestCount = count;
        best = d;
      }
    }
    return best;
  }

  /** Split CSV text handling quoted fields, delimiters inside quotes, and newlines inside quotes */
  private parseCsvContent(text: string, delimiter: string): string[][] {
    const rows: string[][] = [];
    let current = '';
    let inQuotes = false;
    let row: string[] = [];

    for (let i = 0; i < text.length; i++) {
      const ch = text.charAt(i);
      if (inQuotes) {
        if (ch === '"') {
          if (text.charAt(i + 1) === '"') {
            current += '"';
            i++;
          } else {
            inQuotes = false;
          }
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuotes = true;
      } else if (ch === delimiter) {
        row.push(current.trim());
        current = '';
      } else if (ch === '\n' || (ch === '\r' && text.charAt(i + 1) === '\n')) {
        row.push(current.trim());
        current = '';
        if (row.some((v) => v !== '')) rows.push(row);
        row = [];
        if (ch === '\r') i++;
      } else {
        current += ch;
      }
    }
    row.push(current.trim());
    if (row.some((v) => v !== '')) rows.push(row);

    return rows;
  }

  private async parseXlsxBuffer(buffer: Buffer, sheet: number | string = 1): Promise<RawTable> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);

    const ws = typeof sheet === 'number' ? workbook.worksheets[sheet - 1] : workbook.getWorksheet(sheet);
    if (!ws) {
      throw new BadRequestException({
        error: 'SHEET_NOT_FOUND',
        message: `Sheet ${JSON.stringify(sheet)} not found. Available sheets: ${workbook.worksheets.map((w) => w.name).join(', ')}`,
      });
    }

    const grid: CellValue[][] = [];
    ws.eachRow({ includeEmpty: false }, (row) => {
      grid.push(Array.from({ length: row.cellCount }, (_, idx) => fromExcelValue(row.getCell(idx + 1).value)));
    });

    const [header, ...body] = grid;
    if (!header) return { columns: [], rows: [] };
    const table = this.toTable(header.map(cellToString), body);
    this.logger.log(`Parsed sheet "${ws.name}": ${table.columns.length} columns, ${table.rows.length} rows`);
    return table;
  }

  private toTable(header: readonly string[], body: CellValue[][]): RawTable {
    const rows = body.filter((cells) => cells.some((c) => !isMissingCell(c)));
    if (rows.length > FILE_LIMITS.MAX_TABLE_ROWS) {
      throw new BadRequestException({
        error: 'TABLE_TOO_LARGE',
        message: `File has ${rows.length} data rows; the limit is ${FILE_LIMITS.MAX_TABLE_ROWS}`,
      });
    }

    const columns = uniqueHeaders(header);
    return {
      columns,
      rows: rows.map((cells) => Object.fromEntries(columns.map((column, idx) => [column, cells[idx] ?? null]))),
    };
  }
}

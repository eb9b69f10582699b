import type { PlateSize, PositionFormat } from '../types/plate-types';

/** Defaults applied when a caller leaves an option out */
export const LAYOUT_DEFAULTS: {
  readonly PLATE_SIZE: PlateSize;
  readonly POSITION_FORMAT: PositionFormat;
  readonly START_POSITION: string;
  readonly INCLUDE_ALL: boolean;
} = {
  PLATE_SIZE: 96,
  POSITION_FORMAT: 'letter_number',
  START_POSITION: 'A1',
  INCLUDE_ALL: true,
};

/** Upload and file limits */
export const FILE_LIMITS = {
  ALLOWED_EXTENSIONS: ['.csv', '.tsv', '.txt', '.xlsx'] as const,
  EXPORT_FORMATS: ['csv', 'tsv', 'xlsx'] as const,
  MAX_TABLE_ROWS: 100_000,
} as const;

export type ImportExtension = (typeof FILE_LIMITS.ALLOWED_EXTENSIONS)[number];
export type ExportFormat = (typeof FILE_LIMITS.EXPORT_FORMATS)[number];

/** Aliases accepted for position format names */
export const POSITION_FORMAT_ALIASES: ReadonlyMap<string, PositionFormat> = new Map<string, PositionFormat>([
  ['letter_number', 'letter_number'],
  ['sequential', 'sequential'],
  ['number', 'sequential'],
  ['numeric', 'sequential'],
  ['row_column', 'row_column'],
  ['numeric_numeric', 'row_column'],
]);

import { POSITION_FORMAT_ALIASES } from '../constants/limits';
import { PlateLayoutError } from '../errors/plate-layout-error';
import { POSITION_FORMATS } from '../types/plate-types';
import type { DetectedFormat, PositionFormat } from '../types/plate-types';
import type { CellValue } from '../types/table-types';
import { isMissingCell } from './cell-utils';

const LETTER_NUMBER_PATTERN = /^[A-Za-z]+\d+$/;
const ROW_COLUMN_PATTERN = /^\d+_\d+$/;
const DIGITS_PATTERN = /^\d+$/;

/**
 * Classify a single position sample. Rules apply in order, first match wins:
 * letters+digits, digits_digits, then a number or a digit-only string.
 */
export function detectPositionFormat(sample: CellValue | undefined): DetectedFormat {
  if (sample === null || sample === undefined) return 'unknown';
  if (typeof sample === 'number') {
    return Number.isFinite(sample) ? 'sequential' : 'unknown';
  }

  const text = sample.trim();
  if (LETTER_NUMBER_PATTERN.test(text)) return 'letter_number';
  if (ROW_COLUMN_PATTERN.test(text)) return 'row_column';
  if (DIGITS_PATTERN.test(text)) return 'sequential';
  return 'unknown';
}

/**
 * Classify a column from its first non-missing value only.
 * The rest of the column is not checked here; mixed columns fail later,
 * when a row does not parse in the detected notation.
 */
export function detectColumnFormat(values: ReadonlyArray<CellValue | undefined>): DetectedFormat {
  const sample = values.find((v) => !isMissingCell(v));
  return detectPositionFormat(sample);
}

/**
 * Like detectColumnFormat, but fails instead of returning 'unknown'
 */
export function requireColumnFormat(
  values: ReadonlyArray<CellValue | undefined>,
  column: string,
): PositionFormat {
  const sample = values.find((v) => !isMissingCell(v));
  const format = detectPositionFormat(sample);
  if (format === 'unknown') {
    throw new PlateLayoutError(
      'UNRECOGNIZED_POSITION_FORMAT',
      'detection',
      `Could not recognize the position format of column "${column}" from sample ${JSON.stringify(sample ?? null)}. ` +
        'Expected letter_number (A1), row_column (1_1) or sequential (1).',
      { column, sample: sample ?? null },
    );
  }
  return format;
}

/**
 * Resolve a format name or alias: "numeric" → sequential, "numeric_numeric" → row_column
 */
export function resolvePositionFormat(name: string): PositionFormat {
  const format = POSITION_FORMAT_ALIASES.get(name.trim().toLowerCase());
  if (format === undefined) {
    throw new PlateLayoutError(
      'INVALID_POSITION_FORMAT',
      'conversion',
      `Invalid position format "${name}". Valid options are: ${[...POSITION_FORMAT_ALIASES.keys()].join(', ')}`,
      { format: name, validFormats: [...POSITION_FORMATS] },
    );
  }
  return format;
}

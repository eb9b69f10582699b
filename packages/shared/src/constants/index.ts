export { PLATE_DIMENSIONS, ROW_LABEL_SEQUENCE } from './plate-geometry';

export {
  POSITION_COLUMN_CANDIDATES,
  ROW_COLUMN_PAIR_CANDIDATES,
  VALUE_COLUMN_CANDIDATES,
  POSITION_RELATED_COLUMNS,
  DEFAULT_COLUMN_CANDIDATES,
  type ColumnCandidates,
} from './column-candidates';

export {
  LAYOUT_DEFAULTS,
  FILE_LIMITS,
  POSITION_FORMAT_ALIASES,
  type ImportExtension,
  type ExportFormat,
} from './limits';

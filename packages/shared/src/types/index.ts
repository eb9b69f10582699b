export type {
  PlateSize,
  PositionFormat,
  DetectedFormat,
  PlateGeometry,
  WellAddress,
  PositionValue,
} from './plate-types';
export { PLATE_SIZES, POSITION_FORMATS } from './plate-types';

export type {
  CellValue,
  RawTable,
  RowColumnPair,
  NormalizeHints,
  PlateRecord,
  PositionStrategy,
  ValueStrategy,
  ColumnResolution,
  PlateDataset,
  PlateMap,
} from './table-types';
export { POSITION_STRATEGIES, VALUE_STRATEGIES } from './table-types';

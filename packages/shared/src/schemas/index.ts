export {
  cellValueSchema,
  tableRowSchema,
  rawTableSchema,
  type CellValueInput,
  type TableRowInput,
  type RawTableInput,
} from './cell-schema';

export {
  plateSizeSchema,
  plateSizeParamSchema,
  positionFormatSchema,
  positionValueSchema,
  rowColumnPairSchema,
  normalizeHintsSchema,
  normalizeBodySchema,
  detectBodySchema,
  convertBodySchema,
  plateMapBodySchema,
  type NormalizeHintsInput,
  type NormalizeBodyInput,
  type DetectBodyInput,
  type ConvertBodyInput,
  type PlateMapBodyInput,
} from './layout-schema';

export {
  importQuerySchema,
  exportBodySchema,
  type ImportQueryInput,
  type ExportBodyInput,
} from './transfer-schema';

export {
  isMissingCell,
  toCellValue,
  inferTextCell,
  firstPresentCell,
  isNumericColumn,
  cellToString,
} from './cell-utils';

export { isPlateSize, buildRowLabels, getPlateDimensions, listPlateGeometries } from './plate-geometry';

export {
  detectPositionFormat,
  detectColumnFormat,
  requireColumnFormat,
  resolvePositionFormat,
} from './format-detector';

export {
  resolveRowNumber,
  resolveRowLabel,
  indexToAddress,
  addressToIndex,
  parsePosition,
  formatPosition,
  convertPosition,
  splitPosition,
} from './position-codec';

export {
  requireColumn,
  resolvePositionSource,
  resolveValueColumn,
  assertUniquePositions,
  groupByPlate,
  normalizePlateData,
  type PositionSource,
} from './column-inference';

export { enumerateWells, createPlateMap, type PlateMapOptions } from './plate-map';

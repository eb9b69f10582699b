import type { ImportQueryInput, NormalizeHints } from '@wellgrid/shared';

/** Map import query parameters onto column-inference hints */
export function toNormalizeHints(query: ImportQueryInput): NormalizeHints {
  const hints: NormalizeHints = {};
  if (query.plateSize !== undefined) hints.plateSize = query.plateSize;
  if (query.positionFormat !== undefined) hints.targetFormat = query.positionFormat;
  if (query.positionColumn !== undefined) hints.positionColumn = query.positionColumn;
  if (query.valueColumn !== undefined) hints.valueColumn = query.valueColumn;
  if (query.plateColumn !== undefined) hints.plateColumn = query.plateColumn;
  if (query.rowColumn !== undefined) {
    const [rowField, columnField] = query.rowColumn;
    hints.rowColumnPair =
      query.rowIsNumeric === undefined
        ? { rowField, columnField }
        : { rowField, columnField, rowIsNumeric: query.rowIsNumeric };
  }
  return hints;
}

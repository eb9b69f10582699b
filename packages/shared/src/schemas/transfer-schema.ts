import { z } from 'zod';
import { FILE_LIMITS, LAYOUT_DEFAULTS } from '../constants/limits';
import { rawTableSchema } from './cell-schema';
import { plateSizeParamSchema, plateSizeSchema, positionFormatSchema } from './layout-schema';

/** "plate_row,plate_column" → ["plate_row", "plate_column"] */
const fieldPairParamSchema = z.string().transform((value, ctx): [string, string] => {
  const parts = value.split(',').map((p) => p.trim()).filter(Boolean);
  const [rowField, columnField] = parts;
  if (parts.length !== 2 || rowField === undefined || columnField === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'rowColumn must name exactly two fields, e.g. "plate_row,plate_column"',
    });
    return z.NEVER;
  }
  return [rowField, columnField];
});

const booleanParamSchema = z.enum(['true', 'false']).transform((v) => v === 'true');

/** Sheet by 1-based index ("2") or by name ("Experiment 1") */
const sheetParamSchema = z.string().min(1).transform((v) => (/^\d+$/.test(v) ? parseInt(v, 10) : v));

/** Query parameters of a file import; mirror the normalize hints */
export const importQuerySchema = z.object({
  plateSize: plateSizeParamSchema.optional(),
  positionFormat: positionFormatSchema.optional(),
  positionColumn: z.string().min(1).optional(),
  rowColumn: fieldPairParamSchema.optional(),
  rowIsNumeric: booleanParamSchema.optional(),
  valueColumn: z.string().min(1).optional(),
  plateColumn: z.string().min(1).optional(),
  sheet: sheetParamSchema.optional(),
});

export const exportBodySchema = z.object({
  table: rawTableSchema,
  format: z.enum(FILE_LIMITS.EXPORT_FORMATS),
  positionColumn: z.string().min(1).default('position'),
  valueColumn: z.string().min(1).default('value'),
  /** Add plate_row / plate_column fields derived from the position */
  splitPosition: z.boolean().default(false),
  positionFormat: positionFormatSchema.default(LAYOUT_DEFAULTS.POSITION_FORMAT),
  plateSize: plateSizeSchema.optional(),
  fileName: z.string().min(1).max(100).optional(),
});

export type ImportQueryInput = z.infer<typeof importQuerySchema>;
export type ExportBodyInput = z.infer<typeof exportBodySchema>;

import { z } from 'zod';
import { FILE_LIMITS, LAYOUT_DEFAULTS } from '../constants/limits';
import { isPlateLayoutError } from '../errors/plate-layout-error';
import { PLATE_SIZES } from '../types/plate-types';
import type { PlateSize, PositionFormat } from '../types/plate-types';
import { resolvePositionFormat } from '../utils/format-detector';
import { isPlateSize } from '../utils/plate-geometry';
import { cellValueSchema, rawTableSchema } from './cell-schema';

const plateSizeMessage = `Plate size must be one of: ${PLATE_SIZES.join(', ')}`;

export const plateSizeSchema = z
  .number()
  .int()
  .refine((v): v is PlateSize => isPlateSize(v), { message: plateSizeMessage });

/** Plate size from a query string ("96") */
export const plateSizeParamSchema = z.coerce
  .number()
  .int()
  .refine((v): v is PlateSize => isPlateSize(v), { message: plateSizeMessage });

/** Format name or alias ("numeric", "numeric_numeric") → canonical format */
export const positionFormatSchema = z.string().transform((value, ctx): PositionFormat => {
  try {
    return resolvePositionFormat(value);
  } catch (error) {
    if (!isPlateLayoutError(error)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    return z.NEVER;
  }
});

export const positionValueSchema = z.union([z.string().min(1), z.number().finite()]);

export const rowColumnPairSchema = z.object({
  rowField: z.string().min(1),
  columnField: z.string().min(1),
  rowIsNumeric: z.boolean().optional(),
});

export const normalizeHintsSchema = z.object({
  positionColumn: z.string().min(1).optional(),
  rowColumnPair: rowColumnPairSchema.optional(),
  valueColumn: z.string().min(1).optional(),
  plateColumn: z.string().min(1).optional(),
  targetFormat: positionFormatSchema.optional(),
  plateSize: plateSizeSchema.optional(),
});

export const normalizeBodySchema = z.object({
  table: rawTableSchema,
  hints: normalizeHintsSchema.default({}),
});

export const detectBodySchema = z.object({
  sample: cellValueSchema,
});

export const convertBodySchema = z.object({
  positions: z.array(positionValueSchema).min(1).max(FILE_LIMITS.MAX_TABLE_ROWS),
  /** Detected from the first position when omitted */
  from: positionFormatSchema.optional(),
  to: positionFormatSchema,
  plateSize: plateSizeSchema.optional(),
});

export const plateMapBodySchema = z.object({
  plateSize: plateSizeSchema,
  startPosition: z.string().min(2).default(LAYOUT_DEFAULTS.START_POSITION),
  positionFormat: positionFormatSchema.default(LAYOUT_DEFAULTS.POSITION_FORMAT),
  includeAll: z.boolean().default(LAYOUT_DEFAULTS.INCLUDE_ALL),
});

export type NormalizeHintsInput = z.infer<typeof normalizeHintsSchema>;
export type NormalizeBodyInput = z.infer<typeof normalizeBodySchema>;
export type DetectBodyInput = z.infer<typeof detectBodySchema>;
export type ConvertBodyInput = z.infer<typeof convertBodySchema>;
export type PlateMapBodyInput = z.infer<typeof plateMapBodySchema>;

import { z } from 'zod';
import { FILE_LIMITS } from '../constants/limits';
import type { RawTable } from '../types/table-types';

export const cellValueSchema = z.union([z.string(), z.number().finite(), z.null()]);

export const tableRowSchema = z.record(cellValueSchema);

/**
 * Table as posted by a client. `columns` fixes header order; when omitted it
 * is the union of row keys in first-seen order.
 */
export const rawTableSchema = z
  .object({
    columns: z.array(z.string().min(1)).optional(),
    rows: z.array(tableRowSchema).max(FILE_LIMITS.MAX_TABLE_ROWS),
  })
  .transform((t): RawTable => {
    if (t.columns) return { columns: t.columns, rows: t.rows };
    const columns: string[] = [];
    const seen = new Set<string>();
    for (const row of t.rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }
    return { columns, rows: t.rows };
  });

export type CellValueInput = z.infer<typeof cellValueSchema>;
export type TableRowInput = z.infer<typeof tableRowSchema>;
export type RawTableInput = z.input<typeof rawTableSchema>;

import { z } from 'zod';

/**
 * Table definition as exceljs keeps it. Tables read from a file carry the full
 * `tableRef` ("A1:C9"); tables built in memory only have the anchor `ref` plus rows.
 */
export const excelTableModelSchema = z.object({
  name: z.string().min(1),
  ref: z.string().optional(),
  tableRef: z.string().optional(),
  headerRow: z.boolean().optional(),
  totalsRow: z.boolean().optional(),
  columns: z.array(z.object({ name: z.string() })).default([]),
  rows: z.array(z.array(z.unknown())).optional(),
});

/** exceljs Table instances hold their model on `table` */
export const excelTableEntrySchema = z.object({
  table: excelTableModelSchema,
});

export const definedNameSchema = z.object({
  name: z.string().min(1),
  ranges: z.array(z.string()),
});

export const definedNamesModelSchema = z.array(definedNameSchema);

export type ExcelTableModel = z.infer<typeof excelTableModelSchema>;
export type DefinedNameModel = z.infer<typeof definedNameSchema>;

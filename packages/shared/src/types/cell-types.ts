/** Primitive cell value types. `null` is an empty cell. */
export type CellValue = string | number | boolean | null;

/** Coercion targets for typed cell reads */
export const CELL_KINDS = ['string', 'number', 'integer', 'boolean'] as const;
export type CellKind = (typeof CELL_KINDS)[number];

/** Value type produced by each coercion kind */
export interface CellKindValue {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
}

/** Range reference (e.g., A1:Z100), 0-based inclusive bounds */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** A workbook-scoped area reference split into its sheet and bounds */
export interface QualifiedRange {
  sheetName: string;
  range: CellRange;
}

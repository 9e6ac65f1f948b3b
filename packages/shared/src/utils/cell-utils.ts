import type { CellRange, QualifiedRange } from '../types/cell-types';

/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Convert Excel column letter(s) to 0-based index: A→0, Z→25, AA→26
 */
export function letterToColIndex(letter: string): number {
  let result = 0;
  for (let i = 0; i < letter.length; i++) {
    result = result * 26 + (letter.charCodeAt(i) - 64);
  }
  return result - 1;
}

/**
 * Parse cell reference like "A1" or "$A$1" into { col: 0, row: 0 }
 */
export function parseCellRef(ref: string): { col: number; row: number } {
  const match = ref.match(/^\$?([A-Z]{1,3})\$?(\d{1,7})$/);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid cell reference: ${ref}`);
  }
  return {
    col: letterToColIndex(match[1]),
    row: parseInt(match[2], 10) - 1,
  };
}

/**
 * Build cell reference from col/row indices: (0, 0) → "A1"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row + 1}`;
}

/**
 * Parse "A1", "$B$2:$D$9" or "B2:D9" into a 0-based range. Returns null for
 * anything that is not a plain cell or area reference (whole columns, #REF!, ...).
 */
export function parseAreaRef(ref: string): CellRange | null {
  const match = ref.trim().match(/^\$?([A-Z]{1,3})\$?(\d{1,7})(?::\$?([A-Z]{1,3})\$?(\d{1,7}))?$/);
  if (!match?.[1] || !match[2]) return null;

  const startCol = letterToColIndex(match[1]);
  const startRow = parseInt(match[2], 10) - 1;
  const endCol = match[3] ? letterToColIndex(match[3]) : startCol;
  const endRow = match[4] ? parseInt(match[4], 10) - 1 : startRow;
  if (startRow < 0 || endRow < 0) return null;

  return {
    startRow: Math.min(startRow, endRow),
    startCol: Math.min(startCol, endCol),
    endRow: Math.max(startRow, endRow),
    endCol: Math.max(startCol, endCol),
  };
}

/**
 * Build an absolute area reference: { 0, 0, 2, 1 } → "$A$1:$B$3"
 */
export function buildAreaRef(range: CellRange): string {
  const start = `$${colIndexToLetter(range.startCol)}$${range.startRow + 1}`;
  if (range.startRow === range.endRow && range.startCol === range.endCol) return start;
  return `${start}:$${colIndexToLetter(range.endCol)}$${range.endRow + 1}`;
}

/**
 * Split a workbook-scoped address such as "'Price List'!$A$1:$B$4" into its
 * sheet name (surrounding quotes stripped) and range.
 */
export function parseQualifiedRef(address: string): QualifiedRange | null {
  const bang = address.lastIndexOf('!');
  if (bang <= 0) return null;

  let sheetName = address.slice(0, bang);
  if (sheetName.startsWith("'") && sheetName.endsWith("'") && sheetName.length >= 2) {
    sheetName = sheetName.slice(1, -1).replace(/''/g, "'");
  }

  const range = parseAreaRef(address.slice(bang + 1));
  if (!range || !sheetName) return null;
  return { sheetName, range };
}

/**
 * Inverse of parseQualifiedRef; quotes the sheet name when it is not a bare identifier
 */
export function buildQualifiedRef(sheetName: string, range: CellRange): string {
  const sheet = /^[A-Za-z_][A-Za-z0-9_.]*$/.test(sheetName)
    ? sheetName
    : `'${sheetName.replace(/'/g, "''")}'`;
  return `${sheet}!${buildAreaRef(range)}`;
}

/** Failure taxonomy for tabular reads/writes and recipe indexing */
export const DIAGNOSTIC_CODES = [
  'NOT_FOUND',
  'OUT_OF_RANGE',
  'INVALID_VALUE',
  'DUPLICATE_KEY',
  'STRUCTURAL_GROWTH_FAILURE',
  'UNSUPPORTED',
] as const;
export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export const DIAGNOSTIC_SEVERITIES = ['error', 'warning'] as const;
export type DiagnosticSeverity = (typeof DIAGNOSTIC_SEVERITIES)[number];

/** Where a diagnostic was raised: table/range name, data row, column name or offset */
export interface DiagnosticLocation {
  source?: string;
  row?: number;
  column?: string | number;
}

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  location?: DiagnosticLocation;
}

/**
 * Outcome of a typed read. `found` is false whenever `value` is a substituted
 * default, so a legitimate zero can be told apart from a failed read.
 */
export interface CellRead<T> {
  value: T;
  found: boolean;
  diagnostics: Diagnostic[];
}

import type { z } from 'zod';
import type {
  CellKind,
  CellKindValue,
  CellRead,
  CellValue,
  Diagnostic,
  DiagnosticLocation,
} from '@brewsheet/shared';
import { isBlank } from '@brewsheet/shared';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import type { SheetStore } from './cell-store';

/** Result of coercing one raw cell */
export interface Coerced<T> {
  ok: boolean;
  value: T;
}

/** Result of mapping a cell label onto an enum */
export interface EnumRead<E extends string> {
  found: boolean;
  value: E;
}

/** Member list of a label enum; the first member is the default */
export type EnumMembers = [string, ...string[]];

/** Enum labels are modelled as zod enums; `.describe()` supplies the type name */
export type LabelEnum<T extends EnumMembers> = z.ZodEnum<T>;

type Coercer<T> = (raw: CellValue) => Coerced<T>;

export const CELL_DEFAULTS: CellKindValue = {
  string: '',
  number: 0,
  integer: 0,
  boolean: false,
};

function parseNumber(raw: CellValue): Coerced<number> {
  if (typeof raw === 'number') return { ok: Number.isFinite(raw), value: Number.isFinite(raw) ? raw : 0 };
  if (typeof raw === 'boolean') return { ok: true, value: raw ? 1 : 0 };
  if (typeof raw === 'string' && raw.trim() !== '') {
    const num = Number(raw.trim());
    if (Number.isFinite(num)) return { ok: true, value: num };
  }
  return { ok: false, value: 0 };
}

const COERCERS: { [K in CellKind]: Coercer<CellKindValue[K]> } = {
  string: (raw) => (raw === null ? { ok: false, value: '' } : { ok: true, value: String(raw) }),
  number: parseNumber,
  integer: (raw) => {
    const parsed = parseNumber(raw);
    return { ok: parsed.ok, value: Math.round(parsed.value) };
  },
  boolean: (raw) => {
    if (typeof raw === 'boolean') return { ok: true, value: raw };
    if (typeof raw === 'number') return { ok: true, value: raw !== 0 };
    if (typeof raw === 'string') {
      const lower = raw.trim().toLowerCase();
      if (lower === 'true' || lower === '1') return { ok: true, value: true };
      if (lower === 'false' || lower === '0') return { ok: true, value: false };
    }
    return { ok: false, value: false };
  },
};

/** Coerce a raw cell; failures yield the kind's default with `ok: false` */
export function coerceCell<K extends CellKind>(raw: CellValue, kind: K): Coerced<CellKindValue[K]> {
  const coerce: Coercer<CellKindValue[K]> = COERCERS[kind];
  return coerce(raw);
}

export function formatLocation(location: DiagnosticLocation): string {
  const parts: string[] = [];
  if (location.source !== undefined) parts.push(`${location.source}`);
  if (location.row !== undefined) parts.push(`row ${location.row}`);
  if (location.column !== undefined) parts.push(`column ${location.column}`);
  return parts.join(', ');
}

/**
 * Match `text` against the enum's member names, case-sensitively. Blank text is
 * a silent miss; anything else that does not match produces one diagnostic.
 */
export function parseEnumLabel<T extends EnumMembers>(
  text: string,
  labels: LabelEnum<T>,
  location: DiagnosticLocation,
): CellRead<T[number]> {
  const fallback: T[number] = labels.options[0];
  if (isBlank(text)) {
    return { value: fallback, found: false, diagnostics: [] };
  }

  const parsed = labels.safeParse(text);
  if (parsed.success) {
    return { value: parsed.data, found: true, diagnostics: [] };
  }

  const typeName = labels.description ?? 'enum';
  const diagnostic: Diagnostic = createDiagnostic(
    'INVALID_VALUE',
    `Unknown ${typeName} value '${text}' in ${formatLocation(location)}.`,
    location,
  );
  return { value: fallback, found: false, diagnostics: [diagnostic] };
}

/** Typed get/set over absolute 1-based sheet coordinates */
export class TypedCellAccessor {
  constructor(private readonly sheet: SheetStore) {}

  get<K extends CellKind>(row: number, col: number, kind: K): Coerced<CellKindValue[K]> {
    return coerceCell(this.sheet.getCell(row, col), kind);
  }

  getEnumLabel<T extends EnumMembers>(
    row: number,
    col: number,
    labels: LabelEnum<T>,
    location: DiagnosticLocation,
  ): CellRead<T[number]> {
    return parseEnumLabel(this.get(row, col, 'string').value, labels, location);
  }

  set(row: number, col: number, value: CellValue): void {
    this.sheet.setCell(row, col, value);
  }
}

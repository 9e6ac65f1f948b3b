import type { CellRange, CellValue } from '@brewsheet/shared';
import { SHEET_LIMITS, buildCellRef, buildQualifiedRef, parseCellRef } from '@brewsheet/shared';
import { StructuralGrowthError } from '../../common/errors/structural-growth.error';

/** Raw cell access the tabular views are written against. Coordinates are 1-based. */
export interface SheetStore {
  readonly name: string;
  getCell(row: number, col: number): CellValue;
  setCell(row: number, col: number, value: CellValue): void;
  /** `owner` also grows when `at` is just past its last row */
  insertRows(at: number, count: number, owner?: SheetRegion): void;
  /** `owner` also grows when `at` is just past its last column */
  insertColumns(at: number, count: number, owner?: SheetRegion): void;
}

/** Live table definition. The owning sheet keeps it in step with structural edits. */
export interface TableRegion {
  readonly kind: 'table';
  readonly name: string;
  top: number;
  left: number;
  /** Physical rows, header and total row included */
  rowSpan: number;
  columnNames: string[];
  showHeader: boolean;
  showTotal: boolean;
}

/** Live named-range extent */
export interface RangeRegion {
  readonly kind: 'range';
  readonly name: string;
  top: number;
  left: number;
  rowSpan: number;
  columnSpan: number;
}

export type SheetRegion = TableRegion | RangeRegion;

export interface TableDefinition {
  name: string;
  top: number;
  left: number;
  rowSpan: number;
  columnNames: string[];
  showHeader?: boolean;
  showTotal?: boolean;
}

export interface DefinedName {
  name: string;
  address: string;
}

export function regionColumnSpan(region: SheetRegion): number {
  return region.kind === 'table' ? region.columnNames.length : region.columnSpan;
}

/** 0-based inclusive bounds of a region, for address building */
export function regionBounds(region: SheetRegion): CellRange {
  return {
    startRow: region.top - 1,
    startCol: region.left - 1,
    endRow: region.top + Math.max(region.rowSpan, 1) - 2,
    endCol: region.left + Math.max(regionColumnSpan(region), 1) - 2,
  };
}

function assertPosition(row: number, col: number): void {
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 1 || col < 1) {
    throw new RangeError(`Invalid cell position (${row}, ${col})`);
  }
}

/**
 * In-memory sheet grid keyed by A1 references. Structural edits shift cells and
 * re-anchor every table and named range on the sheet: regions at or past the
 * insertion point move, a region spanning it grows. The region that asked for
 * the edit also grows when the insertion point sits right after its last line.
 */
export class MemorySheet implements SheetStore {
  private cells = new Map<string, CellValue>();
  private readonly tableRegions: TableRegion[] = [];
  private readonly rangeRegions: RangeRegion[] = [];

  constructor(readonly name: string) {}

  getCell(row: number, col: number): CellValue {
    assertPosition(row, col);
    return this.cells.get(buildCellRef(col - 1, row - 1)) ?? null;
  }

  setCell(row: number, col: number, value: CellValue): void {
    assertPosition(row, col);
    const ref = buildCellRef(col - 1, row - 1);
    if (value === null) {
      this.cells.delete(ref);
    } else {
      this.cells.set(ref, value);
    }
  }

  get tables(): readonly TableRegion[] {
    return this.tableRegions;
  }

  get ranges(): readonly RangeRegion[] {
    return this.rangeRegions;
  }

  /** Register a table; header labels are written into the grid when it has a header row */
  addTable(definition: TableDefinition): TableRegion {
    const region: TableRegion = {
      kind: 'table',
      name: definition.name,
      top: definition.top,
      left: definition.left,
      rowSpan: definition.rowSpan,
      columnNames: [...definition.columnNames],
      showHeader: definition.showHeader ?? true,
      showTotal: definition.showTotal ?? false,
    };
    if (region.showHeader) {
      region.columnNames.forEach((label, i) => this.setCell(region.top, region.left + i, label));
    }
    this.tableRegions.push(region);
    return region;
  }

  /** Start tracking a named range so structural edits keep it anchored */
  trackRange(name: string, bounds: CellRange): RangeRegion {
    const region: RangeRegion = {
      kind: 'range',
      name,
      top: bounds.startRow + 1,
      left: bounds.startCol + 1,
      rowSpan: bounds.endRow - bounds.startRow + 1,
      columnSpan: bounds.endCol - bounds.startCol + 1,
    };
    this.rangeRegions.push(region);
    return region;
  }

  /** Occupied extent: the furthest cell or region edge, 0 when empty */
  get extent(): { rows: number; cols: number } {
    let rows = 0;
    let cols = 0;
    for (const ref of this.cells.keys()) {
      const { col, row } = parseCellRef(ref);
      rows = Math.max(rows, row + 1);
      cols = Math.max(cols, col + 1);
    }
    for (const region of this.regions()) {
      rows = Math.max(rows, region.top + region.rowSpan - 1);
      cols = Math.max(cols, region.left + regionColumnSpan(region) - 1);
    }
    return { rows, cols };
  }

  /** Non-empty cells as 1-based [row, col, value] triples */
  *entries(): IterableIterator<[number, number, CellValue]> {
    for (const [ref, value] of this.cells) {
      const { col, row } = parseCellRef(ref);
      yield [row + 1, col + 1, value];
    }
  }

  insertRows(at: number, count: number, owner?: SheetRegion): void {
    if (count <= 0) return;
    assertPosition(at, 1);
    if (this.extent.rows + count > SHEET_LIMITS.MAX_ROWS) {
      throw new StructuralGrowthError(this.name, 'rows', count, SHEET_LIMITS.MAX_ROWS);
    }

    const shifted = new Map<string, CellValue>();
    for (const [ref, value] of this.cells) {
      const { col, row } = parseCellRef(ref);
      shifted.set(row + 1 >= at ? buildCellRef(col, row + count) : ref, value);
    }
    this.cells = shifted;

    for (const region of this.regions()) {
      const end = region.top + region.rowSpan;
      if (region.top >= at) {
        region.top += count;
      } else if (at < end || (at === end && region === owner)) {
        region.rowSpan += count;
      }
    }
  }

  insertColumns(at: number, count: number, owner?: SheetRegion): void {
    if (count <= 0) return;
    assertPosition(1, at);
    if (this.extent.cols + count > SHEET_LIMITS.MAX_COLS) {
      throw new StructuralGrowthError(this.name, 'columns', count, SHEET_LIMITS.MAX_COLS);
    }

    const shifted = new Map<string, CellValue>();
    for (const [ref, value] of this.cells) {
      const { col, row } = parseCellRef(ref);
      shifted.set(col + 1 >= at ? buildCellRef(col + count, row) : ref, value);
    }
    this.cells = shifted;

    for (const region of this.regions()) {
      const end = region.left + regionColumnSpan(region);
      if (region.left >= at) {
        region.left += count;
      } else if (at < end || (at === end && region === owner)) {
        if (region.kind === 'table') {
          this.growTableColumns(region, at - region.left, count);
        } else {
          region.columnSpan += count;
        }
      }
    }
  }

  /** New table columns get generated "ColumnN" names, as spreadsheet apps do */
  private growTableColumns(region: TableRegion, position: number, count: number): void {
    const added: string[] = [];
    let n = region.columnNames.length + 1;
    while (added.length < count) {
      const candidate = `Column${n++}`;
      if (!region.columnNames.includes(candidate)) added.push(candidate);
    }
    region.columnNames.splice(position, 0, ...added);
    if (region.showHeader) {
      added.forEach((label, i) => this.setCell(region.top, region.left + position + i, label));
    }
  }

  private regions(): SheetRegion[] {
    return [...this.tableRegions, ...this.rangeRegions];
  }
}

interface DefinedNameEntry extends DefinedName {
  binding?: { sheet: MemorySheet; region: RangeRegion };
}

/** Sheets plus workbook-scoped defined names, as decoded from a workbook file */
export class MemoryWorkbook {
  private readonly sheetList: MemorySheet[] = [];
  private readonly names: DefinedNameEntry[] = [];

  get sheets(): readonly MemorySheet[] {
    return this.sheetList;
  }

  addSheet(name: string): MemorySheet {
    if (this.getSheet(name)) {
      throw new Error(`Sheet '${name}' already exists`);
    }
    const sheet = new MemorySheet(name);
    this.sheetList.push(sheet);
    return sheet;
  }

  getSheet(name: string): MemorySheet | undefined {
    return this.sheetList.find((s) => s.name === name);
  }

  defineName(name: string, address: string): void {
    this.names.push({ name, address });
  }

  /** Defined names in declaration order; bound ranges report their current extent */
  get definedNames(): DefinedName[] {
    return this.names.map((entry) => ({
      name: entry.name,
      address: entry.binding
        ? buildQualifiedRef(entry.binding.sheet.name, regionBounds(entry.binding.region))
        : entry.address,
    }));
  }

  /**
   * Bind the defined name at `position` to a tracked region on `sheet`.
   * Binding the same entry again returns the region already tracked.
   */
  bindDefinedName(position: number, sheet: MemorySheet, bounds: CellRange): RangeRegion {
    const entry = this.names[position];
    if (!entry) {
      throw new RangeError(`No defined name at position ${position}`);
    }
    if (!entry.binding) {
      entry.binding = { sheet, region: sheet.trackRange(entry.name, bounds) };
    }
    return entry.binding.region;
  }
}

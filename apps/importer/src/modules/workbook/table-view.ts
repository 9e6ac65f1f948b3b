import type { CellKind, CellKindValue, CellRead, CellValue, Diagnostic } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import { StructuralGrowthError } from '../../common/errors/structural-growth.error';
import type { SheetStore, TableRegion } from './cell-store';
import { ColumnIndex } from './column-index';
import type { EnumMembers, EnumRead, LabelEnum } from './typed-cell-accessor';
import { CELL_DEFAULTS, TypedCellAccessor, parseEnumLabel } from './typed-cell-accessor';

/**
 * Name-addressed view over one table. Rows are 1-based data rows: row 1 is the
 * first row under the header, and a totals row is never addressable.
 *
 * Extent and anchor are read from the live region on every call, so growth
 * made through this view (or any other on the same sheet) shows up at once.
 * Lookups that fail report to the sink and fall back to a default; nothing
 * here throws for a malformed sheet.
 */
export class TableView {
  private readonly columns: ColumnIndex;
  private readonly cells: TypedCellAccessor;

  constructor(
    private readonly sheet: SheetStore,
    private readonly region: TableRegion,
    private readonly sink: DiagnosticSink,
  ) {
    this.columns = new ColumnIndex(region.columnNames);
    this.cells = new TypedCellAccessor(sheet);
  }

  get name(): string {
    return this.region.name;
  }

  get sheetName(): string {
    return this.sheet.name;
  }

  /** Data rows, header and totals excluded */
  get rowCount(): number {
    const { rowSpan, showHeader, showTotal } = this.region;
    return Math.max(0, rowSpan - (showHeader ? 1 : 0) - (showTotal ? 1 : 0));
  }

  get columnCount(): number {
    return this.columns.size;
  }

  get columnNames(): readonly string[] {
    return this.columns.names;
  }

  hasColumn(name: string): boolean {
    return this.columns.resolve(name) !== undefined;
  }

  /** Zero-based position of a column, without reporting a miss */
  resolveColumn(name: string): number | undefined {
    return this.columns.resolve(name);
  }

  /** Typed read that leaves reporting to the caller */
  readValue<K extends CellKind>(row: number, column: string, kind: K): CellRead<CellKindValue[K]> {
    const fallback = CELL_DEFAULTS[kind];
    if (row < 1 || row > this.rowCount) {
      return {
        value: fallback,
        found: false,
        diagnostics: [
          createDiagnostic(
            'OUT_OF_RANGE',
            `Tried to access row ${row} of table '${this.name}'. Valid rows are 1 - ${this.rowCount}.`,
            { source: this.name, row, column },
          ),
        ],
      };
    }

    const position = this.columns.resolve(column);
    if (position === undefined) {
      return { value: fallback, found: false, diagnostics: [this.columnMiss(column, row)] };
    }

    const read = this.cells.get(this.firstDataRow + row - 1, this.region.left + position, kind);
    return { value: read.value, found: read.ok, diagnostics: [] };
  }

  getValue<K extends CellKind>(row: number, column: string, kind: K): CellKindValue[K] {
    return this.emit(this.readValue(row, column, kind)).value;
  }

  /** Map a label cell onto an enum. Blank cells miss without a diagnostic. */
  getEnum<T extends EnumMembers>(row: number, column: string, labels: LabelEnum<T>): EnumRead<T[number]> {
    const text = this.readValue(row, column, 'string');
    if (text.diagnostics.length > 0) {
      this.emit(text);
      return { found: false, value: labels.options[0] };
    }

    const read = this.emit(parseEnumLabel(text.value, labels, { source: this.name, row, column }));
    return { found: read.found, value: read.value };
  }

  /** One column top to bottom, or undefined when the column is missing */
  getColumnValues<K extends CellKind>(column: string, kind: K): CellKindValue[K][] | undefined {
    const position = this.locate(column);
    if (position === undefined) return undefined;

    const values: CellKindValue[K][] = [];
    for (let row = 0; row < this.rowCount; row++) {
      values.push(this.cells.get(this.firstDataRow + row, this.region.left + position, kind).value);
    }
    return values;
  }

  /**
   * `width` consecutive columns starting at `startColumn`. Only the first column
   * is looked up by name; the rest are taken by position.
   */
  getColumnBlock<K extends CellKind>(
    startColumn: string,
    width: number,
    kind: K,
  ): CellKindValue[K][][] | undefined {
    const position = this.locate(startColumn);
    if (position === undefined) return undefined;

    const block: CellKindValue[K][][] = [];
    for (let row = 0; row < this.rowCount; row++) {
      const line: CellKindValue[K][] = [];
      for (let offset = 0; offset < width; offset++) {
        line.push(
          this.cells.get(this.firstDataRow + row, this.region.left + position + offset, kind).value,
        );
      }
      block.push(line);
    }
    return block;
  }

  /**
   * Overwrite consecutive columns from data row 1, growing the table when the
   * block has more rows. The start column is resolved before any growth, so a
   * bad name leaves the sheet untouched.
   */
  setColumnBlock(startColumn: string, values: readonly (readonly CellValue[])[]): boolean {
    const position = this.locate(startColumn);
    if (position === undefined) return false;
    if (!this.growTo(values.length)) return false;

    values.forEach((line, row) => {
      line.forEach((value, offset) => {
        this.cells.set(this.firstDataRow + row, this.region.left + position + offset, value);
      });
    });
    return true;
  }

  /**
   * Overwrite one column from data row 1, growing the table when needed. With
   * `appendIfAbsent` a missing column is added after the last one instead of
   * being reported.
   */
  setColumn(column: string, values: readonly CellValue[], appendIfAbsent = false): boolean {
    let position = this.columns.resolve(column);
    if (position === undefined) {
      if (!appendIfAbsent) {
        this.sink.report(this.columnMiss(column));
        return false;
      }
      const appended = this.appendColumn(column);
      if (appended === undefined) return false;
      position = appended;
    }

    if (!this.growTo(values.length)) return false;

    const col = this.region.left + position;
    values.forEach((value, row) => this.cells.set(this.firstDataRow + row, col, value));
    return true;
  }

  /** Fill a column with 1..rowCount */
  numberRows(column: string): boolean {
    const position = this.locate(column);
    if (position === undefined) return false;

    for (let row = 1; row <= this.rowCount; row++) {
      this.cells.set(this.firstDataRow + row - 1, this.region.left + position, row);
    }
    return true;
  }

  /**
   * Insert a physical column after the last table column, label it, and register
   * it. Callers check that the name is absent first.
   */
  private appendColumn(name: string): number | undefined {
    const at = this.region.left + this.columns.size;
    if (!this.tryGrow(() => this.sheet.insertColumns(at, 1, this.region), { column: name })) {
      return undefined;
    }

    const position = this.columns.register(name.trim());
    this.region.columnNames[position] = name.trim();
    if (this.region.showHeader) {
      this.cells.set(this.region.top, at, name.trim());
    }
    return position;
  }

  /** Insert rows right after the header until the table holds `rows` data rows */
  private growTo(rows: number): boolean {
    const missing = rows - this.rowCount;
    if (missing <= 0) return true;
    const at = this.region.top + 1;
    return this.tryGrow(() => this.sheet.insertRows(at, missing, this.region), {});
  }

  private tryGrow(edit: () => void, at: { column?: string }): boolean {
    try {
      edit();
      return true;
    } catch (err: unknown) {
      if (!(err instanceof StructuralGrowthError)) throw err;
      this.sink.report(
        createDiagnostic('STRUCTURAL_GROWTH_FAILURE', `${err.message} (table '${this.name}')`, {
          source: this.name,
          ...at,
        }),
      );
      return false;
    }
  }

  private get firstDataRow(): number {
    return this.region.top + (this.region.showHeader ? 1 : 0);
  }

  private locate(column: string): number | undefined {
    const position = this.columns.resolve(column);
    if (position === undefined) {
      this.sink.report(this.columnMiss(column));
    }
    return position;
  }

  private columnMiss(column: string, row?: number): Diagnostic {
    return createDiagnostic(
      'NOT_FOUND',
      this.columns.describeMiss(column, this.name),
      row === undefined ? { source: this.name, column } : { source: this.name, row, column },
    );
  }

  private emit<T>(read: CellRead<T>): CellRead<T> {
    for (const diagnostic of read.diagnostics) {
      this.sink.report(diagnostic);
    }
    return read;
  }
}

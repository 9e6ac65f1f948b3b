import type { CellKind, CellKindValue, CellRead, CellValue, Diagnostic } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import { StructuralGrowthError } from '../../common/errors/structural-growth.error';
import type { RangeRegion, SheetStore } from './cell-store';
import type { EnumMembers, EnumRead, LabelEnum } from './typed-cell-accessor';
import { CELL_DEFAULTS, TypedCellAccessor } from './typed-cell-accessor';

/**
 * Positional view over a named range: (1, 1) is the anchor cell. Growth inserts
 * rows after the anchor row and columns after the anchor column.
 */
export class RangeView {
  private readonly cells: TypedCellAccessor;

  constructor(
    private readonly sheet: SheetStore,
    private readonly region: RangeRegion,
    private readonly sink: DiagnosticSink,
  ) {
    this.cells = new TypedCellAccessor(sheet);
  }

  get name(): string {
    return this.region.name;
  }

  get sheetName(): string {
    return this.sheet.name;
  }

  get rowCount(): number {
    return this.region.rowSpan;
  }

  get columnCount(): number {
    return this.region.columnSpan;
  }

  readValue<K extends CellKind>(kind: K, row = 1, column = 1): CellRead<CellKindValue[K]> {
    const miss = this.checkBounds(row, column);
    if (miss) {
      return { value: CELL_DEFAULTS[kind], found: false, diagnostics: [miss] };
    }
    const read = this.cells.get(this.region.top + row - 1, this.region.left + column - 1, kind);
    return { value: read.value, found: read.ok, diagnostics: [] };
  }

  getValue<K extends CellKind>(kind: K, row = 1, column = 1): CellKindValue[K] {
    return this.emit(this.readValue(kind, row, column)).value;
  }

  getEnum<T extends EnumMembers>(labels: LabelEnum<T>, row = 1, column = 1): EnumRead<T[number]> {
    const miss = this.checkBounds(row, column);
    if (miss) {
      this.sink.report(miss);
      return { found: false, value: labels.options[0] };
    }
    const read = this.emit(
      this.cells.getEnumLabel(this.region.top + row - 1, this.region.left + column - 1, labels, {
        source: this.name,
        row,
        column,
      }),
    );
    return { found: read.found, value: read.value };
  }

  setValue(value: CellValue, row = 1, column = 1): boolean {
    const miss = this.checkBounds(row, column);
    if (miss) {
      this.sink.report(miss);
      return false;
    }
    this.cells.set(this.region.top + row - 1, this.region.left + column - 1, value);
    return true;
  }

  /** The whole range as [rowCount][columnCount] */
  getValues<K extends CellKind>(kind: K): CellKindValue[K][][] {
    const grid: CellKindValue[K][][] = [];
    for (let row = 0; row < this.rowCount; row++) {
      const line: CellKindValue[K][] = [];
      for (let col = 0; col < this.columnCount; col++) {
        line.push(this.cells.get(this.region.top + row, this.region.left + col, kind).value);
      }
      grid.push(line);
    }
    return grid;
  }

  /** Overwrite from the anchor, growing the range first when the grid is larger */
  setValues(values: readonly (readonly CellValue[])[]): boolean {
    const width = values.reduce((max, line) => Math.max(max, line.length), 0);
    if (!this.expandToFit(values.length, width)) return false;

    values.forEach((line, row) => {
      line.forEach((value, col) => {
        this.cells.set(this.region.top + row, this.region.left + col, value);
      });
    });
    return true;
  }

  /** Fill the first column with 1..rowCount */
  numberRows(): void {
    for (let row = 0; row < this.rowCount; row++) {
      this.cells.set(this.region.top + row, this.region.left, row + 1);
    }
  }

  /** Fill the first row with 1..columnCount */
  numberColumns(): void {
    for (let col = 0; col < this.columnCount; col++) {
      this.cells.set(this.region.top, this.region.left + col, col + 1);
    }
  }

  /**
   * Grow to at least rows × columns without writing. Rows are inserted first;
   * the column count is compared only after that insertion has settled.
   */
  expandToFit(rows: number, columns: number): boolean {
    try {
      const missingRows = rows - this.rowCount;
      if (missingRows > 0) {
        this.sheet.insertRows(this.region.top + 1, missingRows, this.region);
      }
      const missingColumns = columns - this.columnCount;
      if (missingColumns > 0) {
        this.sheet.insertColumns(this.region.left + 1, missingColumns, this.region);
      }
      return true;
    } catch (err: unknown) {
      if (!(err instanceof StructuralGrowthError)) throw err;
      this.sink.report(
        createDiagnostic('STRUCTURAL_GROWTH_FAILURE', `${err.message} (range '${this.name}')`, {
          source: this.name,
        }),
      );
      return false;
    }
  }

  private checkBounds(row: number, column: number): Diagnostic | undefined {
    if (row >= 1 && row <= this.rowCount && column >= 1 && column <= this.columnCount) {
      return undefined;
    }
    return createDiagnostic(
      'OUT_OF_RANGE',
      `Tried to access cell (${row}, ${column}) of range '${this.name}'. ` +
        `Valid cells are (1, 1) - (${this.rowCount}, ${this.columnCount}).`,
      { source: this.name, row, column },
    );
  }

  private emit<T>(read: CellRead<T>): CellRead<T> {
    for (const diagnostic of read.diagnostics) {
      this.sink.report(diagnostic);
    }
    return read;
  }
}

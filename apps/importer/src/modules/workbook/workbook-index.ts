import { parseQualifiedRef } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import type { MemoryWorkbook } from './cell-store';
import { RangeView } from './range-view';
import { TableView } from './table-view';

/**
 * Name → view registry for one workbook. Tables come from every sheet's table
 * regions; ranges come from workbook-scoped defined names.
 */
export class WorkbookIndex {
  private readonly tables = new Map<string, TableView>();
  private readonly ranges = new Map<string, RangeView>();

  private constructor(
    readonly workbook: MemoryWorkbook,
    private readonly sink: DiagnosticSink,
  ) {}

  static load(workbook: MemoryWorkbook, sink: DiagnosticSink): WorkbookIndex {
    const index = new WorkbookIndex(workbook, sink);
    index.registerTables();
    index.registerRanges();
    return index;
  }

  findTable(name: string): TableView | undefined {
    return this.tables.get(name);
  }

  findRange(name: string): RangeView | undefined {
    return this.ranges.get(name);
  }

  get tableNames(): string[] {
    return [...this.tables.keys()];
  }

  get rangeNames(): string[] {
    return [...this.ranges.keys()];
  }

  private registerTables(): void {
    for (const sheet of this.workbook.sheets) {
      for (const region of sheet.tables) {
        if (this.tables.has(region.name)) {
          this.duplicate('table', region.name, sheet.name);
          continue;
        }
        this.tables.set(region.name, new TableView(sheet, region, this.sink));
      }
    }
  }

  private registerRanges(): void {
    this.workbook.definedNames.forEach(({ name, address }, position) => {
      const target = parseQualifiedRef(address);
      if (!target) {
        this.sink.report(
          createDiagnostic(
            'UNSUPPORTED',
            `Defined name '${name}' refers to '${address}', which is not a single cell or area.`,
            { source: name },
            'warning',
          ),
        );
        return;
      }

      const sheet = this.workbook.getSheet(target.sheetName);
      if (!sheet) {
        this.sink.report(
          createDiagnostic(
            'NOT_FOUND',
            `Defined name '${name}' refers to missing sheet '${target.sheetName}'.`,
            { source: name },
          ),
        );
        return;
      }

      if (this.ranges.has(name)) {
        this.duplicate('range', name, sheet.name);
        return;
      }

      const region = this.workbook.bindDefinedName(position, sheet, target.range);
      this.ranges.set(name, new RangeView(sheet, region, this.sink));
    });
  }

  private duplicate(kind: 'table' | 'range', name: string, sheetName: string): void {
    this.sink.report(
      createDiagnostic(
        'DUPLICATE_KEY',
        `Duplicate ${kind} name '${name}' on sheet '${sheetName}'. Only the first one will be used.`,
        { source: name },
        'warning',
      ),
    );
  }
}

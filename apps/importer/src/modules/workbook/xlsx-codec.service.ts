import { readFile, stat, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import type { CellRange, CellValue } from '@brewsheet/shared';
import {
  FILE_LIMITS,
  buildCellRef,
  definedNamesModelSchema,
  excelTableEntrySchema,
  parseAreaRef,
  parseCellRef,
} from '@brewsheet/shared';
import type { ExcelTableModel } from '@brewsheet/shared';
import type { MemorySheet, TableRegion } from './cell-store';
import { MemoryWorkbook } from './cell-store';

/** .xlsx ⇄ MemoryWorkbook. Only values, tables and workbook-scoped names survive. */
@Injectable()
export class XlsxCodecService {
  private readonly logger = new Logger(XlsxCodecService.name);

  async readFile(path: string): Promise<MemoryWorkbook> {
    const ext = extname(path).toLowerCase();
    if (!FILE_LIMITS.ALLOWED_EXTENSIONS.some((allowed) => allowed === ext)) {
      throw new BadRequestException(`Unsupported workbook type '${ext}' (${path})`);
    }
    const { size } = await stat(path);
    if (size > FILE_LIMITS.MAX_UPLOAD_SIZE_BYTES) {
      throw new BadRequestException(
        `Workbook ${path} is ${size} bytes; the limit is ${FILE_LIMITS.MAX_UPLOAD_SIZE_BYTES}`,
      );
    }
    return this.read(await readFile(path));
  }

  async read(buffer: Buffer): Promise<MemoryWorkbook> {
    const source = new ExcelJS.Workbook();
    await source.xlsx.load(buffer as unknown as ExcelJS.Buffer);

    const workbook = new MemoryWorkbook();
    let cellCount = 0;
    let tableCount = 0;

    for (const ws of source.worksheets) {
      const sheet = workbook.addSheet(ws.name);

      ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
          const value = this.extractValue(cell.value);
          if (value !== null) {
            sheet.setCell(rowNumber, colNumber, value);
            cellCount++;
          }
        });
      });

      for (const entry of ws.getTables()) {
        const parsed = excelTableEntrySchema.safeParse(entry);
        if (!parsed.success) {
          this.logger.warn(`Skipping unreadable table on sheet '${ws.name}': ${parsed.error.message}`);
          continue;
        }
        if (this.addTable(sheet, parsed.data.table)) tableCount++;
      }
    }

    const names = definedNamesModelSchema.safeParse(source.model.definedNames ?? []);
    if (names.success) {
      for (const { name, ranges } of names.data) {
        // A name spanning several areas keeps them comma-joined; the index reports it.
        workbook.defineName(name, ranges.join(','));
      }
    } else {
      this.logger.warn(`Skipping unreadable defined names: ${names.error.message}`);
    }

    this.logger.log(
      `Read ${workbook.sheets.length} sheets, ${cellCount} cells, ${tableCount} tables, ` +
        `${workbook.definedNames.length} names`,
    );
    return workbook;
  }

  async write(workbook: MemoryWorkbook): Promise<Buffer> {
    const target = new ExcelJS.Workbook();

    for (const sheet of workbook.sheets) {
      const ws = target.addWorksheet(sheet.name);
      for (const [row, col, value] of sheet.entries()) {
        ws.getCell(row, col).value = value;
      }
      for (const region of sheet.tables) {
        ws.addTable({
          name: region.name,
          ref: buildCellRef(region.left - 1, region.top - 1),
          headerRow: region.showHeader,
          totalsRow: region.showTotal,
          columns: region.columnNames.map((name) => ({ name, filterButton: region.showHeader })),
          rows: this.tableRows(sheet, region),
        });
        if (region.showTotal) this.restoreTotals(ws, sheet, region);
      }
    }

    for (const { name, address } of workbook.definedNames) {
      target.definedNames.add(address, name);
    }

    const buffer = await target.xlsx.writeBuffer();
    this.logger.log(`Workbook encoded (${workbook.sheets.length} sheets)`);
    return Buffer.from(buffer);
  }

  async writeFile(workbook: MemoryWorkbook, path: string): Promise<void> {
    await writeFile(path, await this.write(workbook));
    this.logger.log(`Workbook saved to ${path}`);
  }

  /**
   * Register a decoded table. Files written by Excel omit `headerRowCount`, which
   * exceljs reads as "no header", so a first row equal to the column names counts
   * as a header as well.
   */
  private addTable(sheet: MemorySheet, model: ExcelTableModel): boolean {
    const columnNames = model.columns.map((column) => column.name);
    const bounds = this.tableBounds(model);
    if (!bounds || columnNames.length === 0) {
      this.logger.warn(`Skipping table '${model.name}' on sheet '${sheet.name}': no usable extent`);
      return false;
    }

    const top = bounds.startRow + 1;
    const left = bounds.startCol + 1;
    const showHeader =
      model.headerRow === true ||
      columnNames.every((name, i) => sheet.getCell(top, left + i) === name);

    sheet.addTable({
      name: model.name,
      top,
      left,
      rowSpan: bounds.endRow - bounds.startRow + 1,
      columnNames,
      showHeader,
      showTotal: model.totalsRow ?? false,
    });
    return true;
  }

  private tableBounds(model: ExcelTableModel): CellRange | null {
    if (model.tableRef) return parseAreaRef(model.tableRef);
    if (!model.ref) return null;

    const anchor = parseCellRef(model.ref);
    const rows = (model.rows?.length ?? 0) + (model.headerRow === false ? 0 : 1) + (model.totalsRow ? 1 : 0);
    return {
      startRow: anchor.row,
      startCol: anchor.col,
      endRow: anchor.row + Math.max(rows, 1) - 1,
      endCol: anchor.col + model.columns.length - 1,
    };
  }

  /** Data rows of a table; Excel tables always keep at least one */
  private tableRows(sheet: MemorySheet, region: TableRegion): CellValue[][] {
    const first = region.top + (region.showHeader ? 1 : 0);
    const count = region.rowSpan - (region.showHeader ? 1 : 0) - (region.showTotal ? 1 : 0);
    const rows: CellValue[][] = [];
    for (let r = 0; r < count; r++) {
      rows.push(region.columnNames.map((_, c) => sheet.getCell(first + r, region.left + c)));
    }
    return rows.length > 0 ? rows : [region.columnNames.map(() => null)];
  }

  /**
   * exceljs fills the totals row from column totals definitions, which are not
   * modelled here; put the stored values back over it.
   */
  private restoreTotals(ws: ExcelJS.Worksheet, sheet: MemorySheet, region: TableRegion): void {
    const row = region.top + region.rowSpan - 1;
    region.columnNames.forEach((_, c) => {
      ws.getCell(row, region.left + c).value = sheet.getCell(row, region.left + c);
    });
  }

  private extractValue(raw: ExcelJS.CellValue): CellValue {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'string') return raw;
    if (raw instanceof Date) return raw.toISOString();

    if (typeof raw === 'object' && 'result' in raw) {
      const result: unknown = raw.result;
      if (typeof result === 'number' || typeof result === 'boolean' || typeof result === 'string') {
        return result;
      }
      if (result instanceof Date) return result.toISOString();
      return null;
    }

    if (typeof raw === 'object' && 'richText' in raw) {
      return raw.richText.map((run) => run.text).join('');
    }

    if (typeof raw === 'object' && 'text' in raw) {
      return typeof raw.text === 'string' ? raw.text : null;
    }

    if (typeof raw === 'object' && 'error' in raw) {
      return String(raw.error);
    }

    return null;
  }
}

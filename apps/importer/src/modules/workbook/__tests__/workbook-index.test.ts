import { describe, it, expect } from 'vitest';
import { DiagnosticLog } from '../../../common/diagnostics/diagnostic-log';
import { MemoryWorkbook } from '../cell-store';
import { WorkbookIndex } from '../workbook-index';

function buildWorkbook(): MemoryWorkbook {
  const workbook = new MemoryWorkbook();
  const data = workbook.addSheet('Data');
  data.addTable({ name: 'Potions', top: 1, left: 1, rowSpan: 2, columnNames: ['Name'] });
  data.setCell(2, 1, 'Healing Draught');
  data.setCell(1, 4, 'Start here');

  const other = workbook.addSheet('Price List');
  other.addTable({ name: 'Potions', top: 1, left: 1, rowSpan: 1, columnNames: ['Other'] });
  other.addTable({ name: 'Prices', top: 5, left: 1, rowSpan: 1, columnNames: ['Cost'] });

  workbook.defineName('Start', 'Data!$D$1');
  workbook.defineName('Discounts', "'Price List'!$B$2:$C$3");
  workbook.defineName('Gone', 'Missing!$A$1');
  workbook.defineName('Column', 'Data!$A:$A');
  workbook.defineName('Start', "'Price List'!$A$1");
  return workbook;
}

describe('WorkbookIndex.load', () => {
  it('registers tables across sheets, first name wins', () => {
    const log = new DiagnosticLog('WorkbookIndexTest');
    const index = WorkbookIndex.load(buildWorkbook(), log);

    expect(index.tableNames).toEqual(['Potions', 'Prices']);
    expect(index.findTable('Potions')?.sheetName).toBe('Data');
    expect(index.findTable('Potions')?.getValue(1, 'Name', 'string')).toBe('Healing Draught');
    expect(index.findTable('Prices')?.sheetName).toBe('Price List');
  });

  it('registers workbook-scoped names as ranges', () => {
    const log = new DiagnosticLog('WorkbookIndexTest');
    const index = WorkbookIndex.load(buildWorkbook(), log);

    expect(index.rangeNames).toEqual(['Start', 'Discounts']);
    expect(index.findRange('Start')?.getValue('string')).toBe('Start here');
    const discounts = index.findRange('Discounts');
    expect(discounts?.sheetName).toBe('Price List');
    expect(discounts?.rowCount).toBe(2);
    expect(discounts?.columnCount).toBe(2);
  });

  it('reports duplicates, missing sheets and unsupported addresses', () => {
    const log = new DiagnosticLog('WorkbookIndexTest');
    WorkbookIndex.load(buildWorkbook(), log);

    expect(log.count('DUPLICATE_KEY')).toBe(2);
    expect(log.count('NOT_FOUND')).toBe(1);
    expect(log.count('UNSUPPORTED')).toBe(1);
    expect(log.diagnostics.map((d) => d.message)).toEqual([
      "Duplicate table name 'Potions' on sheet 'Price List'. Only the first one will be used.",
      "Defined name 'Gone' refers to missing sheet 'Missing'.",
      "Defined name 'Column' refers to 'Data!$A:$A', which is not a single cell or area.",
      "Duplicate range name 'Start' on sheet 'Price List'. Only the first one will be used.",
    ]);
  });

  it('finds by exact name only', () => {
    const log = new DiagnosticLog('WorkbookIndexTest');
    const index = WorkbookIndex.load(buildWorkbook(), log);
    expect(index.findTable('potions')).toBeUndefined();
    expect(index.findRange('start')).toBeUndefined();
    expect(log.count('DUPLICATE_KEY')).toBe(2);
  });

  it('keeps defined names in step with table growth', () => {
    const log = new DiagnosticLog('WorkbookIndexTest');
    const workbook = buildWorkbook();
    const index = WorkbookIndex.load(workbook, log);

    index.findTable('Prices')?.setColumn('Cost', [1, 2, 3]);
    expect(workbook.definedNames[1]).toEqual({ name: 'Discounts', address: "'Price List'!$B$2:$C$3" });

    index.findTable('Potions')?.setColumn('Name', ['a', 'b', 'c']);
    expect(workbook.definedNames[0]).toEqual({ name: 'Start', address: 'Data!$D$1' });
    expect(index.findRange('Start')?.getValue('string')).toBe('Start here');
  });
});

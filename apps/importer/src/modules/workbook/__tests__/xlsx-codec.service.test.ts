import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BadRequestException } from '@nestjs/common';
import { DiagnosticLog } from '../../../common/diagnostics/diagnostic-log';
import { MemoryWorkbook } from '../cell-store';
import { WorkbookIndex } from '../workbook-index';
import { XlsxCodecService } from '../xlsx-codec.service';

function sampleWorkbook(): MemoryWorkbook {
  const workbook = new MemoryWorkbook();
  const data = workbook.addSheet('Data');
  data.addTable({ name: 'Potions', top: 1, left: 1, rowSpan: 3, columnNames: ['Name', 'Cost'] });
  data.setCell(2, 1, 'Healing Draught');
  data.setCell(2, 2, 12);
  data.setCell(3, 1, 'Night Tonic');
  data.setCell(3, 2, 7.5);
  data.setCell(6, 4, true);
  workbook.defineName('Flag', 'Data!$D$6');

  workbook.addSheet('Notes').setCell(1, 1, 'empty otherwise');
  return workbook;
}

describe('XlsxCodecService', () => {
  const codec = new XlsxCodecService();

  it('round-trips cell values by sheet', async () => {
    const decoded = await codec.read(await codec.write(sampleWorkbook()));

    expect(decoded.sheets.map((s) => s.name)).toEqual(['Data', 'Notes']);
    const data = decoded.getSheet('Data');
    expect(data?.getCell(2, 1)).toBe('Healing Draught');
    expect(data?.getCell(2, 2)).toBe(12);
    expect(data?.getCell(3, 2)).toBe(7.5);
    expect(data?.getCell(6, 4)).toBe(true);
    expect(decoded.getSheet('Notes')?.getCell(1, 1)).toBe('empty otherwise');
  });

  it('round-trips tables and defined names', async () => {
    const decoded = await codec.read(await codec.write(sampleWorkbook()));
    const log = new DiagnosticLog('XlsxCodecTest');
    const index = WorkbookIndex.load(decoded, log);

    const potions = index.findTable('Potions');
    expect(potions?.columnNames).toEqual(['Name', 'Cost']);
    expect(potions?.rowCount).toBe(2);
    expect(potions?.getValue(2, 'Name', 'string')).toBe('Night Tonic');

    expect(index.findRange('Flag')?.getValue('boolean')).toBe(true);
    expect(log.count()).toBe(0);
  });

  it('writes growth made through the views', async () => {
    const workbook = sampleWorkbook();
    const log = new DiagnosticLog('XlsxCodecTest');
    WorkbookIndex.load(workbook, log).findTable('Potions')?.setColumn('Cost', [1, 2, 3]);

    const reread = WorkbookIndex.load(await codec.read(await codec.write(workbook)), log);
    expect(reread.findTable('Potions')?.rowCount).toBe(3);
    expect(reread.findTable('Potions')?.getColumnValues('Cost', 'number')).toEqual([1, 2, 3]);
    expect(reread.findRange('Flag')?.getValue('boolean')).toBe(true);
  });

  it('keeps the values of a totals row', async () => {
    const workbook = new MemoryWorkbook();
    const sheet = workbook.addSheet('Stock');
    sheet.addTable({ name: 'Stock', top: 1, left: 1, rowSpan: 3, columnNames: ['Name', 'Cost'], showTotal: true });
    sheet.setCell(2, 1, 'Herb');
    sheet.setCell(2, 2, 2);
    sheet.setCell(3, 1, 'Total');
    sheet.setCell(3, 2, 2);

    const decoded = (await codec.read(await codec.write(workbook))).getSheet('Stock');
    expect(decoded?.getCell(2, 1)).toBe('Herb');
    expect(decoded?.getCell(3, 1)).toBe('Total');
    expect(decoded?.getCell(3, 2)).toBe(2);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'brewsheet-codec-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('saves and reopens a workbook file', async () => {
      const path = join(dir, 'potions.xlsx');
      await codec.writeFile(sampleWorkbook(), path);
      const decoded = await codec.readFile(path);
      expect(decoded.getSheet('Data')?.getCell(3, 1)).toBe('Night Tonic');
    });

    it('rejects files that are not .xlsx', async () => {
      await expect(codec.readFile(join(dir, 'potions.csv'))).rejects.toThrow(BadRequestException);
    });
  });
});

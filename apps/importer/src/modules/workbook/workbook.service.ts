import { access } from 'node:fs/promises';
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { WorkbookIndex } from './workbook-index';
import { XlsxCodecService } from './xlsx-codec.service';

@Injectable()
export class WorkbookService {
  private readonly logger = new Logger(WorkbookService.name);

  constructor(private readonly codec: XlsxCodecService) {}

  /** Decode a workbook file and index its tables and named ranges */
  async open(path: string, sink: DiagnosticSink): Promise<WorkbookIndex> {
    try {
      await access(path);
    } catch {
      throw new NotFoundException(`Workbook not found: ${path}`);
    }

    const index = WorkbookIndex.load(await this.codec.readFile(path), sink);
    this.logger.log(
      `Opened ${path}: tables [${index.tableNames.join(', ')}], ranges [${index.rangeNames.join(', ')}]`,
    );
    return index;
  }

  /** Encode the indexed workbook, including any growth made through its views */
  async save(index: WorkbookIndex, path: string): Promise<void> {
    await this.codec.writeFile(index.workbook, path);
  }
}

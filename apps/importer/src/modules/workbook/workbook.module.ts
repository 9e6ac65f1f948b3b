import { Module } from '@nestjs/common';
import { WorkbookService } from './workbook.service';
import { XlsxCodecService } from './xlsx-codec.service';

@Module({
  providers: [WorkbookService, XlsxCodecService],
  exports: [WorkbookService, XlsxCodecService],
})
export class WorkbookModule {}

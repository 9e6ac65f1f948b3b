import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PotionImportService } from './modules/import/potion-import.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const { values } = parseArgs({
    options: {
      source: { type: 'string', short: 's' },
      output: { type: 'string', short: 'o' },
    },
  });

  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const sourcePath = values.source ?? app.get(ConfigService).get<string>('WORKBOOK_PATH');
    if (!sourcePath) {
      throw new Error('No workbook given: pass --source <file.xlsx> or set WORKBOOK_PATH');
    }

    const report = await app.get(PotionImportService).run({ sourcePath, outputPath: values.output });
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    logger.log(`Import ${report.id} finished`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});

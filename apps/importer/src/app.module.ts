import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { CatalogModule } from './modules/catalog/catalog.module';
import { ImportModule } from './modules/import/import.module';
import { RecipeModule } from './modules/recipe/recipe.module';
import { WorkbookModule } from './modules/workbook/workbook.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    WorkbookModule,
    CatalogModule,
    RecipeModule,
    ImportModule,
  ],
})
export class AppModule {}

import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { RecipeModule } from '../recipe/recipe.module';
import { WorkbookModule } from '../workbook/workbook.module';
import { PotionImportService } from './potion-import.service';

@Module({
  imports: [WorkbookModule, CatalogModule, RecipeModule],
  providers: [PotionImportService],
  exports: [PotionImportService],
})
export class ImportModule {}

import { Injectable, Logger } from '@nestjs/common';
import { createId } from '@paralleldrive/cuid2';
import type { CellValue, ImportReport, InventoryItem, ItemCategory } from '@brewsheet/shared';
import { IMPORT_TABLES, ITEM_CATEGORIES, isBlank, raritySchema } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { DiagnosticLog, createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import { ItemCatalogService } from '../catalog/item-catalog.service';
import type { NameLookup, RecipeIndex } from '../recipe/recipe-index';
import { RecipeRepository } from '../recipe/recipe.repository';
import type { TableView } from '../workbook/table-view';
import type { WorkbookIndex } from '../workbook/workbook-index';
import { WorkbookService } from '../workbook/workbook.service';

export interface ImportOptions {
  sourcePath: string;
  /** Where to save the workbook with the canonical recipe list written back */
  outputPath?: string;
}

export interface ImportSummary {
  items: number;
  rowsSkipped: number;
  recipes: RecipeIndex<InventoryItem>;
}

export interface RowTally {
  imported: number;
  skipped: number;
}

@Injectable()
export class PotionImportService {
  private readonly logger = new Logger(PotionImportService.name);

  constructor(
    private readonly workbooks: WorkbookService,
    private readonly catalog: ItemCatalogService,
    private readonly recipeRepository: RecipeRepository,
  ) {}

  async run(options: ImportOptions): Promise<ImportReport> {
    const log = new DiagnosticLog(PotionImportService.name);
    const index = await this.workbooks.open(options.sourcePath, log);
    const summary = await this.importWorkbook(index, log, options.sourcePath);

    let recipesWrittenBack = false;
    if (options.outputPath) {
      recipesWrittenBack = this.writeBackRecipes(index, summary.recipes);
      if (!recipesWrittenBack) {
        this.logger.warn(
          `Recipe list was not written back in full; ${options.outputPath} keeps the recipe table as far as it got`,
        );
      }
      await this.workbooks.save(index, options.outputPath);
    }

    const report: ImportReport = {
      id: createId(),
      sourcePath: options.sourcePath,
      outputPath: options.outputPath ?? null,
      recipesWrittenBack,
      items: summary.items,
      recipes: summary.recipes.count,
      rowsSkipped: summary.rowsSkipped,
      diagnostics: log.count(),
      completedAt: new Date().toISOString(),
    };
    this.logger.log(
      `Import complete: ${report.items} items, ${report.recipes} recipes, ` +
        `${report.rowsSkipped} rows skipped, ${report.diagnostics} diagnostics`,
    );
    return report;
  }

  /** Items from every category table, then recipes; both stores are saved afterwards */
  async importWorkbook(
    index: WorkbookIndex,
    sink: DiagnosticSink,
    source: string,
  ): Promise<ImportSummary> {
    await this.catalog.load();

    let items = 0;
    let rowsSkipped = 0;
    for (const category of ITEM_CATEGORIES) {
      const table = this.requireTable(index, category, sink, source);
      if (!table) continue;
      const tally = await this.importItems(table, category);
      items += tally.imported;
      rowsSkipped += tally.skipped;
    }

    const recipes = await this.recipeRepository.load(this.catalog, sink);
    const recipeTable = this.requireTable(index, IMPORT_TABLES.RECIPES, sink, source);
    if (recipeTable) {
      recipes.clear();
      rowsSkipped += this.importRecipes(recipeTable, recipes, this.catalog).skipped;
    }

    await this.catalog.save();
    await this.recipeRepository.save(recipes);
    return { items, rowsSkipped, recipes };
  }

  /** One catalog item per row with a non-blank name */
  async importItems(table: TableView, category: ItemCategory): Promise<RowTally> {
    const tally: RowTally = { imported: 0, skipped: 0 };
    const hasUses = table.hasColumn(IMPORT_TABLES.USES_COLUMN);
    const hasMaxProfit = table.hasColumn(IMPORT_TABLES.MAX_PROFIT_COLUMN);

    for (let row = 1; row <= table.rowCount; row++) {
      const name = table.getValue(row, IMPORT_TABLES.NAME_COLUMN, 'string');
      if (isBlank(name)) {
        tally.skipped++;
        continue;
      }

      const item = await this.catalog.findOrCreate(name, category);
      if (isBlank(item.displayName)) item.displayName = name;

      const rarity = table.getEnum(row, IMPORT_TABLES.RARITY_COLUMN, raritySchema);
      if (rarity.found) item.rarity = rarity.value;

      item.cost = table.getValue(row, IMPORT_TABLES.COST_COLUMN, 'integer');
      if (hasUses) item.uses = table.getValue(row, IMPORT_TABLES.USES_COLUMN, 'integer');
      if (hasMaxProfit) item.maxProfit = table.getValue(row, IMPORT_TABLES.MAX_PROFIT_COLUMN, 'integer');

      this.logger.debug(`Imported ${category} item '${name}'`);
      tally.imported++;
    }
    return tally;
  }

  /**
   * Feed every row of a recipe table through `tryAdd`. Each ingredient column is
   * looked up by name; a missing one is reported and read as blank.
   */
  importRecipes(
    table: TableView,
    recipes: RecipeIndex<InventoryItem>,
    names: NameLookup<InventoryItem>,
  ): RowTally {
    const tally: RowTally = { imported: 0, skipped: 0 };
    const products = table.getColumnValues(IMPORT_TABLES.PRODUCT_COLUMN, 'string');
    if (!products) {
      tally.skipped = table.rowCount;
      return tally;
    }
    const columns = IMPORT_TABLES.INGREDIENT_COLUMNS.map((column) => table.getColumnValues(column, 'string'));

    products.forEach((product, i) => {
      const ingredients = columns.map((values) => values?.[i]);
      if (recipes.tryAdd(names, product, ingredients)) {
        tally.imported++;
      } else {
        tally.skipped++;
      }
    });
    return tally;
  }

  /**
   * Overwrite the recipe table with the canonical records: product, sorted
   * ingredients, and a 1-based ID column. Rows past the last record are cleared.
   * An ingredient column the table lacks is appended only when some record fills it.
   */
  writeBackRecipes(index: WorkbookIndex, recipes: RecipeIndex<InventoryItem>): boolean {
    const table = index.findTable(IMPORT_TABLES.RECIPES);
    if (!table) return false;

    const records = recipes.records;
    const rows = Math.max(records.length, table.rowCount);
    const products: CellValue[] = [];
    const ids: CellValue[] = [];
    const slots: CellValue[][] = IMPORT_TABLES.INGREDIENT_COLUMNS.map(() => []);
    for (let i = 0; i < rows; i++) {
      const record = records[i];
      products.push(record ? record.product.name : null);
      ids.push(record ? i + 1 : null);
      slots.forEach((values, slot) => values.push(record?.ingredients[slot]?.name ?? null));
    }

    if (!table.setColumn(IMPORT_TABLES.PRODUCT_COLUMN, products)) return false;
    for (const [slot, column] of IMPORT_TABLES.INGREDIENT_COLUMNS.entries()) {
      const values = slots[slot] ?? [];
      if (!table.hasColumn(column) && values.every((value) => value === null)) continue;
      if (!table.setColumn(column, values, true)) return false;
    }
    return table.setColumn(IMPORT_TABLES.ID_COLUMN, ids, true);
  }

  private requireTable(
    index: WorkbookIndex,
    name: string,
    sink: DiagnosticSink,
    source: string,
  ): TableView | undefined {
    const table = index.findTable(name);
    if (!table) {
      sink.report(
        createDiagnostic('NOT_FOUND', `Could not find table '${name}' in ${source}`, { source: name }),
      );
    }
    return table;
  }
}

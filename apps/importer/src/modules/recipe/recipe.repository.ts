import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { EntityRef, StoredRecipeCollection } from '@brewsheet/shared';
import { storedRecipeCollectionSchema } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import type { NameLookup, RecipeRecord } from './recipe-index';
import { RecipeIndex } from './recipe-index';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Recipe list persisted as JSON beside the item catalog */
@Injectable()
export class RecipeRepository {
  private readonly logger = new Logger(RecipeRepository.name);

  constructor(private readonly config: ConfigService) {}

  get filePath(): string {
    return join(
      this.config.getOrThrow<string>('CATALOG_DIR'),
      this.config.getOrThrow<string>('RECIPES_FILE'),
    );
  }

  /** Rebuild an index from disk; a missing file gives an empty index */
  async load<E extends EntityRef>(names: NameLookup<E>, sink: DiagnosticSink): Promise<RecipeIndex<E>> {
    const index = new RecipeIndex<E>(sink);
    const stored = await this.read();

    const records: RecipeRecord<E>[] = [];
    for (const recipe of stored.recipes) {
      const product = names.resolve(recipe.product);
      const ingredients: E[] = [];
      const missing: string[] = product ? [] : [recipe.product];
      for (const name of recipe.ingredients) {
        const item = names.resolve(name);
        if (item) ingredients.push(item);
        else missing.push(name);
      }

      if (!product || missing.length > 0) {
        const list = missing.map((name) => `'${name}'`).join(', ');
        sink.report(
          createDiagnostic(
            'NOT_FOUND',
            `Dropping stored recipe for '${recipe.product}': unknown item(s) ${list}`,
            { source: this.filePath },
            'warning',
          ),
        );
        continue;
      }
      records.push({ ingredients, product });
    }

    index.rehydrate(records);
    this.logger.log(`Loaded ${index.count} recipes from ${this.filePath}`);
    return index;
  }

  async save<E extends EntityRef>(index: RecipeIndex<E>): Promise<void> {
    const collection: StoredRecipeCollection = { recipes: index.toStored() };
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(collection, null, 2)}\n`, 'utf-8');
    this.logger.log(`Saved ${collection.recipes.length} recipes to ${this.filePath}`);
  }

  private async read(): Promise<StoredRecipeCollection> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return { recipes: [] };
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid recipe file ${this.filePath}: ${reason}`);
    }

    const result = storedRecipeCollectionSchema.safeParse(parsed);
    if (!result.success) {
      const formatted = result.error.issues
        .map((i) => `  ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new Error(`Invalid recipe file ${this.filePath}:\n${formatted}`);
    }
    return result.data;
  }
}

import type { EntityRef, StoredRecipe } from '@brewsheet/shared';
import { RECIPE_LIMITS, compareOrdinal, isBlank } from '@brewsheet/shared';
import type { DiagnosticSink } from '../../common/diagnostics/diagnostic-log';
import { createDiagnostic } from '../../common/diagnostics/diagnostic-log';
import { buildRecipeKey, describeRecipeKey, recipeKeyId } from './recipe-key';

/** Name → entity resolution the index is populated through */
export interface NameLookup<E extends EntityRef> {
  resolve(name: string): E | undefined;
}

export interface RecipeRecord<E extends EntityRef> {
  readonly ingredients: readonly E[];
  readonly product: E;
}

export type RecipeIndexState = 'empty' | 'populated';

function byName(a: EntityRef, b: EntityRef): number {
  return compareOrdinal(a.name, b.name);
}

/**
 * Recipes keyed by their unordered ingredient set. Records keep insertion order;
 * the key map answers lookups. The first product registered for a key wins.
 */
export class RecipeIndex<E extends EntityRef> {
  private recordList: RecipeRecord<E>[] = [];
  private readonly lookup = new Map<string, E>();

  constructor(private readonly sink: DiagnosticSink) {}

  get count(): number {
    return this.recordList.length;
  }

  get records(): readonly RecipeRecord<E>[] {
    return this.recordList;
  }

  get state(): RecipeIndexState {
    return this.recordList.length === 0 ? 'empty' : 'populated';
  }

  /**
   * Resolve names and register the recipe. Unresolvable ingredient names are
   * dropped; returns false when no ingredient or the product cannot be resolved,
   * or when more ingredients resolve than a key holds. A duplicate key still
   * returns true but keeps the first product.
   */
  tryAdd(
    names: NameLookup<E>,
    productName: string,
    ingredientNames: readonly (string | null | undefined)[],
  ): boolean {
    const ingredients: E[] = [];
    for (const name of ingredientNames) {
      if (name === null || name === undefined || isBlank(name)) continue;
      const item = names.resolve(name);
      if (item) ingredients.push(item);
    }
    if (ingredients.length === 0) return false;

    const product = names.resolve(productName);
    if (!product) return false;

    return this.register({ ingredients, product });
  }

  clear(): void {
    this.recordList = [];
    this.lookup.clear();
  }

  /** Replace the contents with persisted records, replaying each through key building */
  rehydrate(records: readonly RecipeRecord<E>[]): void {
    this.clear();
    for (const record of records) {
      this.register(record);
    }
  }

  /** Product for any ordering of the given ingredients */
  findProduct(ingredients: readonly E[]): E | undefined {
    const key = buildRecipeKey([...ingredients].sort(byName).map((item) => item.name));
    return key ? this.lookup.get(recipeKeyId(key)) : undefined;
  }

  toStored(): StoredRecipe[] {
    return this.recordList.map((record) => ({
      ingredients: record.ingredients.map((item) => item.name),
      product: record.product.name,
    }));
  }

  private register(record: RecipeRecord<E>): boolean {
    const ingredients = [...record.ingredients].sort(byName);
    const key = buildRecipeKey(ingredients.map((item) => item.name));
    if (!key) {
      this.sink.report(
        createDiagnostic(
          'UNSUPPORTED',
          `Recipe for ${record.product.name} has ${ingredients.length} ingredients; ` +
            `at most ${RECIPE_LIMITS.MAX_INGREDIENTS} are supported.`,
          { source: record.product.name },
        ),
      );
      return false;
    }

    const id = recipeKeyId(key);
    const existing = this.lookup.get(id);
    if (existing) {
      this.sink.report(
        createDiagnostic(
          'DUPLICATE_KEY',
          `Duplicate recipe detected: ${describeRecipeKey(key)} maps to both ` +
            `${existing.name} and ${record.product.name}.\nOnly the first mapping will be kept.`,
          { source: record.product.name },
        ),
      );
      return true;
    }

    this.recordList.push({ ingredients, product: record.product });
    this.lookup.set(id, record.product);
    return true;
  }
}

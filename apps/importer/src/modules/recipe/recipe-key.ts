import { RECIPE_LIMITS } from '@brewsheet/shared';

export type KeySlot = { kind: 'ingredient'; name: string } | { kind: 'empty' };

/** Order-independent recipe identity: sorted ingredient names packed into three slots */
export type RecipeKey = readonly [KeySlot, KeySlot, KeySlot];

const EMPTY: KeySlot = { kind: 'empty' };

function slot(name: string | undefined): KeySlot {
  return name === undefined ? EMPTY : { kind: 'ingredient', name };
}

/**
 * Pack already-sorted ingredient names. Returns undefined for an empty list or
 * for more names than the key has slots.
 */
export function buildRecipeKey(sortedNames: readonly string[]): RecipeKey | undefined {
  if (sortedNames.length === 0 || sortedNames.length > RECIPE_LIMITS.MAX_INGREDIENTS) {
    return undefined;
  }
  return [slot(sortedNames[0]), slot(sortedNames[1]), slot(sortedNames[2])];
}

export function slotLabel(keySlot: KeySlot): string {
  return keySlot.kind === 'ingredient' ? keySlot.name : '';
}

/** Map key for a recipe key; equal keys give equal ids */
export function recipeKeyId(key: RecipeKey): string {
  return JSON.stringify(key.map((keySlot) => (keySlot.kind === 'ingredient' ? keySlot.name : null)));
}

/** "'A' + 'B' + ''" */
export function describeRecipeKey(key: RecipeKey): string {
  return key.map((keySlot) => `'${slotLabel(keySlot)}'`).join(' + ');
}

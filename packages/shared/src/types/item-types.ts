/** Item rarity tiers; the first entry is the default */
export const RARITIES = ['Common', 'Uncommon', 'Rare', 'Epic', 'Legendary'] as const;
export type Rarity = (typeof RARITIES)[number];

/** Catalog folders the importer fills */
export const ITEM_CATEGORIES = ['Ingredients', 'Potions'] as const;
export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

/** Anything the recipe index can reference: identity is the name */
export interface EntityRef {
  readonly name: string;
}

export interface InventoryItem extends EntityRef {
  category: string;
  displayName: string;
  rarity: Rarity;
  cost: number;
  uses: number;
  maxProfit: number;
}

import { z } from 'zod';
import { RARITIES } from '../types/item-types';

/** Rarity labels as they appear in a sheet. The description names the enum in diagnostics. */
export const raritySchema = z.enum(RARITIES).describe('Rarity');

export const inventoryItemSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  displayName: z.string().default(''),
  rarity: raritySchema.default('Common'),
  cost: z.number().int().default(0),
  uses: z.number().int().default(0),
  maxProfit: z.number().int().default(0),
});

export type InventoryItemInput = z.infer<typeof inventoryItemSchema>;

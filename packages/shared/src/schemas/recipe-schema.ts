import { z } from 'zod';
import { RECIPE_LIMITS } from '../constants/limits';

export const storedRecipeSchema = z.object({
  ingredients: z.array(z.string().min(1)).min(1).max(RECIPE_LIMITS.MAX_INGREDIENTS),
  product: z.string().min(1),
});

export const storedRecipeCollectionSchema = z.object({
  recipes: z.array(storedRecipeSchema).default([]),
});

export type StoredRecipeInput = z.infer<typeof storedRecipeSchema>;
export type StoredRecipeCollectionInput = z.infer<typeof storedRecipeCollectionSchema>;

import { describe, it, expect } from 'vitest';
import { storedRecipeSchema, storedRecipeCollectionSchema } from '../recipe-schema';

describe('storedRecipeSchema', () => {
  it('accepts one to three ingredients', () => {
    expect(storedRecipeSchema.safeParse({ ingredients: ['Herb'], product: 'Tonic' }).success).toBe(true);
    expect(
      storedRecipeSchema.safeParse({ ingredients: ['Ash', 'Herb', 'Water'], product: 'Tonic' }).success,
    ).toBe(true);
  });

  it('rejects an empty ingredient list', () => {
    expect(storedRecipeSchema.safeParse({ ingredients: [], product: 'Tonic' }).success).toBe(false);
  });

  it('rejects more ingredients than key slots', () => {
    const result = storedRecipeSchema.safeParse({
      ingredients: ['Ash', 'Herb', 'Salt', 'Water'],
      product: 'Tonic',
    });
    expect(result.success).toBe(false);
  });
});

describe('storedRecipeCollectionSchema', () => {
  it('defaults to no recipes', () => {
    expect(storedRecipeCollectionSchema.parse({})).toEqual({ recipes: [] });
  });
});

import { describe, it, expect } from 'vitest';
import { SHEET_LIMITS, FILE_LIMITS, RECIPE_LIMITS, IMPORT_TABLES } from '../limits';

describe('SHEET_LIMITS', () => {
  it('matches Excel grid dimensions', () => {
    expect(SHEET_LIMITS.MAX_ROWS).toBe(1_048_576);
    expect(SHEET_LIMITS.MAX_COLS).toBe(16_384);
  });
});

describe('FILE_LIMITS', () => {
  it('allows only xlsx workbooks', () => {
    expect(FILE_LIMITS.ALLOWED_EXTENSIONS).toEqual(['.xlsx']);
  });

  it('caps workbook size at 50MB', () => {
    expect(FILE_LIMITS.MAX_UPLOAD_SIZE_BYTES).toBe(52_428_800);
  });
});

describe('RECIPE_LIMITS', () => {
  it('keys recipes on three ingredient slots', () => {
    expect(RECIPE_LIMITS.MAX_INGREDIENTS).toBe(3);
  });
});

describe('IMPORT_TABLES', () => {
  it('lists one ingredient column per key slot', () => {
    expect(IMPORT_TABLES.INGREDIENT_COLUMNS).toHaveLength(RECIPE_LIMITS.MAX_INGREDIENTS);
  });
});

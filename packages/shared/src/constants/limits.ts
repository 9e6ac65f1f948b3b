/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
} as const;

/** Workbook file limits */
export const FILE_LIMITS = {
  MAX_UPLOAD_SIZE_BYTES: 50 * 1024 * 1024, // 50MB
  ALLOWED_EXTENSIONS: ['.xlsx'] as const,
} as const;

/** Recipe key shape */
export const RECIPE_LIMITS = {
  /** Slots in a recipe key; widen deliberately, the key is fixed-arity */
  MAX_INGREDIENTS: 3,
} as const;

/** Table and column names the potion importer reads */
export const IMPORT_TABLES = {
  RECIPES: 'Recipes',
  PRODUCT_COLUMN: 'Potion',
  INGREDIENT_COLUMNS: ['Item 1', 'Item 2', 'Item 3'] as const,
  ID_COLUMN: 'ID',
  NAME_COLUMN: 'Name',
  RARITY_COLUMN: 'Rarity',
  COST_COLUMN: 'Cost',
  USES_COLUMN: 'Uses',
  MAX_PROFIT_COLUMN: 'Max Profit',
} as const;

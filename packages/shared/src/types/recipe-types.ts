/** A recipe as persisted: entity names only */
export interface StoredRecipe {
  ingredients: string[];
  product: string;
}

export interface StoredRecipeCollection {
  recipes: StoredRecipe[];
}

/** Summary returned by an import run */
export interface ImportReport {
  id: string;
  sourcePath: string;
  outputPath: string | null;
  /** Whether the canonical recipe list reached the saved workbook in full */
  recipesWrittenBack: boolean;
  items: number;
  recipes: number;
  rowsSkipped: number;
  diagnostics: number;
  completedAt: string;
}

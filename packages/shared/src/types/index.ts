export type {
  CellValue,
  CellKind,
  CellKindValue,
  CellRange,
  QualifiedRange,
} from './cell-types';
export { CELL_KINDS } from './cell-types';

export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticLocation,
  CellRead,
} from './diagnostic-types';
export { DIAGNOSTIC_CODES, DIAGNOSTIC_SEVERITIES } from './diagnostic-types';

export type { Rarity, ItemCategory, EntityRef, InventoryItem } from './item-types';
export { RARITIES, ITEM_CATEGORIES } from './item-types';

export type { StoredRecipe, StoredRecipeCollection, ImportReport } from './recipe-types';

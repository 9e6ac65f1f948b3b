export {
  raritySchema,
  inventoryItemSchema,
  type InventoryItemInput,
} from './item-schema';

export {
  storedRecipeSchema,
  storedRecipeCollectionSchema,
  type StoredRecipeInput,
  type StoredRecipeCollectionInput,
} from './recipe-schema';

export {
  excelTableModelSchema,
  excelTableEntrySchema,
  definedNameSchema,
  definedNamesModelSchema,
  type ExcelTableModel,
  type DefinedNameModel,
} from './workbook-schema';

export { SHEET_LIMITS, FILE_LIMITS, RECIPE_LIMITS, IMPORT_TABLES } from './limits';

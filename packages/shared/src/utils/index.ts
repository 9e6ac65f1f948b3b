export {
  colIndexToLetter,
  letterToColIndex,
  parseCellRef,
  buildCellRef,
  parseAreaRef,
  buildAreaRef,
  parseQualifiedRef,
  buildQualifiedRef,
} from './cell-utils';

export { isBlank, looseKey, compareOrdinal, sanitizeFileName } from './text-utils';

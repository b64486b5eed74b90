export {
  colNumberToLetter,
  letterToColNumber,
  parseCellRef,
  buildCellRef,
  parseRangeRef,
  isBlank,
  cellKind,
  textOf,
  toFieldName,
  type CellKind,
} from './cell-utils';

export { uniquifyFieldNames, buildClientId } from './field-names';

export {
  serializeDocument,
  parseDocument,
  sectionFieldNames,
  summarizeDocument,
} from './document-utils';

export type {
  RawCellValue,
  CellValue,
  Alignment,
  BorderEdge,
  BorderConfig,
  CellFormat,
  CellCoordinate,
  RawCell,
  CellRange,
  MergeRange,
  RawSheet,
} from './cell-types';
export { ALIGNMENTS } from './cell-types';

export type {
  SectionType,
  SectionRegion,
  SectionFormatting,
  SectionRecord,
  KeyValuePayload,
  TablePayload,
  ComplexHeaderPayload,
  RawPayload,
  KeyValueSection,
  TableSection,
  ComplexHeaderSection,
  RawSection,
  Section,
  SheetResult,
  ClientIdentity,
  FileMetadata,
  FileInfo,
  ProcessingMetadata,
  ClientDocument,
  SheetSummary,
  DocumentSummary,
} from './document-types';
export { SECTION_TYPES } from './document-types';

export type { ApiResponse, ApiError } from './api-types';

import type { CellValue } from './cell-types';

/** Structural section types, in classifier priority order */
export const SECTION_TYPES = ['complex_header', 'key_value', 'table', 'raw'] as const;
export type SectionType = (typeof SECTION_TYPES)[number];

/** Sheet region a section was read from (1-based, inclusive) */
export interface SectionRegion {
  start_row: number;
  end_row: number;
  start_col: number;
  end_col: number;
}

/** Formatting observed on the first row of a section body */
export interface SectionFormatting {
  bold: boolean;
  italic: boolean;
  fill_color: string | null;
  font_color: string | null;
  has_border: boolean;
}

/** One extracted data row with its sheet row number */
export interface SectionRecord {
  row_number: number;
  /** Keyed by header; column order is the section's `headers`, not key order */
  values: Record<string, CellValue>;
}

export interface KeyValuePayload {
  /** Keys in sheet row order */
  fields: string[];
  /** Integer-like keys enumerate first in JS objects; read order from `fields` */
  data: Record<string, CellValue>;
}

export interface TablePayload {
  headers: string[];
  records: SectionRecord[];
}

export interface ComplexHeaderPayload {
  header_levels: number;
  headers: string[];
  records: SectionRecord[];
}

export interface RawPayload {
  cells: CellValue[][];
}

interface SectionBase {
  section_id: string;
  section_header: string | null;
  region: SectionRegion;
  confidence: number;
  formatting: SectionFormatting | null;
}

export interface KeyValueSection extends SectionBase {
  section_type: 'key_value';
  payload: KeyValuePayload;
}

export interface TableSection extends SectionBase {
  section_type: 'table';
  payload: TablePayload;
}

export interface ComplexHeaderSection extends SectionBase {
  section_type: 'complex_header';
  payload: ComplexHeaderPayload;
}

export interface RawSection extends SectionBase {
  section_type: 'raw';
  payload: RawPayload;
}

export type Section = KeyValueSection | TableSection | ComplexHeaderSection | RawSection;

export interface SheetResult {
  sheet_name: string;
  sections: Section[];
}

/** Client identity resolved upstream by the file selector */
export interface ClientIdentity {
  client_id?: string;
  country: string | null;
  client_name: string | null;
  product: string | null;
}

/** File metadata resolved upstream by the file selector */
export interface FileMetadata {
  filename?: string;
  extracted_date?: string | null;
  is_latest?: boolean;
  form_variant?: string | null;
}

export interface FileInfo {
  file_path: string | null;
  filename: string | null;
  extracted_date: string | null;
  is_latest: boolean;
  form_variant: string | null;
}

export interface ProcessingMetadata {
  processed_at: string;
  status: 'success';
  engine_version: string;
  warnings: string[];
}

/** Structured document produced for one workbook */
export interface ClientDocument {
  client_id: string;
  client_name: string | null;
  country: string | null;
  product: string | null;
  file_info: FileInfo;
  sheets: SheetResult[];
  pattern_signature: string;
  processing_metadata: ProcessingMetadata;
}

/** Per-sheet overview used for quick inspection of a document */
export interface SheetSummary {
  sheet_name: string;
  section_count: number;
  section_types: Record<SectionType, number>;
  sample_records: Array<Record<string, CellValue>>;
}

export interface DocumentSummary {
  client_id: string;
  pattern_signature: string;
  total_sheets: number;
  total_sections: number;
  sheets: SheetSummary[];
}

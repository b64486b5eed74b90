import { SUMMARY_SAMPLE_RECORDS } from '../constants/limits';
import { clientDocumentSchema } from '../schemas/document-schema';
import type { CellValue } from '../types/cell-types';
import type {
  ClientDocument,
  DocumentSummary,
  Section,
  SectionType,
  SheetSummary,
} from '../types/document-types';

/** Serialize a document to the JSON form storage persists verbatim */
export function serializeDocument(doc: ClientDocument): string {
  return JSON.stringify(doc);
}

/**
 * Parse and validate a serialized document.
 * Throws a ZodError when the JSON does not match the document shape.
 */
export function parseDocument(json: string): ClientDocument {
  const raw: unknown = JSON.parse(json);
  return clientDocumentSchema.parse(raw);
}

/** Field names a section contributes to the document's structure */
export function sectionFieldNames(section: Section): string[] {
  switch (section.section_type) {
    case 'key_value':
      return section.payload.fields;
    case 'table':
    case 'complex_header':
      return section.payload.headers;
    case 'raw':
      return [];
  }
}

function sectionRecords(section: Section): Array<Record<string, CellValue>> {
  switch (section.section_type) {
    case 'key_value':
      return [section.payload.data];
    case 'table':
    case 'complex_header':
      return section.payload.records.map((r) => r.values);
    case 'raw':
      return [];
  }
}

/** Per-sheet section counts and a few sample records */
export function summarizeDocument(doc: ClientDocument): DocumentSummary {
  const sheets: SheetSummary[] = doc.sheets.map((sheet) => {
    const sectionTypes: Record<SectionType, number> = { complex_header: 0, key_value: 0, table: 0, raw: 0 };
    for (const section of sheet.sections) {
      sectionTypes[section.section_type]++;
    }
    return {
      sheet_name: sheet.sheet_name,
      section_count: sheet.sections.length,
      section_types: sectionTypes,
      sample_records: sheet.sections.flatMap(sectionRecords).slice(0, SUMMARY_SAMPLE_RECORDS),
    };
  });

  return {
    client_id: doc.client_id,
    pattern_signature: doc.pattern_signature,
    total_sheets: doc.sheets.length,
    total_sections: sheets.reduce((sum, s) => sum + s.section_count, 0),
    sheets,
  };
}

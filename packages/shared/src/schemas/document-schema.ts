import { z } from 'zod';
import type { ClientDocument, Section } from '../types/document-types';

export const cellValueSchema = z.union([z.string(), z.number(), z.null()]);

export const sectionRegionSchema = z.object({
  start_row: z.number().int().min(1),
  end_row: z.number().int().min(1),
  start_col: z.number().int().min(1),
  end_col: z.number().int().min(1),
}).refine(
  (r) => r.end_row >= r.start_row && r.end_col >= r.start_col,
  { message: 'End must be >= start in region' },
);

export const sectionFormattingSchema = z.object({
  bold: z.boolean(),
  italic: z.boolean(),
  fill_color: z.string().nullable(),
  font_color: z.string().nullable(),
  has_border: z.boolean(),
});

const sectionRecordSchema = z.object({
  row_number: z.number().int().min(1),
  values: z.record(cellValueSchema),
});

const sectionBase = {
  section_id: z.string().min(1),
  section_header: z.string().nullable(),
  region: sectionRegionSchema,
  confidence: z.number().min(0).max(1),
  formatting: sectionFormattingSchema.nullable(),
};

export const sectionSchema: z.ZodType<Section> = z.discriminatedUnion('section_type', [
  z.object({
    ...sectionBase,
    section_type: z.literal('key_value'),
    payload: z.object({
      fields: z.array(z.string()),
      data: z.record(cellValueSchema),
    }),
  }),
  z.object({
    ...sectionBase,
    section_type: z.literal('table'),
    payload: z.object({
      headers: z.array(z.string()),
      records: z.array(sectionRecordSchema),
    }),
  }),
  z.object({
    ...sectionBase,
    section_type: z.literal('complex_header'),
    payload: z.object({
      header_levels: z.number().int().min(1),
      headers: z.array(z.string()),
      records: z.array(sectionRecordSchema),
    }),
  }),
  z.object({
    ...sectionBase,
    section_type: z.literal('raw'),
    payload: z.object({
      cells: z.array(z.array(cellValueSchema)),
    }),
  }),
]);

export const clientDocumentSchema: z.ZodType<ClientDocument> = z.object({
  client_id: z.string().min(1),
  client_name: z.string().nullable(),
  country: z.string().nullable(),
  product: z.string().nullable(),
  file_info: z.object({
    file_path: z.string().nullable(),
    filename: z.string().nullable(),
    extracted_date: z.string().nullable(),
    is_latest: z.boolean(),
    form_variant: z.string().nullable(),
  }),
  sheets: z.array(
    z.object({
      sheet_name: z.string(),
      sections: z.array(sectionSchema),
    }),
  ),
  pattern_signature: z.string().regex(/^[0-9a-f]{32}$/),
  processing_metadata: z.object({
    processed_at: z.string().datetime(),
    status: z.literal('success'),
    engine_version: z.string(),
    warnings: z.array(z.string()),
  }),
});

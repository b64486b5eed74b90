import { z } from 'zod';

const optionalText = z
  .string()
  .trim()
  .transform((s) => (s === '' ? null : s))
  .nullable()
  .optional()
  .transform((s) => s ?? null);

/** Client identity and file metadata supplied alongside a workbook */
export const extractionRequestSchema = z.object({
  client_id: z.string().trim().min(1).max(200).optional(),
  country: optionalText,
  client_name: optionalText,
  product: optionalText,
  extracted_date: z
    .string()
    .refine((s) => !isNaN(Date.parse(s)), { message: 'Invalid date' })
    .nullable()
    .optional()
    .transform((s) => s ?? null),
  is_latest: z
    .union([z.boolean(), z.enum(['true', 'false'])])
    .optional()
    .transform((v) => v === true || v === 'true'),
  form_variant: optionalText,
});

export type ExtractionRequestInput = z.input<typeof extractionRequestSchema>;
export type ExtractionRequest = z.output<typeof extractionRequestSchema>;

import { z } from 'zod';
import { CLASSIFIER_WEIGHTS, GRID_LIMITS, HEADER_LIMITS } from '@sheetstruct/shared';

const weight = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().int().min(1).max(200).default(50),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(120_000),
  EXTRACTION_MAX_ROWS: z.coerce.number().int().min(1).default(GRID_LIMITS.MAX_ROWS),
  EXTRACTION_MAX_COLS: z.coerce.number().int().min(1).default(GRID_LIMITS.MAX_COLS),
  EXTRACTION_MAX_CELLS: z.coerce.number().int().min(1).default(GRID_LIMITS.MAX_CELLS),
  EXTRACTION_MAX_HEADER_ROWS: z.coerce.number().int().min(1).max(10).default(HEADER_LIMITS.MAX_HEADER_ROWS),
  EXTRACTION_COMPLEX_HEADER_SCAN_ROWS: z.coerce.number().int().min(1).max(10).default(CLASSIFIER_WEIGHTS.COMPLEX_HEADER_SCAN_ROWS),
  EXTRACTION_COMPLEX_HEADER_BASE: weight(CLASSIFIER_WEIGHTS.COMPLEX_HEADER_BASE),
  EXTRACTION_COMPLEX_HEADER_MULTI_ROW_BONUS: weight(CLASSIFIER_WEIGHTS.COMPLEX_HEADER_MULTI_ROW_BONUS),
  EXTRACTION_KEY_VALUE_MAX_COLUMNS: z.coerce.number().int().min(1).default(CLASSIFIER_WEIGHTS.KEY_VALUE_MAX_COLUMNS),
  EXTRACTION_KEY_VALUE_MIN_TEXT_RATIO: weight(CLASSIFIER_WEIGHTS.KEY_VALUE_MIN_TEXT_RATIO),
  EXTRACTION_KEY_VALUE_PLAIN_BONUS: weight(CLASSIFIER_WEIGHTS.KEY_VALUE_PLAIN_BONUS),
  EXTRACTION_TABLE_BASE: weight(CLASSIFIER_WEIGHTS.TABLE_BASE),
  EXTRACTION_TABLE_FORMATTED_HEADER_BONUS: weight(CLASSIFIER_WEIGHTS.TABLE_FORMATTED_HEADER_BONUS),
  EXTRACTION_TABLE_UNIQUE_HEADER_BONUS: weight(CLASSIFIER_WEIGHTS.TABLE_UNIQUE_HEADER_BONUS),
  EXTRACTION_MIN_CONFIDENCE: weight(CLASSIFIER_WEIGHTS.MIN_CONFIDENCE),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}

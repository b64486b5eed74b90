import { CLASSIFIER_WEIGHTS, GRID_LIMITS, HEADER_LIMITS } from '@sheetstruct/shared';
import type { EnvConfig } from '../../config/env.config';

export const EXTRACTION_CONFIG = 'EXTRACTION_CONFIG';

export type ClassifierWeights = { -readonly [K in keyof typeof CLASSIFIER_WEIGHTS]: number };

/** Tunables shared by every stage of the extraction engine */
export interface ExtractionConfig {
  weights: ClassifierWeights;
  maxHeaderRows: number;
  maxRows: number;
  maxCols: number;
  maxCells: number;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  weights: { ...CLASSIFIER_WEIGHTS },
  maxHeaderRows: HEADER_LIMITS.MAX_HEADER_ROWS,
  maxRows: GRID_LIMITS.MAX_ROWS,
  maxCols: GRID_LIMITS.MAX_COLS,
  maxCells: GRID_LIMITS.MAX_CELLS,
};

export function buildExtractionConfig(env: EnvConfig): ExtractionConfig {
  return {
    weights: {
      COMPLEX_HEADER_SCAN_ROWS: env.EXTRACTION_COMPLEX_HEADER_SCAN_ROWS,
      COMPLEX_HEADER_BASE: env.EXTRACTION_COMPLEX_HEADER_BASE,
      COMPLEX_HEADER_MULTI_ROW_BONUS: env.EXTRACTION_COMPLEX_HEADER_MULTI_ROW_BONUS,
      KEY_VALUE_MAX_COLUMNS: env.EXTRACTION_KEY_VALUE_MAX_COLUMNS,
      KEY_VALUE_MIN_TEXT_RATIO: env.EXTRACTION_KEY_VALUE_MIN_TEXT_RATIO,
      KEY_VALUE_PLAIN_BONUS: env.EXTRACTION_KEY_VALUE_PLAIN_BONUS,
      TABLE_BASE: env.EXTRACTION_TABLE_BASE,
      TABLE_FORMATTED_HEADER_BONUS: env.EXTRACTION_TABLE_FORMATTED_HEADER_BONUS,
      TABLE_UNIQUE_HEADER_BONUS: env.EXTRACTION_TABLE_UNIQUE_HEADER_BONUS,
      MIN_CONFIDENCE: env.EXTRACTION_MIN_CONFIDENCE,
    },
    maxHeaderRows: env.EXTRACTION_MAX_HEADER_ROWS,
    maxRows: env.EXTRACTION_MAX_ROWS,
    maxCols: env.EXTRACTION_MAX_COLS,
    maxCells: env.EXTRACTION_MAX_CELLS,
  };
}

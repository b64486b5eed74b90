/**
 * Classifier confidence weights. Heuristic constants, not a fitted model;
 * every value can be overridden through the EXTRACTION_* environment.
 */
export const CLASSIFIER_WEIGHTS = {
  /** Rows from the top of a span scanned for merges */
  COMPLEX_HEADER_SCAN_ROWS: 3,
  COMPLEX_HEADER_BASE: 0.8,
  COMPLEX_HEADER_MULTI_ROW_BONUS: 0.2,
  KEY_VALUE_MAX_COLUMNS: 2,
  KEY_VALUE_MIN_TEXT_RATIO: 0.7,
  KEY_VALUE_PLAIN_BONUS: 0.1,
  TABLE_BASE: 0.5,
  TABLE_FORMATTED_HEADER_BONUS: 0.2,
  TABLE_UNIQUE_HEADER_BONUS: 0.3,
  /** Below this a span falls back to raw */
  MIN_CONFIDENCE: 0.3,
} as const;

/** Header resolution limits */
export const HEADER_LIMITS = {
  MAX_HEADER_ROWS: 3,
  PLACEHOLDER_PREFIX: 'Column',
  KEY_PLACEHOLDER_PREFIX: 'Field',
} as const;

/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
} as const;

/** Bounds on the work one invocation may do per sheet */
export const GRID_LIMITS = {
  MAX_ROWS: 100_000,
  MAX_COLS: 1_000,
  MAX_CELLS: 2_000_000,
} as const;

/** Upload and file limits */
export const FILE_LIMITS = {
  MAX_UPLOAD_SIZE_BYTES: 50 * 1024 * 1024, // 50MB
  ALLOWED_EXTENSIONS: ['.xlsx', '.xlsm', '.csv'] as const,
} as const;

/** Number of records sampled per sheet in a document summary */
export const SUMMARY_SAMPLE_RECORDS = 3;

export const ENGINE_VERSION = '1.0.0';

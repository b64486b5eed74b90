export {
  CLASSIFIER_WEIGHTS,
  HEADER_LIMITS,
  SHEET_LIMITS,
  GRID_LIMITS,
  FILE_LIMITS,
  SUMMARY_SAMPLE_RECORDS,
  ENGINE_VERSION,
} from './limits';

export {
  cellValueSchema,
  sectionRegionSchema,
  sectionFormattingSchema,
  sectionSchema,
  clientDocumentSchema,
} from './document-schema';

export {
  extractionRequestSchema,
  type ExtractionRequestInput,
  type ExtractionRequest,
} from './identity-schema';

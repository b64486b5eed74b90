import { Module } from '@nestjs/common';
import { validateEnv } from '../../config/env.config';
import { DocumentAssemblerService } from './document-assembler.service';
import { EXTRACTION_CONFIG, buildExtractionConfig } from './extraction.config';
import { ExtractionController } from './extraction.controller';
import { ExtractionService } from './extraction.service';
import { FingerprintService } from './fingerprint.service';
import { GridBuilderService } from './grid-builder.service';
import { HeaderResolverService } from './header-resolver.service';
import { RecordExtractorService } from './record-extractor.service';
import { SectionClassifierService } from './section-classifier.service';
import { SectionSegmenterService } from './section-segmenter.service';
import { ValueNormalizerService } from './value-normalizer.service';
import { WorkbookReaderService } from './workbook-reader.service';

@Module({
  controllers: [ExtractionController],
  providers: [
    { provide: EXTRACTION_CONFIG, useFactory: () => buildExtractionConfig(validateEnv()) },
    WorkbookReaderService,
    GridBuilderService,
    SectionSegmenterService,
    HeaderResolverService,
    SectionClassifierService,
    ValueNormalizerService,
    RecordExtractorService,
    FingerprintService,
    DocumentAssemblerService,
    ExtractionService,
  ],
  exports: [ExtractionService],
})
export class ExtractionModule {}

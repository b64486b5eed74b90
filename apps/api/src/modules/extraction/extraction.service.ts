import { basename } from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { buildCellRef } from '@sheetstruct/shared';
import type { ClientDocument, ClientIdentity, FileMetadata, MergeRange, RawSheet } from '@sheetstruct/shared';
import { DocumentAssemblerService } from './document-assembler.service';
import { ExtractionError, classifyFailure } from './extraction.errors';
import { GridBuilderService } from './grid-builder.service';
import { RecordExtractorService } from './record-extractor.service';
import { SectionClassifierService } from './section-classifier.service';
import { SectionSegmenterService } from './section-segmenter.service';
import { WorkbookReaderService } from './workbook-reader.service';
import type { ExtractedSheet, SectionDraft, Span } from './extraction.types';

/** Identity and file metadata resolved upstream for one workbook */
export type ExtractionIdentity = ClientIdentity & FileMetadata;

export interface ExtractionOptions {
  signal?: AbortSignal;
  filePath?: string | null;
  processedAt?: Date;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    private readonly reader: WorkbookReaderService,
    private readonly gridBuilder: GridBuilderService,
    private readonly segmenter: SectionSegmenterService,
    private readonly classifier: SectionClassifierService,
    private readonly recordExtractor: RecordExtractorService,
    private readonly assembler: DocumentAssemblerService,
  ) {}

  async extractFile(filePath: string, identity: ExtractionIdentity, options: ExtractionOptions = {}): Promise<ClientDocument> {
    try {
      const sheets = await this.reader.readFile(filePath);
      return this.extractSheets(sheets, { filename: basename(filePath), ...identity }, { ...options, filePath });
    } catch (err) {
      throw this.toExtractionError(err);
    }
  }

  async extractBuffer(
    buffer: Buffer,
    filename: string,
    identity: ExtractionIdentity,
    options: ExtractionOptions = {},
  ): Promise<ClientDocument> {
    try {
      const sheets = await this.reader.readBuffer(buffer, filename);
      return this.extractSheets(sheets, { filename, ...identity }, options);
    } catch (err) {
      throw this.toExtractionError(err);
    }
  }

  /** Run the engine over already-read sheets; synchronous apart from the abort checks */
  extractSheets(rawSheets: readonly RawSheet[], identity: ExtractionIdentity, options: ExtractionOptions = {}): ClientDocument {
    const started = Date.now();
    const extracted: ExtractedSheet[] = [];

    for (const sheet of rawSheets) {
      this.throwIfAborted(options.signal);
      extracted.push(this.extractSheet(sheet));
    }

    const { client_id, country, client_name, product, ...file } = identity;
    const document = this.assembler.assemble(extracted, {
      identity: { client_id, country, client_name, product },
      file,
      filePath: options.filePath ?? null,
      processedAt: options.processedAt,
    });

    const sectionCount = document.sheets.reduce((sum, s) => sum + s.sections.length, 0);
    this.logger.log(
      `Extracted ${document.client_id}: ${document.sheets.length} sheets, ${sectionCount} sections, ` +
        `signature ${document.pattern_signature} (${Date.now() - started}ms)`,
    );
    return document;
  }

  extractSheet(sheet: RawSheet): ExtractedSheet {
    const grid = this.gridBuilder.build(sheet);
    const warnings: string[] = grid.droppedMerges.map(
      (m) => `Sheet "${sheet.name}": dropped malformed merge range ${formatRange(m)}`,
    );
    if (grid.truncated) {
      warnings.push(`Sheet "${sheet.name}": truncated to ${grid.rowCount} rows x ${grid.colCount} columns`);
    }

    const sections: SectionDraft[] = this.segmenter.segment(grid).map((span) => {
      const classification = this.classifier.classify(grid, span);
      const content = this.recordExtractor.extract(grid, classification);
      this.logger.debug(
        `Sheet "${sheet.name}" rows ${span.startRow}-${span.endRow}: ${content.section_type} (${classification.confidence})`,
      );
      return {
        ...content,
        section_header: classification.header,
        region: toRegion(span),
        confidence: classification.confidence,
        formatting: classification.formatting,
      };
    });

    return { sheetName: sheet.name, sections, warnings };
  }

  /** Map any failure to an ExtractionError, keeping an existing one as is */
  toExtractionError(error: unknown): ExtractionError {
    if (error instanceof ExtractionError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ExtractionError(classifyFailure(error), message, { cause: error });
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (!signal?.aborted) return;
    const reason: unknown = signal.reason;
    if (classifyFailure(reason) === 'timeout') {
      throw ExtractionError.timeout('Extraction timed out', reason);
    }
    throw ExtractionError.other('Extraction aborted', reason);
  }
}

function toRegion(span: Span): SectionDraft['region'] {
  return {
    start_row: span.startRow,
    end_row: Math.max(span.startRow, span.endRow),
    start_col: span.startCol,
    end_col: Math.max(span.startCol, span.endCol),
  };
}

function formatRange(m: MergeRange): string {
  return `${buildCellRef(m.startRow, m.startCol)}:${buildCellRef(m.endRow, m.endCol)}`;
}

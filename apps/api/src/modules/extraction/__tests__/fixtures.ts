import { parseCellRef } from '@sheetstruct/shared';
import type { CellFormat, MergeRange, RawCell, RawCellValue, RawSheet } from '@sheetstruct/shared';
import { DocumentAssemblerService } from '../document-assembler.service';
import { DEFAULT_EXTRACTION_CONFIG, type ExtractionConfig } from '../extraction.config';
import { ExtractionService } from '../extraction.service';
import { FingerprintService } from '../fingerprint.service';
import { GridBuilderService } from '../grid-builder.service';
import { HeaderResolverService } from '../header-resolver.service';
import { RecordExtractorService } from '../record-extractor.service';
import { SectionClassifierService } from '../section-classifier.service';
import { SectionSegmenterService } from '../section-segmenter.service';
import { ValueNormalizerService } from '../value-normalizer.service';
import { WorkbookReaderService } from '../workbook-reader.service';

interface SheetOptions {
  name?: string;
  merges?: MergeRange[];
  /** Formats keyed by A1 reference */
  formats?: Record<string, CellFormat>;
}

/** Build a raw sheet from row arrays; null leaves the cell unset */
export function rawSheet(rows: RawCellValue[][], options: SheetOptions = {}): RawSheet {
  const formats = new Map<string, CellFormat>();
  for (const [ref, format] of Object.entries(options.formats ?? {})) {
    const { row, col } = parseCellRef(ref);
    formats.set(`${row}:${col}`, format);
  }

  const cells: RawCell[] = [];
  rows.forEach((values, r) => {
    values.forEach((value, c) => {
      const format = formats.get(`${r + 1}:${c + 1}`);
      if (value === null && !format) return;
      cells.push(format ? { row: r + 1, col: c + 1, value, format } : { row: r + 1, col: c + 1, value });
    });
  });

  return {
    name: options.name ?? 'Sheet1',
    rowCount: rows.length,
    colCount: Math.max(0, ...rows.map((r) => r.length)),
    cells,
    merges: options.merges ?? [],
  };
}

export function merge(startRow: number, startCol: number, endRow: number, endCol: number): MergeRange {
  return { startRow, startCol, endRow, endCol };
}

/** Wire the engine by hand, the way the Nest container would */
export function createEngine(config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG) {
  const headers = new HeaderResolverService(config);
  const normalizer = new ValueNormalizerService();
  const gridBuilder = new GridBuilderService(config);
  const segmenter = new SectionSegmenterService();
  const classifier = new SectionClassifierService(config, headers);
  const recordExtractor = new RecordExtractorService(headers, normalizer);
  const fingerprint = new FingerprintService();
  const assembler = new DocumentAssemblerService(fingerprint);
  const reader = new WorkbookReaderService();
  const extraction = new ExtractionService(reader, gridBuilder, segmenter, classifier, recordExtractor, assembler);

  return { headers, normalizer, gridBuilder, segmenter, classifier, recordExtractor, fingerprint, assembler, reader, extraction };
}

export function withWeights(overrides: Partial<ExtractionConfig['weights']>): ExtractionConfig {
  return { ...DEFAULT_EXTRACTION_CONFIG, weights: { ...DEFAULT_EXTRACTION_CONFIG.weights, ...overrides } };
}

export const IDENTITY = { country: 'US', client_name: 'Acme', product: 'Loans' } as const;

import { isBlank } from '@sheetstruct/shared';
import type {
  CellFormat,
  MergeRange,
  RawCellValue,
  SectionFormatting,
  SectionType,
  ComplexHeaderPayload,
  KeyValuePayload,
  RawPayload,
  TablePayload,
  Section,
} from '@sheetstruct/shared';

/**
 * Dense, merge-resolved cell grid for one sheet.
 * `values[r - 1][c - 1]` holds the value at 1-based (r, c).
 */
export interface Grid {
  sheetName: string;
  rowCount: number;
  colCount: number;
  values: RawCellValue[][];
  formats: Array<Array<CellFormat | undefined>>;
  merges: MergeRange[];
  droppedMerges: MergeRange[];
  truncated: boolean;
}

/** Inclusive, 1-based block of rows and columns within a grid */
export interface Span {
  startRow: number;
  endRow: number;
  startCol: number;
  endCol: number;
}

export interface Classification {
  type: SectionType;
  confidence: number;
  /** Single-label title row above the body, if any */
  header: string | null;
  /** Rows and occupied columns below the title (the whole span for raw); null when degenerate */
  body: Span | null;
  headerRows: number;
  formatting: SectionFormatting | null;
}

export type SectionContent =
  | { section_type: 'key_value'; payload: KeyValuePayload }
  | { section_type: 'table'; payload: TablePayload }
  | { section_type: 'complex_header'; payload: ComplexHeaderPayload }
  | { section_type: 'raw'; payload: RawPayload };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A section before the assembler assigns its id */
export type SectionDraft = DistributiveOmit<Section, 'section_id'>;

export interface ExtractedSheet {
  sheetName: string;
  sections: SectionDraft[];
  warnings: string[];
}

export function cellAt(grid: Grid, row: number, col: number): RawCellValue {
  return grid.values[row - 1]?.[col - 1] ?? null;
}

export function formatAt(grid: Grid, row: number, col: number): CellFormat | undefined {
  return grid.formats[row - 1]?.[col - 1];
}

/** Values of one row restricted to a column range */
export function rowValues(grid: Grid, row: number, startCol: number, endCol: number): RawCellValue[] {
  const values: RawCellValue[] = [];
  for (let c = startCol; c <= endCol; c++) values.push(cellAt(grid, row, c));
  return values;
}

export function spanWidth(span: Span): number {
  return span.endCol - span.startCol + 1;
}

export function spanHeight(span: Span): number {
  return span.endRow - span.startRow + 1;
}

/** True when a merge covers more than one cell and overlaps the given rows/columns */
export function mergeIntersects(merge: MergeRange, span: Span): boolean {
  const multiCell = merge.endRow > merge.startRow || merge.endCol > merge.startCol;
  return (
    multiCell &&
    merge.startRow <= span.endRow &&
    merge.endRow >= span.startRow &&
    merge.startCol <= span.endCol &&
    merge.endCol >= span.startCol
  );
}

/** Occupied column extent of a row range, or null when every cell is blank */
export function occupiedColumns(
  grid: Grid,
  startRow: number,
  endRow: number,
): { startCol: number; endCol: number } | null {
  let startCol = Infinity;
  let endCol = 0;
  for (let row = startRow; row <= endRow; row++) {
    for (let col = 1; col <= grid.colCount; col++) {
      if (isBlank(cellAt(grid, row, col))) continue;
      startCol = Math.min(startCol, col);
      endCol = Math.max(endCol, col);
    }
  }
  return endCol === 0 ? null : { startCol, endCol };
}

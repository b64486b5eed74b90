/** Cell value as read from a workbook, before normalization */
export type RawCellValue = string | number | boolean | Date | null;

/** Portable cell value after normalization */
export type CellValue = string | number | null;

/** Text alignment options */
export const ALIGNMENTS = ['left', 'center', 'right'] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

/** Border style for a single edge */
export interface BorderEdge {
  style: string;
  color?: string;
}

/** Full border configuration */
export interface BorderConfig {
  top?: BorderEdge;
  right?: BorderEdge;
  bottom?: BorderEdge;
  left?: BorderEdge;
}

/** Cell formatting */
export interface CellFormat {
  bold?: boolean;
  italic?: boolean;
  fontSize?: number;
  fontColor?: string;
  bgColor?: string;
  numberFormat?: string;
  alignment?: Alignment;
  border?: BorderConfig;
}

/** 1-based cell position */
export interface CellCoordinate {
  readonly row: number;
  readonly col: number;
}

/** Single populated cell of a raw sheet */
export interface RawCell extends CellCoordinate {
  value: RawCellValue;
  format?: CellFormat;
}

/** Inclusive, 1-based rectangular range */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** Merge range; the top-left cell owns the value */
export interface MergeRange extends CellRange {}

/** One worksheet as handed to the extraction engine */
export interface RawSheet {
  name: string;
  rowCount: number;
  colCount: number;
  cells: RawCell[];
  merges: MergeRange[];
}

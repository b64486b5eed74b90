import { Inject, Injectable } from '@nestjs/common';
import { cellKind, isBlank, toFieldName, uniquifyFieldNames } from '@sheetstruct/shared';
import { EXTRACTION_CONFIG, type ExtractionConfig } from './extraction.config';
import {
  cellAt,
  formatAt,
  mergeIntersects,
  spanHeight,
  type Grid,
  type Span,
} from './extraction.types';

/**
 * Turns header rows into a linear list of field names.
 *
 * Names are sanitized to field-name form, blanks become `Column_<n>` and
 * repeats are numbered left to right. Resolution never fails.
 */
@Injectable()
export class HeaderResolverService {
  constructor(@Inject(EXTRACTION_CONFIG) private readonly config: ExtractionConfig) {}

  /** Single header row: the first row of the body */
  resolveTableHeaders(grid: Grid, body: Span): string[] {
    return this.flattenHeaders(grid, body, 1);
  }

  /**
   * Multi-row header: per column, labels are joined top-down with `_`,
   * skipping labels the column already collected (merge-propagated repeats).
   */
  flattenHeaders(grid: Grid, body: Span, headerRows: number): string[] {
    const names: string[] = [];
    const lastHeaderRow = Math.min(body.endRow, body.startRow + Math.max(1, headerRows) - 1);

    for (let col = body.startCol; col <= body.endCol; col++) {
      const parts: string[] = [];
      for (let row = body.startRow; row <= lastHeaderRow; row++) {
        const label = toFieldName(cellAt(grid, row, col));
        if (label && !parts.includes(label)) parts.push(label);
      }
      names.push(parts.join('_'));
    }

    return uniquifyFieldNames(names);
  }

  /**
   * Rows consumed by the header before the first data-shaped row.
   *
   * The first row always counts. A following row continues the header while
   * it touches a merge, carries header formatting, or is a text-only leaf
   * row directly under a merged row.
   */
  countHeaderRows(grid: Grid, body: Span): number {
    const limit = Math.min(this.config.maxHeaderRows, spanHeight(body));
    let count = 1;

    while (count < limit) {
      const row = body.startRow + count;
      const continuesHeader =
        this.rowTouchesMerge(grid, body, row) ||
        this.isHeaderFormatted(grid, row, body.startCol, body.endCol) ||
        (this.rowTouchesMerge(grid, body, row - 1) && this.isTextOnlyRow(grid, row, body.startCol, body.endCol));
      if (!continuesHeader) break;
      count++;
    }

    return count;
  }

  /** More than half of the row's populated cells are bold or filled */
  isHeaderFormatted(grid: Grid, row: number, startCol: number, endCol: number): boolean {
    let populated = 0;
    let styled = 0;
    for (let col = startCol; col <= endCol; col++) {
      if (isBlank(cellAt(grid, row, col))) continue;
      populated++;
      const format = formatAt(grid, row, col);
      if (format?.bold || format?.bgColor) styled++;
    }
    return populated > 0 && styled * 2 > populated;
  }

  private isTextOnlyRow(grid: Grid, row: number, startCol: number, endCol: number): boolean {
    let populated = 0;
    for (let col = startCol; col <= endCol; col++) {
      const kind = cellKind(cellAt(grid, row, col));
      if (kind === 'blank') continue;
      if (kind !== 'text') return false;
      populated++;
    }
    return populated > 0;
  }

  private rowTouchesMerge(grid: Grid, body: Span, row: number): boolean {
    const band: Span = { startRow: row, endRow: row, startCol: body.startCol, endCol: body.endCol };
    return grid.merges.some((m) => mergeIntersects(m, band));
  }
}

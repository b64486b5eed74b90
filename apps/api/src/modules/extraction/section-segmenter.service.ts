import { Injectable } from '@nestjs/common';
import { isBlank } from '@sheetstruct/shared';
import { cellAt, occupiedColumns, type Grid, type Span } from './extraction.types';

@Injectable()
export class SectionSegmenterService {
  /**
   * Split a grid into row spans separated by empty rows.
   * Runs of empty rows collapse into one separator; leading and trailing
   * runs produce nothing. Each span's columns are narrowed to the columns
   * its rows actually occupy.
   */
  segment(grid: Grid): Span[] {
    const spans: Span[] = [];
    let start: number | null = null;

    for (let row = 1; row <= grid.rowCount; row++) {
      if (!this.isEmptyRow(grid, row)) {
        if (start === null) start = row;
        continue;
      }
      if (start !== null) {
        spans.push(this.toSpan(grid, start, row - 1));
        start = null;
      }
    }

    if (start !== null) {
      spans.push(this.toSpan(grid, start, grid.rowCount));
    }

    return spans;
  }

  isEmptyRow(grid: Grid, row: number): boolean {
    for (let col = 1; col <= grid.colCount; col++) {
      if (!isBlank(cellAt(grid, row, col))) return false;
    }
    return true;
  }

  private toSpan(grid: Grid, startRow: number, endRow: number): Span {
    const cols = occupiedColumns(grid, startRow, endRow);
    return {
      startRow,
      endRow,
      startCol: cols?.startCol ?? 1,
      endCol: cols?.endCol ?? 0,
    };
  }
}

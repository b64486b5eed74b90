import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CellFormat, MergeRange, RawCellValue, RawSheet } from '@sheetstruct/shared';
import { EXTRACTION_CONFIG, type ExtractionConfig } from './extraction.config';
import type { Grid } from './extraction.types';

@Injectable()
export class GridBuilderService {
  private readonly logger = new Logger(GridBuilderService.name);

  constructor(@Inject(EXTRACTION_CONFIG) private readonly config: ExtractionConfig) {}

  /**
   * Build the dense grid for one sheet. Every coordinate of a valid merge
   * resolves to the top-left value and format; inverted or out-of-bounds
   * merges are dropped and reported on the grid. The input is not mutated.
   */
  build(sheet: RawSheet): Grid {
    const colCount = Math.max(0, Math.min(sheet.colCount, this.config.maxCols));
    const rowBudget = colCount > 0 ? Math.floor(this.config.maxCells / colCount) : this.config.maxRows;
    const rowCount = Math.max(0, Math.min(sheet.rowCount, this.config.maxRows, rowBudget));
    let truncated = rowCount < sheet.rowCount || colCount < sheet.colCount;

    const values: RawCellValue[][] = Array.from({ length: rowCount }, () =>
      new Array<RawCellValue>(colCount).fill(null),
    );
    const formats: Array<Array<CellFormat | undefined>> = Array.from({ length: rowCount }, () =>
      new Array<CellFormat | undefined>(colCount).fill(undefined),
    );

    for (const cell of sheet.cells) {
      const row = values[cell.row - 1];
      const formatRow = formats[cell.row - 1];
      if (!row || !formatRow || cell.col < 1 || cell.col > colCount) {
        truncated = true;
        continue;
      }
      row[cell.col - 1] = cell.value;
      formatRow[cell.col - 1] = cell.format;
    }

    const merges: MergeRange[] = [];
    const droppedMerges: MergeRange[] = [];
    for (const merge of sheet.merges) {
      if (this.isValidMerge(merge, rowCount, colCount)) {
        merges.push({ ...merge });
      } else {
        droppedMerges.push({ ...merge });
      }
    }

    // Owners are read before propagation so overlapping merges cannot feed each other
    const owners = merges.map((m) => ({
      value: values[m.startRow - 1]?.[m.startCol - 1] ?? null,
      format: formats[m.startRow - 1]?.[m.startCol - 1],
    }));

    merges.forEach((merge, i) => {
      const owner = owners[i];
      if (!owner) return;
      for (let r = merge.startRow; r <= merge.endRow; r++) {
        const row = values[r - 1];
        const formatRow = formats[r - 1];
        if (!row || !formatRow) continue;
        for (let c = merge.startCol; c <= merge.endCol; c++) {
          row[c - 1] = owner.value;
          formatRow[c - 1] = owner.format;
        }
      }
    });

    if (droppedMerges.length > 0) {
      this.logger.warn(`Sheet "${sheet.name}": dropped ${droppedMerges.length} malformed merge range(s)`);
    }
    if (truncated) {
      this.logger.warn(`Sheet "${sheet.name}": grid truncated to ${rowCount}x${colCount}`);
    }

    return {
      sheetName: sheet.name,
      rowCount,
      colCount,
      values,
      formats,
      merges,
      droppedMerges,
      truncated,
    };
  }

  private isValidMerge(merge: MergeRange, rowCount: number, colCount: number): boolean {
    const { startRow, startCol, endRow, endCol } = merge;
    return (
      [startRow, startCol, endRow, endCol].every(Number.isInteger) &&
      startRow >= 1 &&
      startCol >= 1 &&
      endRow >= startRow &&
      endCol >= startCol &&
      endRow <= rowCount &&
      endCol <= colCount
    );
  }
}

import { Injectable } from '@nestjs/common';
import { HEADER_LIMITS, isBlank, toFieldName, uniquifyFieldNames } from '@sheetstruct/shared';
import type { CellValue, SectionRecord } from '@sheetstruct/shared';
import { HeaderResolverService } from './header-resolver.service';
import { ValueNormalizerService } from './value-normalizer.service';
import {
  cellAt,
  rowValues,
  type Classification,
  type Grid,
  type SectionContent,
  type Span,
} from './extraction.types';

@Injectable()
export class RecordExtractorService {
  constructor(
    private readonly headers: HeaderResolverService,
    private readonly normalizer: ValueNormalizerService,
  ) {}

  /** Convert a classified span into its type-specific payload */
  extract(grid: Grid, classification: Classification): SectionContent {
    const { body } = classification;
    if (!body) {
      return { section_type: 'raw', payload: { cells: [] } };
    }

    switch (classification.type) {
      case 'key_value':
        return { section_type: 'key_value', payload: this.extractKeyValue(grid, body) };
      case 'table': {
        const headers = this.headers.resolveTableHeaders(grid, body);
        return {
          section_type: 'table',
          payload: { headers, records: this.extractRecords(grid, body, headers, 1) },
        };
      }
      case 'complex_header': {
        const levels = Math.max(1, classification.headerRows);
        const headers = this.headers.flattenHeaders(grid, body, levels);
        return {
          section_type: 'complex_header',
          payload: { header_levels: levels, headers, records: this.extractRecords(grid, body, headers, levels) },
        };
      }
      case 'raw':
        return { section_type: 'raw', payload: { cells: this.extractRaw(grid, body) } };
    }
  }

  private extractKeyValue(grid: Grid, body: Span): { fields: string[]; data: Record<string, CellValue> } {
    const keys: string[] = [];
    const values: CellValue[] = [];
    const valueCol = this.valueColumn(grid, body);

    for (let row = body.startRow; row <= body.endRow; row++) {
      const key = cellAt(grid, row, body.startCol);
      if (isBlank(key)) continue;
      keys.push(toFieldName(key) || `${HEADER_LIMITS.KEY_PLACEHOLDER_PREFIX}_${row}`);
      values.push(this.normalizer.normalize(cellAt(grid, row, valueCol)));
    }

    const fields = uniquifyFieldNames(keys, HEADER_LIMITS.KEY_PLACEHOLDER_PREFIX);
    const data: Record<string, CellValue> = {};
    fields.forEach((field, i) => {
      data[field] = values[i] ?? null;
    });
    return { fields, data };
  }

  /** First populated column right of the keys; empty spacer columns are skipped */
  private valueColumn(grid: Grid, body: Span): number {
    for (let col = body.startCol + 1; col <= body.endCol; col++) {
      for (let row = body.startRow; row <= body.endRow; row++) {
        if (!isBlank(cellAt(grid, row, col))) return col;
      }
    }
    return body.startCol + 1;
  }

  private extractRecords(grid: Grid, body: Span, headers: string[], headerRows: number): SectionRecord[] {
    const records: SectionRecord[] = [];

    for (let row = body.startRow + headerRows; row <= body.endRow; row++) {
      const cells = this.normalizer.normalizeRow(rowValues(grid, row, body.startCol, body.endCol));
      if (cells.every((v) => v === null)) continue;

      const values: Record<string, CellValue> = {};
      headers.forEach((header, i) => {
        values[header] = cells[i] ?? null;
      });
      records.push({ row_number: row, values });
    }

    return records;
  }

  private extractRaw(grid: Grid, span: Span): CellValue[][] {
    const cells: CellValue[][] = [];
    for (let row = span.startRow; row <= span.endRow; row++) {
      cells.push(this.normalizer.normalizeRow(rowValues(grid, row, span.startCol, span.endCol)));
    }
    return cells;
  }
}

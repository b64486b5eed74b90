import { Injectable } from '@nestjs/common';
import type { CellValue, RawCellValue } from '@sheetstruct/shared';

@Injectable()
export class ValueNormalizerService {
  /**
   * Portable JSON form of a cell value: dates become ISO-8601 strings,
   * non-finite numbers and blank text become null, text is trimmed.
   */
  normalize(value: RawCellValue | undefined): CellValue {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    const text = String(value).trim();
    return text === '' ? null : text;
  }

  normalizeRow(values: readonly RawCellValue[]): CellValue[] {
    return values.map((v) => this.normalize(v));
  }
}

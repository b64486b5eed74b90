import type { CellCoordinate, MergeRange, RawCellValue } from '../types/cell-types';

/** Structural kind of a cell, ignoring its actual value */
export type CellKind = 'blank' | 'text' | 'number' | 'date' | 'boolean';

/**
 * Convert 1-based column number to Excel letter(s): 1→A, 26→Z, 27→AA
 */
export function colNumberToLetter(col: number): string {
  let result = '';
  let n = col - 1;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Convert Excel column letter(s) to 1-based column number: A→1, Z→26, AA→27
 */
export function letterToColNumber(letter: string): number {
  let result = 0;
  for (let i = 0; i < letter.length; i++) {
    result = result * 26 + (letter.charCodeAt(i) - 64);
  }
  return result;
}

/**
 * Parse cell reference like "B3" into { row: 3, col: 2 }
 */
export function parseCellRef(ref: string): CellCoordinate {
  const match = ref.match(/^\$?([A-Z]{1,3})\$?(\d{1,7})$/);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid cell reference: ${ref}`);
  }
  return {
    row: parseInt(match[2], 10),
    col: letterToColNumber(match[1]),
  };
}

/**
 * Build cell reference from 1-based row/column: (1, 1) → "A1"
 */
export function buildCellRef(row: number, col: number): string {
  return `${colNumberToLetter(col)}${row}`;
}

/**
 * Parse a range reference like "A1:C2" as written, without reordering corners.
 * A single reference ("B4") yields a one-cell range. Returns null when unparseable.
 */
export function parseRangeRef(ref: string): MergeRange | null {
  const [first, second, ...rest] = ref.trim().toUpperCase().split(':');
  if (!first || rest.length > 0) return null;
  try {
    const start = parseCellRef(first);
    const end = second ? parseCellRef(second) : start;
    return { startRow: start.row, startCol: start.col, endRow: end.row, endCol: end.col };
  } catch {
    return null;
  }
}

/** A cell is blank when it holds nothing or whitespace only */
export function isBlank(value: RawCellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

export function cellKind(value: RawCellValue | undefined): CellKind {
  if (isBlank(value)) return 'blank';
  if (value instanceof Date) return 'date';
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'text';
  }
}

/** Non-blank text value, trimmed; null otherwise */
export function textOf(value: RawCellValue | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Reduce a label to field-name form: "Total Amount (USD)" → "Total_Amount_USD"
 */
export function toFieldName(value: RawCellValue | undefined): string {
  if (value === null || value === undefined) return '';
  const text = value instanceof Date ? value.toISOString() : String(value);
  return text
    .trim()
    .replace(/[^\p{L}\p{N}_]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

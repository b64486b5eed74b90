import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import { ALIGNMENTS, FILE_LIMITS, SHEET_LIMITS, parseRangeRef } from '@sheetstruct/shared';
import type { BorderConfig, CellFormat, MergeRange, RawCell, RawCellValue, RawSheet } from '@sheetstruct/shared';
import { ExtractionError } from './extraction.errors';

const BORDER_EDGES = ['top', 'right', 'bottom', 'left'] as const;

/** Reads `.xlsx` / `.xlsm` / `.csv` input into raw sheets for the engine */
@Injectable()
export class WorkbookReaderService {
  private readonly logger = new Logger(WorkbookReaderService.name);

  async readFile(filePath: string): Promise<RawSheet[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (err) {
      throw ExtractionError.other(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    return this.readBuffer(buffer, filePath);
  }

  async readBuffer(buffer: Buffer, filename: string): Promise<RawSheet[]> {
    const ext = extname(filename).toLowerCase();
    if (!FILE_LIMITS.ALLOWED_EXTENSIONS.some((allowed) => allowed === ext)) {
      throw ExtractionError.other(`Unsupported file type "${ext || filename}"`);
    }
    if (ext === '.csv') {
      return [this.parseCsvBuffer(buffer)];
    }
    return this.parseXlsxBuffer(buffer, filename);
  }

  private async parseXlsxBuffer(buffer: Buffer, filename: string): Promise<RawSheet[]> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw ExtractionError.corrupted(`Workbook ${filename} is corrupted or unreadable: ${reason}`, err);
    }

    const sheets = workbook.worksheets.map((ws) => this.readWorksheet(ws));
    const cellCount = sheets.reduce((sum, s) => sum + s.cells.length, 0);
    this.logger.log(`Read ${filename}: ${sheets.length} sheets, ${cellCount} cells`);
    return sheets;
  }

  private readWorksheet(ws: ExcelJS.Worksheet): RawSheet {
    const cells: RawCell[] = [];
    const merges: MergeRange[] = [];
    let rowCount = 0;
    let colCount = 0;

    for (const ref of ws.model.merges ?? []) {
      const merge = parseRangeRef(ref);
      if (!merge) continue;
      merges.push(merge);
      rowCount = Math.max(rowCount, merge.startRow, merge.endRow);
      colCount = Math.max(colCount, merge.startCol, merge.endCol);
    }

    ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
        // Merged followers mirror the master's value; the grid builder propagates it
        if (cell.isMerged && cell.master.address !== cell.address) return;

        const value = this.extractValue(cell.value);
        const format = this.extractFormat(cell.style);
        if (value === null && !format) return;

        cells.push(format ? { row: rowNumber, col: colNumber, value, format } : { row: rowNumber, col: colNumber, value });
        rowCount = Math.max(rowCount, rowNumber);
        colCount = Math.max(colCount, colNumber);
      });
    });

    return {
      name: ws.name,
      rowCount: Math.min(rowCount, SHEET_LIMITS.MAX_ROWS),
      colCount: Math.min(colCount, SHEET_LIMITS.MAX_COLS),
      cells,
      merges,
    };
  }

  private extractValue(raw: ExcelJS.CellValue): RawCellValue {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'string') return raw;
    if (raw instanceof Date) return raw;

    if ('result' in raw) return this.extractValue(raw.result ?? null);
    if ('formula' in raw || 'sharedFormula' in raw) return null;
    if ('richText' in raw) return raw.richText.map((r) => r.text).join('');
    if ('hyperlink' in raw) return raw.text;
    if ('error' in raw) return raw.error;

    return null;
  }

  private extractFormat(style: Partial<ExcelJS.Style> | undefined): CellFormat | undefined {
    if (!style) return undefined;
    const fmt: CellFormat = {};

    if (style.font?.bold) fmt.bold = true;
    if (style.font?.italic) fmt.italic = true;
    if (style.font?.size) fmt.fontSize = style.font.size;
    if (style.font?.color?.argb) fmt.fontColor = style.font.color.argb;

    const fill = style.fill;
    if (fill?.type === 'pattern' && fill.pattern !== 'none' && fill.fgColor?.argb) {
      fmt.bgColor = fill.fgColor.argb;
    }

    const horizontal = style.alignment?.horizontal;
    const alignment = ALIGNMENTS.find((a) => a === horizontal);
    if (alignment) fmt.alignment = alignment;
    if (style.numFmt) fmt.numberFormat = style.numFmt;

    const border: BorderConfig = {};
    for (const edge of BORDER_EDGES) {
      const b = style.border?.[edge];
      if (!b?.style) continue;
      border[edge] = b.color?.argb ? { style: b.style, color: b.color.argb } : { style: b.style };
    }
    if (Object.keys(border).length > 0) fmt.border = border;

    return Object.keys(fmt).length > 0 ? fmt : undefined;
  }

  /** CSV has no formatting or merges; blank lines are kept as empty rows */
  private parseCsvBuffer(buffer: Buffer): RawSheet {
    const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
    const delimiter = this.detectDelimiter(text);
    const rows = this.parseCsvContent(text, delimiter);

    const cells: RawCell[] = [];
    let colCount = 0;
    let rowCount = 0;
    rows.forEach((fields, r) => {
      fields.forEach((field, c) => {
        if (field === '') return;
        cells.push({ row: r + 1, col: c + 1, value: this.inferCsvValue(field) });
        rowCount = Math.max(rowCount, r + 1);
        colCount = Math.max(colCount, c + 1);
      });
    });

    this.logger.log(
      `Parsed CSV (delimiter='${delimiter === '\t' ? 'TAB' : delimiter}'): ${cells.length} cells, ${rows.length} rows`,
    );
    return { name: 'Sheet1', rowCount, colCount, cells, merges: [] };
  }

  /** Pick the candidate delimiter that occurs most in the first few lines */
  private detectDelimiter(text: string): string {
    const sampleLines = text.split('\n').slice(0, 5).join('\n');
    const candidates = [',', ';', '\t', '|'] as const;
    let best = ',';
    let bestCount = 0;
    for (const d of candidates) {
      const count = sampleLines.split(d).length - 1;
      if (count > bestCount) {
        bestCount = count;
        best = d;
      }
    }
    return best;
  }

  /** Quoted fields may hold delimiters, escaped quotes and newlines */
  private parseCsvContent(text: string, delimiter: string): string[][] {
    const rows: string[][] = [];
    let current = '';
    let inQuotes = false;
    let row: string[] = [];

    for (let i = 0; i < text.length; i++) {
      const ch = text.charAt(i);
      if (inQuotes) {
        if (ch === '"') {
          if (text.charAt(i + 1) === '"') {
            current += '"';
            i++;
          } else {
            inQuotes = false;
          }
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuotes = true;
      } else if (ch === delimiter) {
        row.push(current.trim());
        current = '';
      } else if (ch === '\n' || (ch === '\r' && text.charAt(i + 1) === '\n')) {
        row.push(current.trim());
        current = '';
        rows.push(row);
        row = [];
        if (ch === '\r') i++;
      } else {
        current += ch;
      }
    }

    row.push(current.trim());
    if (row.some((v) => v !== '')) rows.push(row);

    return rows;
  }

  private inferCsvValue(val: string): RawCellValue {
    const lower = val.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;

    const num = Number(val);
    if (!isNaN(num) && isFinite(num)) return num;

    if (/^\d{4}-\d{2}-\d{2}/.test(val)) {
      const d = new Date(val);
      if (!isNaN(d.getTime())) return d;
    }

    return val;
  }
}

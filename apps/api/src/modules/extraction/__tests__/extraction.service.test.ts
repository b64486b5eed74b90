import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { parseDocument, serializeDocument } from '@sheetstruct/shared';
import { ExtractionError } from '../extraction.errors';
import { createEngine, IDENTITY, merge, rawSheet } from './fixtures';

const processedAt = new Date('2024-06-01T08:00:00.000Z');

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('ExtractionService', () => {
  const { extraction } = createEngine();

  describe('extractSheets', () => {
    it('extracts a key/value block into one section', () => {
      const doc = extraction.extractSheets(
        [
          rawSheet([
            ['Name', 'Acme'],
            ['Country', 'USA'],
          ]),
        ],
        IDENTITY,
        { processedAt },
      );

      expect(doc.sheets).toHaveLength(1);
      const [section] = doc.sheets[0]?.sections ?? [];
      expect(section).toEqual({
        section_id: 'section_1',
        section_type: 'key_value',
        section_header: null,
        region: { start_row: 1, end_row: 2, start_col: 1, end_col: 2 },
        confidence: 1,
        formatting: null,
        payload: { fields: ['Name', 'Country'], data: { Name: 'Acme', Country: 'USA' } },
      });
    });

    it('extracts a table with its header and records', () => {
      const doc = extraction.extractSheets(
        [
          rawSheet([
            ['Date', 'Amount', 'Currency'],
            ['2024-01-01', 100, 'USD'],
            ['2024-01-02', 200, 'EUR'],
          ]),
        ],
        IDENTITY,
      );

      const section = doc.sheets[0]?.sections[0];
      expect(section?.section_type).toBe('table');
      if (section?.section_type !== 'table') return;
      expect(section.payload.headers).toEqual(['Date', 'Amount', 'Currency']);
      expect(section.payload.records).toHaveLength(2);
    });

    it('extracts a merged two-level header', () => {
      const doc = extraction.extractSheets(
        [
          rawSheet(
            [
              ['Category A', null, 'Category B', null],
              ['Field1', 'Field2', 'Field3', 'Field4'],
            ],
            { merges: [merge(1, 1, 1, 2), merge(1, 3, 1, 4)] },
          ),
        ],
        IDENTITY,
      );

      const section = doc.sheets[0]?.sections[0];
      expect(section?.section_type).toBe('complex_header');
      if (section?.section_type !== 'complex_header') return;
      expect(section.payload.headers).toEqual([
        'Category_A_Field1',
        'Category_A_Field2',
        'Category_B_Field3',
        'Category_B_Field4',
      ]);
      expect(section.payload.header_levels).toBe(2);
    });

    it('numbers sections across sheets in workbook order', () => {
      const twoBlocks = [['Name', 'Acme'], [null, null], [null, null], ['Date', 'Amount', 'Currency'], ['2024-01-01', 1, 'USD']];
      const doc = extraction.extractSheets(
        [rawSheet(twoBlocks, { name: 'First' }), rawSheet(twoBlocks, { name: 'Second' })],
        IDENTITY,
      );

      expect(doc.sheets.map((s) => s.sheet_name)).toEqual(['First', 'Second']);
      expect(doc.sheets.flatMap((s) => s.sections.map((x) => x.section_id))).toEqual([
        'section_1',
        'section_2',
        'section_3',
        'section_4',
      ]);
      expect(doc.sheets[0]?.sections.map((s) => s.region)).toEqual([
        { start_row: 1, end_row: 1, start_col: 1, end_col: 2 },
        { start_row: 4, end_row: 5, start_col: 1, end_col: 3 },
      ]);
    });

    it('keeps an empty sheet with no sections', () => {
      const doc = extraction.extractSheets([rawSheet([], { name: 'Blank' })], IDENTITY);

      expect(doc.sheets).toEqual([{ sheet_name: 'Blank', sections: [] }]);
    });

    it('builds provenance and metadata', () => {
      const doc = extraction.extractSheets(
        [rawSheet([['a', 'b']], { merges: [merge(1, 1, 1, 9)] })],
        { country: 'US', client_name: 'Acme Corp', product: 'Loans', form_variant: 'v2', extracted_date: '2024-05-31', is_latest: true },
        { processedAt, filePath: '/data/acme.xlsx' },
      );

      expect(doc.client_id).toBe('US_Acme_Corp_Loans_v2');
      expect(doc.file_info).toEqual({
        file_path: '/data/acme.xlsx',
        filename: null,
        extracted_date: '2024-05-31',
        is_latest: true,
        form_variant: 'v2',
      });
      expect(doc.processing_metadata).toEqual({
        processed_at: '2024-06-01T08:00:00.000Z',
        status: 'success',
        engine_version: '1.0.0',
        warnings: ['Sheet "Sheet1": dropped malformed merge range A1:I1'],
      });
    });

    it('prefers an upstream client id', () => {
      const doc = extraction.extractSheets([], { ...IDENTITY, client_id: 'client-42' });

      expect(doc.client_id).toBe('client-42');
    });

    it('returns a deeply frozen document', () => {
      const doc = extraction.extractSheets([rawSheet([['Name', 'Acme']])], IDENTITY);

      expect(Object.isFrozen(doc)).toBe(true);
      expect(Object.isFrozen(doc.sheets[0]?.sections[0]?.payload)).toBe(true);
    });

    it('survives a JSON round trip', () => {
      const doc = extraction.extractSheets(
        [
          rawSheet([
            ['Profile', null],
            ['Name', 'Acme'],
            ['Since', new Date(Date.UTC(2020, 4, 1))],
            [null, null],
            ['Date', 'Amount', 'Currency'],
            ['2024-01-01', 100, 'USD'],
          ]),
        ],
        IDENTITY,
        { processedAt },
      );

      expect(parseDocument(serializeDocument(doc))).toEqual(doc);
    });

    it('stops with a timeout error when the signal timed out', () => {
      const controller = new AbortController();
      const reason = new Error('deadline exceeded');
      reason.name = 'TimeoutError';
      controller.abort(reason);

      const error = thrownBy(() => extraction.extractSheets([rawSheet([['a']])], IDENTITY, { signal: controller.signal }));
      expect(error).toBeInstanceOf(ExtractionError);
      expect(error).toMatchObject({ kind: 'timeout', message: 'Extraction timed out' });
    });

    it('reports other aborts as other', () => {
      const controller = new AbortController();
      controller.abort();

      const error = thrownBy(() => extraction.extractSheets([rawSheet([['a']])], IDENTITY, { signal: controller.signal }));
      expect(error).toMatchObject({ kind: 'other', message: 'Extraction aborted' });
    });
  });

  describe('extractBuffer', () => {
    it('reads a CSV upload', async () => {
      const doc = await extraction.extractBuffer(Buffer.from('Name,Acme\nCountry,USA\n'), 'client.csv', IDENTITY);

      expect(doc.file_info.filename).toBe('client.csv');
      const section = doc.sheets[0]?.sections[0];
      expect(section?.section_type).toBe('key_value');
      if (section?.section_type !== 'key_value') return;
      expect(section.payload.data).toEqual({ Name: 'Acme', Country: 'USA' });
    });

    it('reads an xlsx workbook with merged headers', async () => {
      const workbook = new ExcelJS.Workbook();
      const ws = workbook.addWorksheet('Form');
      ws.addRow(['Category A', null, 'Category B', null]);
      ws.addRow(['Field1', 'Field2', 'Field3', 'Field4']);
      ws.addRow([1, 2, 3, 4]);
      ws.mergeCells('A1:B1');
      ws.mergeCells('C1:D1');
      const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

      const doc = await extraction.extractBuffer(buffer, 'form.xlsx', IDENTITY);

      expect(doc.sheets[0]?.sheet_name).toBe('Form');
      const section = doc.sheets[0]?.sections[0];
      expect(section?.section_type).toBe('complex_header');
      if (section?.section_type !== 'complex_header') return;
      expect(section.region).toEqual({ start_row: 1, end_row: 3, start_col: 1, end_col: 4 });
      expect(section.payload.records).toEqual([
        {
          row_number: 3,
          values: { Category_A_Field1: 1, Category_A_Field2: 2, Category_B_Field3: 3, Category_B_Field4: 4 },
        },
      ]);
    });

    it('classifies an unreadable workbook as corrupted', async () => {
      await expect(extraction.extractBuffer(Buffer.from('not a zip archive'), 'broken.xlsx', IDENTITY)).rejects.toMatchObject({
        kind: 'corrupted',
      });
    });

    it('rejects unsupported file types', async () => {
      await expect(extraction.extractBuffer(Buffer.from('x'), 'notes.txt', IDENTITY)).rejects.toBeInstanceOf(ExtractionError);
    });
  });

  describe('extractFile', () => {
    it('classifies a missing file as other', async () => {
      await expect(extraction.extractFile('/nonexistent/acme.xlsx', IDENTITY)).rejects.toMatchObject({ kind: 'other' });
    });
  });
});

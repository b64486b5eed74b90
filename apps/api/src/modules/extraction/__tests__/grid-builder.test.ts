import { describe, it, expect } from 'vitest';
import { DEFAULT_EXTRACTION_CONFIG } from '../extraction.config';
import { GridBuilderService } from '../grid-builder.service';
import { cellAt, formatAt } from '../extraction.types';
import { merge, rawSheet } from './fixtures';

describe('GridBuilderService', () => {
  const builder = new GridBuilderService(DEFAULT_EXTRACTION_CONFIG);

  it('resolves every merged coordinate to the top-left value', () => {
    const sheet = rawSheet(
      [
        ['X', null, 'c'],
        [null, null, 'd'],
      ],
      { merges: [merge(1, 1, 2, 2)] },
    );
    const grid = builder.build(sheet);

    expect(grid.values).toEqual([
      ['X', 'X', 'c'],
      ['X', 'X', 'd'],
    ]);
    expect(grid.merges).toEqual([merge(1, 1, 2, 2)]);
    expect(grid.droppedMerges).toEqual([]);
    expect(grid.truncated).toBe(false);
  });

  it('does not mutate the input sheet', () => {
    const sheet = rawSheet([['X', null]], { merges: [merge(1, 1, 1, 2)] });
    builder.build(sheet);

    expect(sheet.cells).toEqual([{ row: 1, col: 1, value: 'X' }]);
  });

  it('propagates the top-left format across the merge', () => {
    const sheet = rawSheet([['Title', null]], {
      merges: [merge(1, 1, 1, 2)],
      formats: { A1: { bold: true } },
    });
    const grid = builder.build(sheet);

    expect(formatAt(grid, 1, 2)).toEqual({ bold: true });
  });

  it('drops inverted and out-of-bounds merges', () => {
    const sheet = rawSheet(
      [
        ['a', 'b'],
        ['c', 'd'],
      ],
      { merges: [merge(2, 1, 1, 1), merge(1, 1, 1, 5)] },
    );
    const grid = builder.build(sheet);

    expect(grid.merges).toEqual([]);
    expect(grid.droppedMerges).toEqual([merge(2, 1, 1, 1), merge(1, 1, 1, 5)]);
    expect(grid.values).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('applies overlapping merges in declaration order', () => {
    const sheet = rawSheet([['a', 'b', null]], { merges: [merge(1, 1, 1, 2), merge(1, 2, 1, 3)] });
    const grid = builder.build(sheet);

    expect(grid.values[0]).toEqual(['a', 'b', 'b']);
  });

  it('caps the grid at the configured row limit', () => {
    const limited = new GridBuilderService({ ...DEFAULT_EXTRACTION_CONFIG, maxRows: 2 });
    const grid = limited.build(rawSheet([['a'], ['b'], ['c']]));

    expect(grid.rowCount).toBe(2);
    expect(grid.truncated).toBe(true);
    expect(cellAt(grid, 3, 1)).toBeNull();
  });

  it('treats unspecified coordinates as blank', () => {
    const grid = builder.build({ name: 'S', rowCount: 2, colCount: 2, cells: [{ row: 2, col: 2, value: 7 }], merges: [] });

    expect(grid.values).toEqual([
      [null, null],
      [null, 7],
    ]);
  });
});

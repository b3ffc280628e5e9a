import { describe, it, expect } from 'vitest';
import { MergeIndex, getMergedRanges } from '../src/lib/excel-merge-index';
import { sheetOf } from './fixtures';

describe('MergeIndex', () => {
  it('reports every non-anchor cell of a range as secondary', () => {
    const index = new MergeIndex([{ minRow: 1, minCol: 1, maxRow: 1, maxCol: 3 }]);
    expect(index.isSecondary(1, 1)).toBe(false);
    expect(index.isSecondary(1, 2)).toBe(true);
    expect(index.isSecondary(1, 3)).toBe(true);
    expect(index.isSecondary(2, 1)).toBe(false);
    expect(index.isSecondary(1, 4)).toBe(false);
  });

  it('reads the merges of a sheet as 1-indexed ranges', () => {
    const sheet = sheetOf([['a', 'b', 'c'], ['d', 'e', 'f']]);
    sheet.mergeCells('B1:C2');

    expect(getMergedRanges(sheet)).toEqual([{ minRow: 1, minCol: 2, maxRow: 2, maxCol: 3 }]);

    const index = MergeIndex.forSheet(sheet);
    expect(index.isSecondary(1, 2)).toBe(false);
    expect(index.isSecondary(2, 2)).toBe(true);
    expect(index.isSecondary(2, 3)).toBe(true);
    expect(index.rangeAt(2, 3)).toEqual({ minRow: 1, minCol: 2, maxRow: 2, maxCol: 3 });
    expect(index.rangeAt(5, 5)).toBeUndefined();
  });

  it('treats a cell as secondary when any overlapping range covers it', () => {
    const index = new MergeIndex([
      { minRow: 1, minCol: 1, maxRow: 2, maxCol: 2 },
      { minRow: 2, minCol: 2, maxRow: 3, maxCol: 3 },
    ]);
    expect(index.isSecondary(2, 2)).toBe(true);
    expect(index.isSecondary(3, 3)).toBe(true);
  });

  it('lists separate ranges of the same sheet', () => {
    const sheet = sheetOf([['Titel', null, null], ['a', 'b', 'c'], ['d', null, null]]);
    sheet.mergeCells('A1:C1');
    sheet.mergeCells('B3:C3');

    expect(getMergedRanges(sheet)).toEqual([
      { minRow: 1, minCol: 1, maxRow: 1, maxCol: 3 },
      { minRow: 3, minCol: 2, maxRow: 3, maxCol: 3 },
    ]);
  });

  it('is empty for a sheet without merges', () => {
    const sheet = sheetOf([['a']]);
    expect(getMergedRanges(sheet)).toEqual([]);
    expect(MergeIndex.forSheet(sheet).isSecondary(1, 1)).toBe(false);
  });

  it('does not follow later changes to the input ranges', () => {
    const ranges = [{ minRow: 1, minCol: 1, maxRow: 1, maxCol: 2 }];
    const index = new MergeIndex(ranges);
    ranges[0].maxCol = 5;
    expect(index.isSecondary(1, 4)).toBe(false);
  });
});

import type ExcelJS from 'exceljs';
import type { MergedRange } from './excel-types';

/**
 * Collects the merged ranges of a sheet as 1-indexed rectangles, grouped by their anchor cell.
 */
export function getMergedRanges(worksheet: ExcelJS.Worksheet): MergedRange[] {
  const ranges = new Map<string, MergedRange>();
  worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      if (!cell.isMerged) return;
      const anchor = cell.master.address;
      const range = ranges.get(anchor);
      if (!range) {
        ranges.set(anchor, { minRow: rowNumber, minCol: colNumber, maxRow: rowNumber, maxCol: colNumber });
        return;
      }
      range.minRow = Math.min(range.minRow, rowNumber);
      range.minCol = Math.min(range.minCol, colNumber);
      range.maxRow = Math.max(range.maxRow, rowNumber);
      range.maxCol = Math.max(range.maxCol, colNumber);
    });
  });
  return [...ranges.values()];
}

/**
 * Answers whether a coordinate is a secondary (non-anchor) cell of a merged range.
 * Only the top-left anchor of a merge may hold a value; Excel drops anything written elsewhere.
 */
export class MergeIndex {
  private readonly ranges: readonly MergedRange[];

  constructor(ranges: readonly MergedRange[]) {
    this.ranges = ranges.map(range => ({ ...range }));
  }

  static forSheet(worksheet: ExcelJS.Worksheet): MergeIndex {
    return new MergeIndex(getMergedRanges(worksheet));
  }

  rangeAt(row: number, col: number): MergedRange | undefined {
    return this.ranges.find(range =>
      range.minRow <= row && row <= range.maxRow && range.minCol <= col && col <= range.maxCol
    );
  }

  isSecondary(row: number, col: number): boolean {
    return this.ranges.some(range =>
      range.minRow <= row && row <= range.maxRow && range.minCol <= col && col <= range.maxCol &&
      !(row === range.minRow && col === range.minCol)
    );
  }
}

import type ExcelJS from 'exceljs';
import type { Block, BlockSplitOptions, ClassifierPolicy, RowWindow } from './excel-types';
import { getCellValue, getSheetBounds, isBlankValue } from './excel-helpers';
import { isDataLike } from './excel-value-classifier';

function rowHasContent(worksheet: ExcelJS.Worksheet, row: number, scanColumns: number): boolean {
  for (let col = 1; col <= scanColumns; col++) {
    if (!isBlankValue(getCellValue(worksheet, row, col))) return true;
  }
  return false;
}

/**
 * Splits a raw sheet that repeats one sub-table per region into its blocks.
 * A block starts at every row whose label cell matches the pattern and runs up to the next block,
 * minus the blank padding rows at its end. No label match yields no blocks.
 */
export function splitBlocks(worksheet: ExcelJS.Worksheet, options: BlockSplitOptions): Block[] {
  const { labelColumn, labelPattern, scanColumns } = options;
  const { maxRow } = getSheetBounds(worksheet);

  const starts: number[] = [];
  for (let row = 1; row <= maxRow; row++) {
    const label = getCellValue(worksheet, row, labelColumn);
    if (label === null) continue;
    // A global or sticky pattern would carry lastIndex over between rows.
    labelPattern.lastIndex = 0;
    if (labelPattern.test(String(label).trim())) starts.push(row);
  }

  return starts.map((start, i) => {
    const naiveEnd = i + 1 < starts.length ? starts[i + 1] - 1 : maxRow;
    let end = start;
    for (let row = naiveEnd; row > start; row--) {
      if (rowHasContent(worksheet, row, scanColumns)) {
        end = row;
        break;
      }
    }
    return { start, end };
  });
}

/**
 * Rows of a block that carry data: from the first data-like row at the scan column
 * (the label row itself when none is found) to the block end, cut at the raw sheet's footnote row.
 */
export function blockRowWindow(
  worksheet: ExcelJS.Worksheet,
  block: Block,
  scanColumn: number,
  options: { classifier?: ClassifierPolicy; footnoteStartRow?: number } = {}
): RowWindow {
  let firstRow = block.start;
  for (let row = block.start; row <= block.end; row++) {
    if (isDataLike(getCellValue(worksheet, row, scanColumn), options.classifier)) {
      firstRow = row;
      break;
    }
  }
  const footnoteStartRow = options.footnoteStartRow;
  const lastRow = footnoteStartRow !== undefined && footnoteStartRow > firstRow
    ? Math.min(block.end, footnoteStartRow - 1)
    : block.end;
  return { firstRow, rowCount: Math.max(0, lastRow - firstRow + 1) };
}

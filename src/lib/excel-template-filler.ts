import type ExcelJS from 'exceljs';
import type { CellCoordinate, ColumnMapping, FillOptions, FillResult, LabelCell, LabelWriteResult, RowWindow } from './excel-types';
import { getCellValue, getSheetBounds, setCellValue, toAddress } from './excel-helpers';
import { MergeIndex } from './excel-merge-index';

/**
 * Columns to copy: the declared mapping, or the same column index on both sides
 * from `copyFromColumn` to the template's last column.
 */
export function resolveColumnMap(dest: ExcelJS.Worksheet, options: FillOptions): ColumnMapping[] {
  if (options.columnMap && options.columnMap.length > 0) {
    return options.columnMap.map(mapping => ({ ...mapping }));
  }
  const { maxCol } = getSheetBounds(dest);
  const columns: ColumnMapping[] = [];
  for (let col = options.copyFromColumn; col <= maxCol; col++) {
    columns.push({ raw: col, dest: col });
  }
  return columns;
}

/**
 * Copies the raw data window into the template's data window, value by value.
 * Rows are aligned from the top of both windows and only as many as both hold are copied;
 * template rows beyond that keep their values. Secondary cells of merged ranges are never written,
 * and styles are left untouched.
 */
export function fillTemplate(
  raw: ExcelJS.Worksheet,
  dest: ExcelJS.Worksheet,
  rawWindow: RowWindow,
  destWindow: RowWindow,
  options: FillOptions
): FillResult {
  const result: FillResult = { rowsCopied: 0, cellsWritten: 0, cellsSkipped: 0 };
  const rowCount = Math.max(0, Math.min(rawWindow.rowCount, destWindow.rowCount));
  if (rowCount === 0) return result;

  const mergeIndex = MergeIndex.forSheet(dest);
  const columns = resolveColumnMap(dest, options);

  for (let offset = 0; offset < rowCount; offset++) {
    const rawRow = rawWindow.firstRow + offset;
    const destRow = destWindow.firstRow + offset;

    for (const { raw: rawCol, dest: destCol } of columns) {
      if (mergeIndex.isSecondary(destRow, destCol)) {
        result.cellsSkipped++;
        continue;
      }
      setCellValue(dest, destRow, destCol, getCellValue(raw, rawRow, rawCol));
      result.cellsWritten++;
    }
    result.rowsCopied++;
  }

  return result;
}

/**
 * Writes fixed-position texts such as the period label or the internal-use banner.
 */
export function writeLabelCells(dest: ExcelJS.Worksheet, labels: readonly LabelCell[]): LabelWriteResult {
  const mergeIndex = MergeIndex.forSheet(dest);
  const skipped: CellCoordinate[] = [];
  let written = 0;

  for (const { row, col, text } of labels) {
    if (mergeIndex.isSecondary(row, col)) {
      console.warn(`Label cell ${toAddress(row, col)} lies inside a merged range and is not its anchor, skipping.`);
      skipped.push({ row, col });
      continue;
    }
    setCellValue(dest, row, col, text);
    written++;
  }

  return { written, skipped };
}

import type ExcelJS from 'exceljs';
import type { DataWindow, RegionDetectorOptions, RowWindow } from './excel-types';
import { getCellText, getCellValue, getSheetBounds } from './excel-helpers';
import { isDataLike } from './excel-value-classifier';

export const DEFAULT_FOOTNOTE_MARKERS: readonly string[] = ['-'];

/**
 * Finds the data region of a sheet: the first row whose scan column holds data,
 * and the first row whose column A starts with a footnote marker.
 * Both scans run over the whole sheet independently and fall back instead of failing
 * (row 1 when nothing looks like data, maxRow + 1 when there are no footnotes).
 */
export function detectDataWindow(
  worksheet: ExcelJS.Worksheet,
  scanColumn: number,
  options: RegionDetectorOptions = {}
): DataWindow {
  const { maxRow } = getSheetBounds(worksheet);
  const footnoteMarkers = options.footnoteMarkers ?? DEFAULT_FOOTNOTE_MARKERS;

  let firstDataRow: number | null = null;
  for (let row = 1; row <= maxRow; row++) {
    if (isDataLike(getCellValue(worksheet, row, scanColumn), options.classifier)) {
      firstDataRow = row;
      break;
    }
  }

  let footnoteStartRow = maxRow + 1;
  for (let row = 1; row <= maxRow; row++) {
    const text = getCellText(worksheet, row, 1)?.trim();
    if (text && footnoteMarkers.some(marker => text.startsWith(marker))) {
      footnoteStartRow = row;
      break;
    }
  }

  return { firstDataRow: firstDataRow ?? 1, footnoteStartRow };
}

export function dataWindowRowCount(window: DataWindow): number {
  return Math.max(0, window.footnoteStartRow - window.firstDataRow);
}

export function rowWindowFromDataWindow(window: DataWindow): RowWindow {
  return { firstRow: window.firstDataRow, rowCount: dataWindowRowCount(window) };
}

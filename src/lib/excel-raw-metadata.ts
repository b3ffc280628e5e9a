import type ExcelJS from 'exceljs';
import { getCellText, getSheetBounds } from './excel-helpers';

export const DEFAULT_MONTH_NAMES: readonly string[] = [
  'Januar', 'Februar', 'März', 'April', 'Mai', 'Juni',
  'Juli', 'August', 'September', 'Oktober', 'November', 'Dezember',
];

const STAMP_SEARCH_ROWS = 10;
const PERIOD_SEARCH_ROWS = 19;

/**
 * Reads the "as of" stamp the extract carries in its last rows, from the marker onwards.
 * Returns an empty string when the extract has none.
 */
export function extractAsOfStamp(worksheet: ExcelJS.Worksheet, marker: string): string {
  const { maxRow, maxCol } = getSheetBounds(worksheet);
  const lastRowToCheck = Math.max(1, maxRow - STAMP_SEARCH_ROWS + 1);
  for (let row = maxRow; row >= lastRowToCheck; row--) {
    for (let col = 1; col <= maxCol; col++) {
      const text = getCellText(worksheet, row, col);
      if (text && text.includes(marker)) {
        return text.slice(text.indexOf(marker)).trim();
      }
    }
  }
  return '';
}

/**
 * Finds the reporting period line in column A near the top of the extract, e.g. "Dezember 2025".
 */
export function extractPeriodLabel(worksheet: ExcelJS.Worksheet, monthNames: readonly string[] = DEFAULT_MONTH_NAMES): string {
  const { maxRow } = getSheetBounds(worksheet);
  for (let row = 1; row <= Math.min(PERIOD_SEARCH_ROWS, maxRow); row++) {
    const text = getCellText(worksheet, row, 1)?.trim();
    if (text && /\b(19|20)\d{2}\b/.test(text) && monthNames.some(month => text.includes(month))) {
      return text;
    }
  }
  return '';
}

export function defaultAsOfStamp(marker: string, date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${marker} ${day}.${month}.${date.getFullYear()}`;
}

import type ExcelJS from 'exceljs';
import type { FormatResult, NumericFormatOptions } from './excel-types';
import { getCell, getCellValue, getSheetBounds } from './excel-helpers';
import { withNumberFormat } from './excel-style';
import { DEFAULT_PLACEHOLDERS, isPlaceholder } from './excel-value-classifier';

/**
 * Integers in groups of three separated by spaces; negatives read "- 1 234".
 * Spaces are literal characters in Excel number formats, so the grouping does not depend on the reader's locale.
 */
export const GROUPED_INTEGER_FORMAT = '### ### ### ##0;- ### ### ### ##0';

/**
 * Rounds half away from zero: 12.5 → 13, -12.5 → -13. Never returns -0.
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

/**
 * Gives every numeric cell outside the excluded columns the grouped integer format,
 * rounding stored fractions first. Placeholder texts and other text are left as they are.
 * Excluded columns (percentages, ratios) keep both their values and formats.
 */
export function formatNumericCells(
  worksheet: ExcelJS.Worksheet,
  excludedColumns: readonly number[],
  options: NumericFormatOptions = {}
): FormatResult {
  const result: FormatResult = { cellsFormatted: 0, valuesRounded: 0 };
  const { maxRow, maxCol } = getSheetBounds(worksheet);
  const placeholders = options.placeholders ?? DEFAULT_PLACEHOLDERS;
  const firstRow = Math.max(1, options.rows?.from ?? 1);
  const lastRow = Math.min(maxRow, options.rows?.to ?? maxRow);
  const excluded = new Set(excludedColumns);

  for (let row = firstRow; row <= lastRow; row++) {
    for (let col = 1; col <= maxCol; col++) {
      if (excluded.has(col)) continue;
      const cell = getCell(worksheet, row, col);
      if (!cell) continue;

      const value = getCellValue(worksheet, row, col);
      if (isPlaceholder(value, placeholders)) continue;
      if (typeof value !== 'number' || !Number.isFinite(value)) continue;

      // Formula results are only formatted; the formula stays.
      const rounded = roundHalfAwayFromZero(value);
      if (rounded !== value && typeof cell.value === 'number') {
        cell.value = rounded;
        result.valuesRounded++;
      }
      cell.style = withNumberFormat(cell.style, GROUPED_INTEGER_FORMAT);
      result.cellsFormatted++;
    }
  }

  return result;
}

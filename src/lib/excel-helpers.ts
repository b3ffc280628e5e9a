import type ExcelJS from 'exceljs';
import * as XLSX from 'xlsx-js-style';
import type { CellValue, SheetBounds } from './excel-types';

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_NAME_CHARS_REGEX = /[\\\/\?\*\[\]:]/g;


/**
 * Sanitizes a string to be a valid Excel sheet name.
 * - Removes invalid characters.
 * - Truncates to a maximum length (31 characters).
 * - Ensures the name is not empty.
 */
export function sanitizeSheetName(name: string): string {
  if (typeof name !== 'string' || name.trim() === '') {
    return 'Sheet';
  }

  let sanitized = name.replace(INVALID_SHEET_NAME_CHARS_REGEX, '');

  if (sanitized.length > MAX_SHEET_NAME_LENGTH) {
    sanitized = sanitized.substring(0, MAX_SHEET_NAME_LENGTH);
  }

  if (sanitized.trim() === '') {
    return 'Sheet';
  }

  return sanitized;
}

/**
 * Parses a column identifier (letter such as "B", or a 1-indexed number) into a 1-indexed column number.
 * @returns The column number or null if invalid.
 */
export function parseColumnIdentifier(identifier: string | number): number | null {
  if (typeof identifier === 'number') {
    return Number.isInteger(identifier) && identifier >= 1 ? identifier : null;
  }
  if (!identifier || typeof identifier !== 'string') return null;
  const part = identifier.trim().toUpperCase();
  if (!part) return null;

  if (/^[A-Z]+$/.test(part)) {
    try {
      return XLSX.utils.decode_col(part) + 1;
    } catch {
      return null;
    }
  } else if (/^\d+$/.test(part)) {
    const colNumber = parseInt(part, 10);
    return colNumber >= 1 ? colNumber : null;
  }
  return null;
}

/**
 * Generates a unique sheet name within a workbook.
 * @param workbook The workbook to check against.
 * @param desiredName The preferred name for the sheet.
 */
export function getUniqueSheetName(workbook: ExcelJS.Workbook, desiredName: string): string {
    const sanitized = sanitizeSheetName(desiredName);
    let finalName = sanitized;
    const existingSheetNames = new Set(workbook.worksheets.map(sheet => sheet.name.toLowerCase()));

    if (existingSheetNames.has(finalName.toLowerCase())) {
        let counter = 1;
        let newNameAttempt: string;

        do {
            const suffix = `_${counter}`;
            const baseName = sanitized.substring(0, MAX_SHEET_NAME_LENGTH - suffix.length);
            newNameAttempt = `${baseName}${suffix}`;
            counter++;
        } while (existingSheetNames.has(newNameAttempt.toLowerCase()));

        finalName = newNameAttempt;
    }
    return finalName;
}

/**
 * Escapes a string for use in a regular expression.
 */
export function escapeRegex(str: string): string {
    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** A1 address of a 1-indexed coordinate. */
export function toAddress(row: number, col: number): string {
  return XLSX.utils.encode_cell({ r: row - 1, c: col - 1 });
}

/**
 * Last used row and column of the sheet (1-indexed). An empty sheet reports 0/0.
 */
export function getSheetBounds(worksheet: ExcelJS.Worksheet): SheetBounds {
  return { maxRow: worksheet.rowCount, maxCol: worksheet.columnCount };
}

/**
 * Existing cell at a coordinate. Reading never creates cells beyond the used range.
 */
export function getCell(worksheet: ExcelJS.Worksheet, row: number, col: number): ExcelJS.Cell | undefined {
  if (row < 1 || col < 1 || row > worksheet.rowCount) return undefined;
  const sheetRow = worksheet.getRow(row);
  return col <= sheetRow.cellCount ? sheetRow.getCell(col) : undefined;
}

/** Non-anchor cell of a merged range; it mirrors the anchor's value but holds none itself. */
export function isMergeSecondary(cell: ExcelJS.Cell): boolean {
  return cell.isMerged && cell.master.address !== cell.address;
}

/**
 * Plain value of an ExcelJS cell value: rich text is joined, formulas give their cached result,
 * hyperlinks their text. Errors read as empty.
 */
export function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map(run => run.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) {
    const { result } = value;
    if (result === undefined || result === null) return null;
    if (result instanceof Date) return result;
    if (typeof result === 'object') return null;
    return result;
  }
  return null;
}

export function getCellValue(worksheet: ExcelJS.Worksheet, row: number, col: number): CellValue {
  const cell = getCell(worksheet, row, col);
  if (!cell || isMergeSecondary(cell)) return null;
  return toCellValue(cell.value);
}

export function getCellText(worksheet: ExcelJS.Worksheet, row: number, col: number): string | null {
  const value = getCellValue(worksheet, row, col);
  return typeof value === 'string' ? value : null;
}

export function isBlankValue(value: CellValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Replaces the value of a cell while keeping the cell and its style.
 * Clearing keeps the cell too, so a blanked template cell keeps its borders and fill.
 * A formula is replaced along with its value.
 */
export function setCellValue(worksheet: ExcelJS.Worksheet, row: number, col: number, value: CellValue): void {
  const existing = getCell(worksheet, row, col);
  if (!existing && value === null) return;
  const cell = existing ?? worksheet.getCell(row, col);
  cell.value = value;
}

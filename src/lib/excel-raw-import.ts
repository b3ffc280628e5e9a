import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx-js-style';
import type { CellValue } from './excel-types';

function sheetJsCellValue(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell || cell.t === 'z' || cell.t === 'e' || cell.v === undefined) return null;
  return cell.v;
}

/**
 * Copies the cached values and merges of a SheetJS workbook into a fresh ExcelJS workbook,
 * so raw extracts in any format SheetJS reads go through the same cell model as the templates.
 * Styles are not carried over; raw extracts only supply values.
 */
export function importSheetJsWorkbook(source: XLSX.WorkBook): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  for (const sheetName of source.SheetNames) {
    const sheet = source.Sheets[sheetName];
    const target = workbook.addWorksheet(sheetName);
    const ref = sheet?.['!ref'];
    if (!sheet || !ref) continue;

    const range = XLSX.utils.decode_range(ref);
    for (let r = range.s.r; r <= range.e.r; r++) {
      for (let c = range.s.c; c <= range.e.c; c++) {
        const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
        const value = sheetJsCellValue(cell);
        if (value !== null) target.getCell(r + 1, c + 1).value = value;
      }
    }

    for (const merge of sheet['!merges'] ?? []) {
      target.mergeCells(merge.s.r + 1, merge.s.c + 1, merge.e.r + 1, merge.e.c + 1);
    }
  }

  return workbook;
}

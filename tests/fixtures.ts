/**
 * Shared builders for the workbook tests. All sheets are made up in memory.
 */

import ExcelJS from 'exceljs';
import type { CellValue } from '../src/lib/excel-types';

/** `null` creates an empty cell (it counts towards the used range), `undefined` leaves the cell out. */
export type Row = (CellValue | undefined)[];

export function fillSheet(sheet: ExcelJS.Worksheet, rows: readonly Row[]): ExcelJS.Worksheet {
  rows.forEach((row, rowIndex) => {
    row.forEach((value, colIndex) => {
      if (value === undefined) return;
      sheet.getCell(rowIndex + 1, colIndex + 1).value = value;
    });
  });
  return sheet;
}

export function workbookOf(sheets: Record<string, readonly Row[]>): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    fillSheet(workbook.addWorksheet(name), rows);
  }
  return workbook;
}

export function sheetOf(rows: readonly Row[], name = 'Tabelle'): ExcelJS.Worksheet {
  return fillSheet(new ExcelJS.Workbook().addWorksheet(name), rows);
}

/** Raw extract of a single-region table: header, three data rows, footnote and footer. */
export function singleRawRows(): Row[] {
  return [
    ['Tabelle 2. Testtabelle'],
    ['Dezember 2025'],
    ['Merkmal', 'Anzahl', 'Anteil'],
    ['Insgesamt', 1500.4, 100],
    ['Männer', 800, 53.3],
    ['Frauen', 700, 'X'],
    ['- Nichts vorhanden'],
    ['(C)opyright 2025 Amt', null, null, 'Stand: 15.12.2025'],
  ];
}

/** Template matching `singleRawRows`, with last year's footer. */
export function singleTemplateRows(): Row[] {
  return [
    ['Tabelle 2. Testtabelle'],
    [null],
    ['Monat Jahr'],
    ['Merkmal', 'Anzahl', 'Anteil'],
    ['Insgesamt', 0, 0],
    ['Männer', 0, 0],
    ['Frauen', 0, 0],
    ['- Nichts vorhanden'],
    ['(C)opyright 2023 Amt', null, 'Stand: 01.01.2024'],
  ];
}

export function singleRawSheet(): ExcelJS.Worksheet {
  return sheetOf(singleRawRows(), 'XML-Tab2-Land');
}

export function singleTemplateSheet(): ExcelJS.Worksheet {
  return sheetOf(singleTemplateRows(), 'Tabelle2');
}

export interface CellState {
  address: string;
  value: unknown;
  style: unknown;
}

/** Plain copy of every cell's value and style, for comparing a sheet before and after a change. */
export function sheetState(sheet: ExcelJS.Worksheet): CellState[] {
  const cells: CellState[] = [];
  sheet.eachRow({ includeEmpty: true }, row => {
    row.eachCell({ includeEmpty: true }, cell => {
      cells.push({ address: cell.address, value: structuredClone(cell.value), style: structuredClone(cell.style) });
    });
  });
  return cells;
}

import ExcelJS from 'exceljs';
import { getUniqueSheetName, isMergeSecondary } from './excel-helpers';
import { getMergedRanges } from './excel-merge-index';
import { cloneStyle } from './excel-style';

export interface CollectionPart {
  /** Shown in the log; usually the output file the sheets came from. */
  label: string;
  workbook: ExcelJS.Workbook;
}

/**
 * Copies a worksheet into `target` under `name`: values, styles, merges, column widths,
 * row heights, views and page setup. The copy shares no objects with the source.
 */
export function copyWorksheet(source: ExcelJS.Worksheet, target: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const copy = target.addWorksheet(name, {
    properties: structuredClone(source.properties),
    pageSetup: structuredClone(source.pageSetup),
    views: structuredClone(source.views),
  });

  (source.columns ?? []).forEach((column, index) => {
    const targetColumn = copy.getColumn(index + 1);
    if (column.width !== undefined) targetColumn.width = column.width;
    if (column.hidden) targetColumn.hidden = true;
  });

  // Values first: once merged, writes to secondary cells go to the anchor.
  source.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    const targetRow = copy.getRow(rowNumber);
    if (row.height !== undefined) targetRow.height = row.height;
    if (row.hidden) targetRow.hidden = true;
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      if (isMergeSecondary(cell)) return;
      targetRow.getCell(colNumber).value = structuredClone(cell.value);
    });
  });

  for (const range of getMergedRanges(source)) {
    copy.mergeCells(range.minRow, range.minCol, range.maxRow, range.maxCol);
  }

  // Styles last: merging gives every cell of the range the anchor's style.
  source.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      copy.getCell(rowNumber, colNumber).style = cloneStyle(cell.style);
    });
  });

  return copy;
}

/**
 * Appends copies of all sheets of `sourceWb` to `destWb`, renaming on name clashes.
 * @returns The names the sheets received in the destination workbook.
 */
export function appendWorkbookSheets(destWb: ExcelJS.Workbook, sourceWb: ExcelJS.Workbook): string[] {
    const appended: string[] = [];
    sourceWb.worksheets.forEach(sourceSheet => {
        const sheetName = sourceSheet.name;
        const finalName = getUniqueSheetName(destWb, sheetName);
        if (finalName !== sheetName) {
            console.log(`Sheet "${sheetName}" already exists in the collection, appending it as "${finalName}".`);
        }
        copyWorksheet(sourceSheet, destWb, finalName);
        appended.push(finalName);
    });
    return appended;
}

/**
 * Concatenates already built table workbooks, in the given order, into one workbook.
 */
export function assembleCollection(parts: readonly CollectionPart[]): ExcelJS.Workbook {
    console.log(`Assembling collection from ${parts.length} workbooks.`);
    const collection = new ExcelJS.Workbook();
    parts.forEach(part => {
        const names = appendWorkbookSheets(collection, part.workbook);
        console.log(`Added ${names.length} sheet(s) from ${part.label}: ${names.join(', ')}`);
    });
    return collection;
}

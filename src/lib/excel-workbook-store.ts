import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx-js-style';
import fs from 'fs/promises';
import { importSheetJsWorkbook } from './excel-raw-import';

/**
 * Where workbooks come from and go to. The batch runner only talks to this interface,
 * so tests can hand it workbooks built in memory.
 */
export interface WorkbookStore {
  exists(filePath: string): Promise<boolean>;
  /** Cached cell values and merges only; formulas are not evaluated. */
  readValues(filePath: string): Promise<ExcelJS.Workbook>;
  /** The full workbook: values, styles, number formats, merges and row/column dimensions. */
  readStyled(filePath: string): Promise<ExcelJS.Workbook>;
  write(workbook: ExcelJS.Workbook, filePath: string): Promise<void>;
  ensureDir(dirPath: string): Promise<void>;
}

/**
 * Raw extracts are parsed by SheetJS, templates and outputs are loaded and saved by ExcelJS.
 */
export const xlsxWorkbookStore: WorkbookStore = {
  async exists(filePath) {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  },

  async readValues(filePath) {
    const buffer = await fs.readFile(filePath);
    return importSheetJsWorkbook(XLSX.read(buffer, { type: 'buffer', cellDates: true }));
  },

  async readStyled(filePath) {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    return workbook;
  },

  async write(workbook, filePath) {
    await workbook.xlsx.writeFile(filePath);
  },

  async ensureDir(dirPath) {
    await fs.mkdir(dirPath, { recursive: true });
  },
};

/**
 * Batch runner tests
 *
 * The runner is driven through an in-memory WorkbookStore and a stubbed discovery step,
 * so no files are read or written. The store keeps workbooks as xlsx buffers, like files on disk.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'path';
import ExcelJS from 'exceljs';
import { runBatch } from '../src/lib/excel-batch-runner';
import type { RunOptions } from '../src/lib/excel-batch-runner';
import { parseTablesConfig } from '../src/lib/excel-table-config';
import type { TableConfig } from '../src/lib/excel-table-config';
import type { DiscoveryResult, RawFileEntry } from '../src/lib/excel-file-discovery';
import type { WorkbookStore } from '../src/lib/excel-workbook-store';
import { getCellValue } from '../src/lib/excel-helpers';
import { singleRawRows, singleTemplateRows, workbookOf } from './fixtures';

// ============================================================================
// Test Helpers
// ============================================================================

class MemoryWorkbookStore implements WorkbookStore {
  readonly files = new Map<string, ExcelJS.Buffer>();
  readonly written = new Map<string, ExcelJS.Buffer>();
  readonly dirs: string[] = [];

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath) || this.written.has(filePath);
  }

  async readValues(filePath: string): Promise<ExcelJS.Workbook> {
    return this.read(filePath);
  }

  async readStyled(filePath: string): Promise<ExcelJS.Workbook> {
    return this.read(filePath);
  }

  async write(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
    this.written.set(filePath, await workbook.xlsx.writeBuffer());
  }

  async ensureDir(dirPath: string): Promise<void> {
    this.dirs.push(dirPath);
  }

  async seed(filePath: string, workbook: ExcelJS.Workbook): Promise<void> {
    this.files.set(filePath, await workbook.xlsx.writeBuffer());
  }

  async output(filePath: string): Promise<ExcelJS.Workbook> {
    if (!this.written.has(filePath)) throw new Error(`${filePath} was not written`);
    return this.read(filePath);
  }

  private async read(filePath: string): Promise<ExcelJS.Workbook> {
    const buffer = this.written.get(filePath) ?? this.files.get(filePath);
    if (!buffer) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`);
    }
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer);
    return workbook;
  }
}

function sheetNamed(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new Error(`sheet ${name} missing`);
  return sheet;
}

function tableInput(id: string) {
  return {
    id,
    rawSheetName: `XML-Tab${id}-Land`,
    filePattern: `Tabelle-${id}-Land_*.xlsx`,
    numericFormatExcludedColumns: ['C'],
    variants: {
      external: { template: `Tabelle-${id}-Layout_g.xlsx`, outputSuffix: '_g', periodCell: { row: 3, col: 'A' } },
      internal: { template: `Tabelle-${id}-Layout_INTERN.xlsx`, outputSuffix: '_INTERN', periodCell: { row: 3, col: 'A' } },
    },
  };
}

const config = parseTablesConfig({
  layoutDir: 'layouts',
  inputDir: 'in',
  outputDir: 'out',
  tables: [tableInput('2'), tableInput('3')],
});

function rawEntry(id: string, periodTag: string): RawFileEntry {
  return { filePath: path.join('in', `Tabelle-${id}-Land_${periodTag}.xlsx`), tableId: id, periodTag };
}

function discoverFrom(result: DiscoveryResult): NonNullable<RunOptions['discover']> {
  return async () => result;
}

async function seededStore(): Promise<MemoryWorkbookStore> {
  const store = new MemoryWorkbookStore();
  await store.seed(path.join('in', 'Tabelle-2-Land_2025-12.xlsx'), workbookOf({ 'XML-Tab2-Land': singleRawRows() }));
  await store.seed(path.join('in', 'Tabelle-3-Land_2025-12.xlsx'), workbookOf({ 'XML-Tab3-Land': singleRawRows() }));
  await store.seed(path.join('in', 'Tabelle-2-Land_2025-11.xlsx'), workbookOf({ Tabelle1: singleRawRows() }));
  await store.seed(path.join('layouts', 'Tabelle-2-Layout_g.xlsx'), workbookOf({ T2: singleTemplateRows() }));
  await store.seed(path.join('layouts', 'Tabelle-2-Layout_INTERN.xlsx'), workbookOf({ T2: singleTemplateRows() }));
  await store.seed(path.join('layouts', 'Tabelle-3-Layout_g.xlsx'), workbookOf({ T3: singleTemplateRows() }));
  return store;
}

const NOW = new Date(2025, 11, 20);

// ============================================================================
// Tests
// ============================================================================

describe('runBatch', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes both variants, skips missing templates and isolates failing files', async () => {
    const store = await seededStore();
    const summary = await runBatch(config, {
      store,
      now: NOW,
      discover: discoverFrom({
        files: [rawEntry('2', '2025-12'), rawEntry('3', '2025-12'), rawEntry('2', '2025-11')],
        tablesWithoutFiles: [],
      }),
    });

    expect(store.dirs).toEqual(['out']);
    expect(summary.failed).toBe(1);
    expect(summary.files.map(file => file.status)).toEqual(['ok', 'ok', 'failed']);

    const [table2, table3, broken] = summary.files;
    if (table2.status !== 'ok' || table3.status !== 'ok' || broken.status !== 'failed') {
      throw new Error('unexpected outcome order');
    }

    expect(table2.variants.map(variant => variant.status)).toEqual(['written', 'written']);
    expect(table3.variants[1]).toEqual({
      variant: 'internal',
      status: 'skipped',
      reason: 'missing-template',
      templatePath: path.join('layouts', 'Tabelle-3-Layout_INTERN.xlsx'),
    });
    expect(broken.error).toBe(
      'Sheet "XML-Tab2-Land" not found in "Tabelle-2-Land_2025-11.xlsx". Available sheets: Tabelle1'
    );
    expect(console.error).toHaveBeenCalledWith(
      `Error while processing "${path.join('in', 'Tabelle-2-Land_2025-11.xlsx')}": ${broken.error}`
    );
  });

  it('fills the template with the raw values, period and footer', async () => {
    const store = await seededStore();
    await runBatch(config, {
      store,
      now: NOW,
      discover: discoverFrom({ files: [rawEntry('2', '2025-12')], tablesWithoutFiles: [] }),
    });

    const sheet = sheetNamed(await store.output(path.join('out', 'Tabelle-2-Land_2025-12_g.xlsx')), 'T2');

    expect(getCellValue(sheet, 3, 1)).toBe('Dezember 2025');
    expect([5, 6, 7].map(row => getCellValue(sheet, row, 2))).toEqual([1500, 800, 700]);
    expect(getCellValue(sheet, 9, 1)).toBe('(C)opyright 2025 Amt');
    expect(getCellValue(sheet, 9, 3)).toBe('Stand: 15.12.2025');
    expect(store.written.has(path.join('out', 'Tabelle-2-Land_2025-12_INTERN.xlsx'))).toBe(true);
  });

  it('builds one collection per period and variant in table order', async () => {
    const store = await seededStore();
    const summary = await runBatch(config, {
      store,
      now: NOW,
      discover: discoverFrom({
        files: [rawEntry('3', '2025-12'), rawEntry('2', '2025-12')],
        tablesWithoutFiles: [],
      }),
    });

    const externalPath = path.join('out', 'Tabellen_2025-12_g.xlsx');
    const internalPath = path.join('out', 'Tabellen_2025-12_INTERN.xlsx');
    expect(summary.collections).toEqual([
      { periodTag: '2025-12', variant: 'external', outputPath: externalPath, parts: 2 },
      { periodTag: '2025-12', variant: 'internal', outputPath: internalPath, parts: 1 },
    ]);
    const sheetNames = async (filePath: string) => (await store.output(filePath)).worksheets.map(sheet => sheet.name);
    expect(await sheetNames(externalPath)).toEqual(['T2', 'T3']);
    expect(await sheetNames(internalPath)).toEqual(['T2']);
  });

  it('skips collections when they are disabled', async () => {
    const store = await seededStore();
    const summary = await runBatch({ ...config, collection: { ...config.collection, enabled: false } }, {
      store,
      now: NOW,
      discover: discoverFrom({ files: [rawEntry('2', '2025-12')], tablesWithoutFiles: [] }),
    });

    expect(summary.collections).toEqual([]);
    expect([...store.written.keys()]).toEqual([
      path.join('out', 'Tabelle-2-Land_2025-12_g.xlsx'),
      path.join('out', 'Tabelle-2-Land_2025-12_INTERN.xlsx'),
    ]);
  });

  it('reports tables without raw files', async () => {
    const missing: TableConfig[] = config.tables.filter(table => table.id === '3');
    const summary = await runBatch(config, {
      store: new MemoryWorkbookStore(),
      now: NOW,
      discover: discoverFrom({ files: [], tablesWithoutFiles: missing }),
    });

    expect(summary).toEqual({
      files: [],
      skippedTables: [{ tableId: '3', reason: 'no-raw-files', pattern: 'Tabelle-3-Land_*.xlsx' }],
      collections: [],
      failed: 0,
    });
    expect(console.info).toHaveBeenCalledWith('No raw files found for table 3 (Tabelle-3-Land_*.xlsx), skipping.');
  });

  it('falls back to the run date when the extract carries no stamp', async () => {
    const store = await seededStore();
    const rows = singleRawRows();
    rows[7] = ['(C)opyright 2025 Amt'];
    await store.seed(path.join('in', 'Tabelle-2-Land_2025-12.xlsx'), workbookOf({ 'XML-Tab2-Land': rows }));

    await runBatch(config, {
      store,
      now: NOW,
      discover: discoverFrom({ files: [rawEntry('2', '2025-12')], tablesWithoutFiles: [] }),
    });

    const sheet = sheetNamed(await store.output(path.join('out', 'Tabelle-2-Land_2025-12_g.xlsx')), 'T2');
    expect(getCellValue(sheet, 9, 3)).toBe('Stand: 20.12.2025');
  });
});

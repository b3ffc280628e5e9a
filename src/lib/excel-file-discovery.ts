import { glob } from 'glob';
import path from 'path';
import type { TableConfig } from './excel-table-config';

export interface RawFileEntry {
  filePath: string;
  tableId: string;
  /** Reporting period taken from the file name, e.g. "2025-12" in "Tabelle-2-Land_2025-12.xlsx". */
  periodTag: string;
}

export interface DiscoveryResult {
  files: RawFileEntry[];
  tablesWithoutFiles: TableConfig[];
}

export function periodTagFromFileName(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  const separator = base.indexOf('_');
  return separator === -1 ? '' : base.slice(separator + 1);
}

function isGeneratedOrLockFile(filePath: string, outputSuffixes: readonly string[]): boolean {
  const fileName = path.basename(filePath);
  if (fileName.startsWith('~$')) return true;
  const base = path.basename(filePath, path.extname(filePath));
  return outputSuffixes.some(suffix => base.endsWith(suffix));
}

/**
 * Finds the raw extracts of every configured table type in the input directory.
 * Outputs of earlier runs (recognized by their variant suffix) and Excel lock files are ignored.
 */
export async function discoverRawFiles(
  inputDir: string,
  tables: readonly TableConfig[],
  outputSuffixes: readonly string[]
): Promise<DiscoveryResult> {
  const files: RawFileEntry[] = [];
  const tablesWithoutFiles: TableConfig[] = [];

  for (const table of tables) {
    const matches = await glob(table.filePattern, { cwd: inputDir, nodir: true });
    const entries = matches
      .filter(match => !isGeneratedOrLockFile(match, outputSuffixes))
      .sort()
      .map(match => ({
        filePath: path.join(inputDir, match),
        tableId: table.id,
        periodTag: periodTagFromFileName(match),
      }));

    if (entries.length === 0) {
      tablesWithoutFiles.push(table);
    }
    files.push(...entries);
  }

  return { files, tablesWithoutFiles };
}

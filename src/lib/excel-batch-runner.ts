import path from 'path';
import type { Variant } from './excel-types';
import { VARIANTS } from './excel-types';
import type { TableConfig, TablesConfig } from './excel-table-config';
import type { DiscoveryResult, RawFileEntry } from './excel-file-discovery';
import { discoverRawFiles } from './excel-file-discovery';
import type { SheetBuildReport } from './excel-table-pipeline';
import { buildTableVariant } from './excel-table-pipeline';
import { defaultAsOfStamp, extractAsOfStamp, extractPeriodLabel } from './excel-raw-metadata';
import type { CollectionPart } from './excel-sheet-merger';
import { assembleCollection } from './excel-sheet-merger';
import type { WorkbookStore } from './excel-workbook-store';
import { xlsxWorkbookStore } from './excel-workbook-store';

export type VariantOutcome =
  | { variant: Variant; status: 'written'; outputPath: string; sheets: SheetBuildReport[]; warnings: string[] }
  | { variant: Variant; status: 'skipped'; reason: 'missing-template'; templatePath: string };

export type FileOutcome =
  | { status: 'ok'; file: RawFileEntry; variants: VariantOutcome[] }
  | { status: 'failed'; file: RawFileEntry; error: string };

export interface TableSkip {
  tableId: string;
  reason: 'no-raw-files';
  pattern: string;
}

export interface CollectionOutcome {
  periodTag: string;
  variant: Variant;
  outputPath: string;
  parts: number;
}

export interface RunSummary {
  files: FileOutcome[];
  skippedTables: TableSkip[];
  collections: CollectionOutcome[];
  failed: number;
}

export interface RunOptions {
  store?: WorkbookStore;
  /** Reference date for the copyright year and the fallback "as of" stamp. */
  now?: Date;
  discover?: (inputDir: string, tables: readonly TableConfig[], outputSuffixes: readonly string[]) => Promise<DiscoveryResult>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds both variants of one raw file. Errors propagate to the caller, which isolates them per file.
 */
export async function processRawFile(
  file: RawFileEntry,
  table: TableConfig,
  config: TablesConfig,
  store: WorkbookStore,
  now: Date
): Promise<VariantOutcome[]> {
  console.log(`Processing table ${table.id} from "${file.filePath}"...`);
  const rawWorkbook = await store.readValues(file.filePath);
  const raw = rawWorkbook.getWorksheet(table.rawSheetName);
  if (!raw) {
    throw new Error(
      `Sheet "${table.rawSheetName}" not found in "${path.basename(file.filePath)}". ` +
      `Available sheets: ${rawWorkbook.worksheets.map(sheet => sheet.name).join(', ') || '(none)'}`
    );
  }

  const marker = config.footer.asOfMarker;
  const periodLabel = extractPeriodLabel(raw, config.monthNames);
  const asOfText = extractAsOfStamp(raw, marker) || defaultAsOfStamp(marker, now);
  if (!periodLabel) {
    console.warn(`  No reporting period found in "${table.rawSheetName}"; period cells keep their template text.`);
  }

  const baseName = path.basename(file.filePath, path.extname(file.filePath));
  const outcomes: VariantOutcome[] = [];

  for (const variant of VARIANTS) {
    const variantConfig = table.variants[variant];
    const templatePath = path.join(config.layoutDir, variantConfig.template);
    if (!(await store.exists(templatePath))) {
      console.warn(`  [WARNING] ${variant} template for table ${table.id} not found: ${templatePath}`);
      outcomes.push({ variant, status: 'skipped', reason: 'missing-template', templatePath });
      continue;
    }

    const template = await store.readStyled(templatePath);
    const result = buildTableVariant({
      raw,
      template,
      table,
      variant: variantConfig,
      periodLabel,
      asOfText,
      settings: {
        footer: config.footer,
        placeholders: config.placeholders,
        footnoteMarkers: config.footnoteMarkers,
        year: now.getFullYear(),
      },
    });

    const outputPath = path.join(config.outputDir, `${baseName}${variantConfig.outputSuffix}.xlsx`);
    await store.write(result.workbook, outputPath);
    console.log(`  -> ${variant}: ${outputPath}`);
    outcomes.push({ variant, status: 'written', outputPath, sheets: result.sheets, warnings: result.warnings });
  }

  return outcomes;
}

interface CollectionGroup {
  periodTag: string;
  variant: Variant;
  suffix: string;
  outputs: { tableId: string; outputPath: string }[];
}

function collectionFileName(pattern: string, periodTag: string, suffix: string): string {
  return pattern.split('{period}').join(periodTag).split('{suffix}').join(suffix);
}

/**
 * Concatenates, per reporting period and variant, every table written in this run into one workbook.
 */
async function writeCollections(
  files: readonly FileOutcome[],
  config: TablesConfig,
  store: WorkbookStore
): Promise<CollectionOutcome[]> {
  const tableOrder = new Map(config.tables.map((table, index) => [table.id, index]));
  const groups = new Map<string, CollectionGroup>();

  for (const outcome of files) {
    if (outcome.status !== 'ok') continue;
    const { periodTag, tableId } = outcome.file;
    if (!periodTag) continue;
    for (const variantOutcome of outcome.variants) {
      if (variantOutcome.status !== 'written') continue;
      const key = `${periodTag}\u0000${variantOutcome.variant}`;
      let group = groups.get(key);
      if (!group) {
        const table = config.tables.find(candidate => candidate.id === tableId);
        group = {
          periodTag,
          variant: variantOutcome.variant,
          suffix: table ? table.variants[variantOutcome.variant].outputSuffix : '',
          outputs: [],
        };
        groups.set(key, group);
      }
      group.outputs.push({ tableId, outputPath: variantOutcome.outputPath });
    }
  }

  const collections: CollectionOutcome[] = [];
  for (const group of groups.values()) {
    const ordered = [...group.outputs].sort(
      (a, b) => (tableOrder.get(a.tableId) ?? 0) - (tableOrder.get(b.tableId) ?? 0) || a.outputPath.localeCompare(b.outputPath)
    );
    try {
      const parts: CollectionPart[] = [];
      for (const output of ordered) {
        parts.push({ label: path.basename(output.outputPath), workbook: await store.readStyled(output.outputPath) });
      }
      const outputPath = path.join(config.outputDir, collectionFileName(config.collection.fileName, group.periodTag, group.suffix));
      await store.write(assembleCollection(parts), outputPath);
      console.log(`Collection for ${group.periodTag} (${group.variant}): ${outputPath}`);
      collections.push({ periodTag: group.periodTag, variant: group.variant, outputPath, parts: parts.length });
    } catch (error) {
      console.error(`Failed to assemble the ${group.variant} collection for ${group.periodTag}:`, describeError(error));
    }
  }
  return collections;
}

/**
 * Processes every raw extract found for the configured tables.
 * A failing file is reported and skipped; the remaining files are still processed.
 */
export async function runBatch(config: TablesConfig, options: RunOptions = {}): Promise<RunSummary> {
  const store = options.store ?? xlsxWorkbookStore;
  const now = options.now ?? new Date();

  await store.ensureDir(config.outputDir);

  const outputSuffixes = config.tables.flatMap(table => VARIANTS.map(variant => table.variants[variant].outputSuffix));
  const discover = options.discover ?? discoverRawFiles;
  const { files: rawFiles, tablesWithoutFiles } = await discover(config.inputDir, config.tables, outputSuffixes);

  const skippedTables = tablesWithoutFiles.map((table): TableSkip => {
    console.info(`No raw files found for table ${table.id} (${table.filePattern}), skipping.`);
    return { tableId: table.id, reason: 'no-raw-files', pattern: table.filePattern };
  });

  const files: FileOutcome[] = [];
  for (const file of rawFiles) {
    const table = config.tables.find(candidate => candidate.id === file.tableId);
    if (!table) continue;
    try {
      const variants = await processRawFile(file, table, config, store, now);
      files.push({ status: 'ok', file, variants });
    } catch (error) {
      const message = describeError(error);
      console.error(`Error while processing "${file.filePath}": ${message}`);
      files.push({ status: 'failed', file, error: message });
    }
  }

  const collections = config.collection.enabled ? await writeCollections(files, config, store) : [];

  const failed = files.filter(outcome => outcome.status === 'failed').length;
  console.log(`Done. ${files.length - failed} of ${files.length} raw files processed, ${failed} failed.`);
  return { files, skippedTables, collections, failed };
}

import { z } from 'zod';
import fs from 'fs/promises';
import { parseColumnIdentifier } from './excel-helpers';
import { DEFAULT_FOOTER_MARKERS } from './excel-footer-updater';
import { DEFAULT_MONTH_NAMES } from './excel-raw-metadata';
import { DEFAULT_FOOTNOTE_MARKERS } from './excel-region-detector';
import { DEFAULT_PLACEHOLDERS } from './excel-value-classifier';

/** A column given as a 1-based number or as letters ("B"), resolved to its number. */
const ColumnSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const col = parseColumnIdentifier(value);
  if (col === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid column identifier: ${value}` });
    return z.NEVER;
  }
  return col;
});

const CellSchema = z.object({
  row: z.number().int().positive(),
  col: ColumnSchema,
});

const VariantSchema = z.object({
  template: z.string().min(1).describe('Template file name inside the layout directory.'),
  outputSuffix: z.string().min(1).describe('Appended to the raw file base name, e.g. "_g".'),
  periodCell: CellSchema.optional().describe('Where the reporting period label goes.'),
  banner: CellSchema.extend({ text: z.string() }).optional().describe('Fixed text such as the internal-use header.'),
});

const BlocksSchema = z.object({
  labelColumn: ColumnSchema.default(1),
  labelPattern: z.string().min(1).refine(pattern => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  }, { message: 'Not a valid regular expression' }),
  scanColumns: z.number().int().positive().default(10),
});

const TableSchema = z.object({
  id: z.string().min(1),
  rawSheetName: z.string().min(1),
  filePattern: z.string().min(1).describe('Glob, relative to the input directory, matching the raw files.'),
  shape: z.enum(['single', 'blocks']).default('single'),
  scanColumn: ColumnSchema.default(2),
  copyFromColumn: ColumnSchema.default(2),
  columnMap: z.array(z.object({ raw: ColumnSchema, dest: ColumnSchema })).optional(),
  numericFormatExcludedColumns: z.array(ColumnSchema).default([]),
  blocks: BlocksSchema.optional(),
  variants: z.object({
    external: VariantSchema,
    internal: VariantSchema,
  }),
}).refine(table => table.shape !== 'blocks' || table.blocks !== undefined, {
  message: 'Tables with shape "blocks" need a "blocks" section',
  path: ['blocks'],
});

export const TablesConfigSchema = z.object({
  layoutDir: z.string().default('Layouts'),
  inputDir: z.string().default('.'),
  outputDir: z.string().default('Ausgabedateien'),
  footer: z.object({
    copyrightMarkers: z.array(z.string().min(1)).min(1).default([...DEFAULT_FOOTER_MARKERS.copyrightMarkers]),
    asOfMarker: z.string().min(1).default(DEFAULT_FOOTER_MARKERS.asOfMarker),
    copyrightHolder: z.string().min(1).default(DEFAULT_FOOTER_MARKERS.copyrightHolder),
  }).default({}),
  placeholders: z.array(z.string()).default([...DEFAULT_PLACEHOLDERS]),
  footnoteMarkers: z.array(z.string().min(1)).default([...DEFAULT_FOOTNOTE_MARKERS]),
  monthNames: z.array(z.string().min(1)).default([...DEFAULT_MONTH_NAMES]),
  collection: z.object({
    enabled: z.boolean().default(true),
    fileName: z.string().min(1).default('Tabellen_{period}{suffix}.xlsx'),
  }).default({}),
  tables: z.array(TableSchema).min(1),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.tables.forEach((table, index) => {
    if (seen.has(table.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate table id "${table.id}"`, path: ['tables', index, 'id'] });
    }
    seen.add(table.id);
  });
});

export type TablesConfigInput = z.input<typeof TablesConfigSchema>;
export type TablesConfig = z.infer<typeof TablesConfigSchema>;
export type TableConfig = TablesConfig['tables'][number];
export type VariantConfig = TableConfig['variants']['external'];

/**
 * Validates a parsed configuration object, reporting every problem at once.
 */
export function parseTablesConfig(raw: unknown): TablesConfig {
  const result = TablesConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid table configuration:\n${details}`);
  }
  return result.data;
}

export async function loadTablesConfig(configPath: string): Promise<TablesConfig> {
  const text = await fs.readFile(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Configuration file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseTablesConfig(raw);
}

import type ExcelJS from 'exceljs';
import type { FillResult, FooterUpdateResult, FormatResult, LabelCell, RegionDetectorOptions } from './excel-types';
import type { TableConfig, TablesConfig, VariantConfig } from './excel-table-config';
import { blockRowWindow, splitBlocks } from './excel-block-splitter';
import { updateFooter } from './excel-footer-updater';
import { formatNumericCells } from './excel-numeric-formatter';
import { dataWindowRowCount, detectDataWindow, rowWindowFromDataWindow } from './excel-region-detector';
import { fillTemplate, writeLabelCells } from './excel-template-filler';

export type EngineSettings = Pick<TablesConfig, 'footer' | 'placeholders' | 'footnoteMarkers'> & {
  /** Copyright year to write; the current year when omitted. */
  year?: number;
};

export interface BuildTableVariantInput {
  raw: ExcelJS.Worksheet;
  template: ExcelJS.Workbook;
  table: TableConfig;
  variant: VariantConfig;
  periodLabel: string;
  asOfText: string;
  settings: EngineSettings;
}

export interface SheetBuildReport {
  sheetName: string;
  fill: FillResult;
  footer: FooterUpdateResult;
  format: FormatResult;
}

export interface BuildResult {
  workbook: ExcelJS.Workbook;
  sheets: SheetBuildReport[];
  warnings: string[];
}

const NO_FILL: FillResult = { rowsCopied: 0, cellsWritten: 0, cellsSkipped: 0 };

function variantLabels(variant: VariantConfig, periodLabel: string): LabelCell[] {
  const labels: LabelCell[] = [];
  if (variant.banner) labels.push({ ...variant.banner });
  if (variant.periodCell && periodLabel) labels.push({ ...variant.periodCell, text: periodLabel });
  return labels;
}

/**
 * Stamps the footer and normalizes the number display of one filled template sheet.
 */
function finishSheet(
  dest: ExcelJS.Worksheet,
  fill: FillResult,
  input: BuildTableVariantInput,
  detectorOptions: RegionDetectorOptions
): SheetBuildReport {
  const { table, asOfText, settings } = input;
  const footer = updateFooter(dest, asOfText, { ...settings.footer, year: settings.year });

  // Only the data rows: years in headings and the footer line keep their template format.
  const destWindow = detectDataWindow(dest, table.scanColumn, detectorOptions);
  const rowCount = dataWindowRowCount(destWindow);
  const format = rowCount > 0
    ? formatNumericCells(dest, table.numericFormatExcludedColumns, {
        placeholders: settings.placeholders,
        rows: { from: destWindow.firstDataRow, to: destWindow.firstDataRow + rowCount - 1 },
      })
    : { cellsFormatted: 0, valuesRounded: 0 };

  console.log(
    `Sheet "${dest.name}": ${fill.rowsCopied} rows copied, ${fill.cellsWritten} cells written, ` +
    `${fill.cellsSkipped} merged cells skipped, ${format.cellsFormatted} numbers formatted, footer in row ${footer.anchorRow}.`
  );
  return { sheetName: dest.name, fill, footer, format };
}

function buildSingle(input: BuildTableVariantInput, detectorOptions: RegionDetectorOptions): BuildResult {
  const { raw, template, table, variant, periodLabel } = input;
  const dest = template.worksheets[0];
  if (!dest) {
    throw new Error(`Template "${variant.template}" has no sheets.`);
  }

  writeLabelCells(dest, variantLabels(variant, periodLabel));

  const rawWindow = detectDataWindow(raw, table.scanColumn, detectorOptions);
  const destWindow = detectDataWindow(dest, table.scanColumn, detectorOptions);
  const fill = fillTemplate(raw, dest, rowWindowFromDataWindow(rawWindow), rowWindowFromDataWindow(destWindow), {
    copyFromColumn: table.copyFromColumn,
    columnMap: table.columnMap,
  });

  return { workbook: template, sheets: [finishSheet(dest, fill, input, detectorOptions)], warnings: [] };
}

function buildBlocks(input: BuildTableVariantInput, detectorOptions: RegionDetectorOptions): BuildResult {
  const { raw, template, table, variant, periodLabel } = input;
  const warnings: string[] = [];
  if (!table.blocks) {
    throw new Error(`Table ${table.id} has shape "blocks" but no block settings.`);
  }

  const blocks = splitBlocks(raw, {
    labelColumn: table.blocks.labelColumn,
    labelPattern: new RegExp(table.blocks.labelPattern),
    scanColumns: table.blocks.scanColumns,
  });
  const rawFootnoteRow = detectDataWindow(raw, table.scanColumn, detectorOptions).footnoteStartRow;

  if (blocks.length === 0) {
    warnings.push(`No block label matching /${table.blocks.labelPattern}/ found in sheet "${table.rawSheetName}"; template values are kept.`);
  } else if (blocks.length !== template.worksheets.length) {
    warnings.push(`Found ${blocks.length} blocks for ${template.worksheets.length} template sheets in "${variant.template}"; only the first ${Math.min(blocks.length, template.worksheets.length)} are filled.`);
  }
  warnings.forEach(warning => console.warn(warning));

  const sheets = template.worksheets.map((dest, index) => {
    writeLabelCells(dest, variantLabels(variant, periodLabel));

    const block = blocks[index];
    let fill = { ...NO_FILL };
    if (block) {
      const rawWindow = blockRowWindow(raw, block, table.scanColumn, {
        classifier: detectorOptions.classifier,
        footnoteStartRow: rawFootnoteRow,
      });
      const destWindow = detectDataWindow(dest, table.scanColumn, detectorOptions);
      fill = fillTemplate(raw, dest, rawWindow, rowWindowFromDataWindow(destWindow), {
        copyFromColumn: table.copyFromColumn,
        columnMap: table.columnMap,
      });
    }
    return finishSheet(dest, fill, input, detectorOptions);
  });

  return { workbook: template, sheets, warnings };
}

/**
 * Builds one variant (external or internal) of one table type on a freshly loaded template workbook.
 * The template is modified in place and returned as the result workbook.
 */
export function buildTableVariant(input: BuildTableVariantInput): BuildResult {
  const detectorOptions: RegionDetectorOptions = {
    footnoteMarkers: input.settings.footnoteMarkers,
    classifier: { placeholders: input.settings.placeholders },
  };
  return input.table.shape === 'blocks'
    ? buildBlocks(input, detectorOptions)
    : buildSingle(input, detectorOptions);
}

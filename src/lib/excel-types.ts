/** Output form of a table: the public (redacted) or the internal (unredacted) layout. */
export type Variant = 'external' | 'internal';
export const VARIANTS: readonly Variant[] = ['external', 'internal'];

/**
 * `single`: one data region copied into the template's first sheet.
 * `blocks`: the raw sheet repeats one sub-table per region, each mapped onto its own template sheet.
 */
export type TableShape = 'single' | 'blocks';

export type CellValue = string | number | boolean | Date | null;

/** 1-indexed row/column coordinate, as the tables are described by their authors. */
export interface CellCoordinate {
  row: number;
  col: number;
}

/** 1-indexed, inclusive rectangle. */
export interface MergedRange {
  minRow: number;
  minCol: number;
  maxRow: number;
  maxCol: number;
}

export interface SheetBounds {
  maxRow: number;
  maxCol: number;
}

/**
 * Copy window of a sheet: `firstDataRow` is inclusive, `footnoteStartRow` exclusive.
 * The two bounds are detected independently, so `footnoteStartRow` may lie above `firstDataRow`
 * on malformed sheets; use `dataWindowRowCount` rather than subtracting.
 */
export interface DataWindow {
  firstDataRow: number;
  footnoteStartRow: number;
}

/** Inclusive row range of one repeated sub-table. */
export interface Block {
  start: number;
  end: number;
}

export interface RowWindow {
  firstRow: number;
  rowCount: number;
}

export interface ColumnMapping {
  raw: number;
  dest: number;
}

export interface ClassifierPolicy {
  placeholders?: readonly string[];
  allowEmpty?: boolean;
}

export interface RegionDetectorOptions {
  footnoteMarkers?: readonly string[];
  classifier?: ClassifierPolicy;
}

export interface BlockSplitOptions {
  labelColumn: number;
  labelPattern: RegExp;
  /** Number of leading columns inspected when trimming trailing blank rows. */
  scanColumns: number;
}

export interface FillOptions {
  copyFromColumn: number;
  columnMap?: readonly ColumnMapping[];
}

export interface FillResult {
  rowsCopied: number;
  cellsWritten: number;
  cellsSkipped: number;
}

export interface LabelCell extends CellCoordinate {
  text: string;
}

export interface LabelWriteResult {
  written: number;
  skipped: CellCoordinate[];
}

export interface FooterMarkers {
  copyrightMarkers: readonly string[];
  asOfMarker: string;
  copyrightHolder: string;
}

export interface FooterUpdateOptions extends Partial<FooterMarkers> {
  year?: number;
}

export interface FooterUpdateResult {
  anchorRow: number;
  stampColumn: number;
  synthesized: boolean;
  clearedStamps: number;
}

export interface NumericFormatOptions {
  placeholders?: readonly string[];
  rows?: { from: number; to: number };
}

export interface FormatResult {
  cellsFormatted: number;
  valuesRounded: number;
}

import type ExcelJS from 'exceljs';
import type { FooterMarkers, FooterUpdateOptions, FooterUpdateResult } from './excel-types';
import { escapeRegex, getCell, getCellText, getSheetBounds, setCellValue } from './excel-helpers';
import { MergeIndex } from './excel-merge-index';
import { withAlignment } from './excel-style';

export const DEFAULT_FOOTER_MARKERS: FooterMarkers = {
  copyrightMarkers: ['(C)opyright', 'Copyright', '©'],
  asOfMarker: 'Stand:',
  copyrightHolder: 'Statistisches Landesamt',
};

export function containsCopyrightMarker(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some(marker => lower.includes(marker.toLowerCase()));
}

/**
 * Replaces the four-digit year that follows a copyright marker. Everything else is kept verbatim.
 */
export function rewriteCopyrightYear(text: string, markers: readonly string[], year: number): string {
  if (markers.length === 0) return text;
  const alternatives = [...markers].sort((a, b) => b.length - a.length).map(escapeRegex).join('|');
  const pattern = new RegExp(`(${alternatives})(\\s*)\\d{4}`, 'i');
  return text.replace(pattern, (_match, marker: string, gap: string) => `${marker}${gap}${year}`);
}

/**
 * Collapses a stamp that repeats the as-of marker into one marker and the distinct texts that followed it.
 * The whitespace after the first marker is kept; a repeated date appears once.
 */
export function normalizeAsOfStamp(text: string, marker: string): string {
  const trimmed = text.trim();
  if (!marker) return trimmed;
  const segments = trimmed.split(marker).slice(1);
  if (segments.length <= 1) return trimmed;

  const gap = /^\s*/.exec(segments.find(segment => segment.trim() !== '') ?? '')?.[0] ?? '';
  const parts = [...new Set(segments.map(segment => segment.trim()).filter(segment => segment !== ''))];
  return `${marker}${gap}${parts.join(' ')}`.trim();
}

function findStampColumn(worksheet: ExcelJS.Worksheet, row: number, maxCol: number, marker: string): number | null {
  for (let col = 2; col <= maxCol; col++) {
    if (getCellText(worksheet, row, col)?.includes(marker)) return col;
  }
  return null;
}

/**
 * Rewrites the footer line of a template sheet: the copyright year in column A of the last
 * copyright row, and the "as of" stamp in the same row, right-aligned in the font of column A.
 * Stale stamps anywhere else in the sheet are blanked. Running it again with the same stamp changes nothing.
 */
export function updateFooter(
  worksheet: ExcelJS.Worksheet,
  asOfText: string,
  options: FooterUpdateOptions = {}
): FooterUpdateResult {
  const { year: yearOverride, ...markerOverrides } = options;
  const markers: FooterMarkers = { ...DEFAULT_FOOTER_MARKERS, ...markerOverrides };
  const year = yearOverride ?? new Date().getFullYear();
  const mergeIndex = MergeIndex.forSheet(worksheet);
  const { maxRow } = getSheetBounds(worksheet);

  let anchorRow: number | null = null;
  let copyrightText = '';
  for (let row = maxRow; row >= 1; row--) {
    const text = getCellText(worksheet, row, 1);
    if (text && containsCopyrightMarker(text, markers.copyrightMarkers)) {
      anchorRow = row;
      copyrightText = text;
      break;
    }
  }

  let synthesized = false;
  if (anchorRow === null) {
    // One blank separator row, then the new copyright line.
    anchorRow = maxRow + 2;
    setCellValue(worksheet, anchorRow, 1, `(C)opyright ${year} ${markers.copyrightHolder}`);
    synthesized = true;
  } else {
    const updated = rewriteCopyrightYear(copyrightText, markers.copyrightMarkers, year);
    if (updated !== copyrightText) setCellValue(worksheet, anchorRow, 1, updated);
  }

  const { maxCol } = getSheetBounds(worksheet);
  let stampColumn = findStampColumn(worksheet, anchorRow, maxCol, markers.asOfMarker) ?? Math.max(maxCol, 2);
  if (mergeIndex.isSecondary(anchorRow, stampColumn)) {
    const covering = mergeIndex.rangeAt(anchorRow, stampColumn);
    stampColumn = covering ? covering.maxCol + 1 : stampColumn;
  }

  let clearedStamps = 0;
  const bounds = getSheetBounds(worksheet);
  for (let row = 1; row <= bounds.maxRow; row++) {
    for (let col = 1; col <= bounds.maxCol; col++) {
      if (row === anchorRow && (col === 1 || col === stampColumn)) continue;
      if (mergeIndex.isSecondary(row, col)) continue;
      const text = getCellText(worksheet, row, col);
      if (text && text.trim().startsWith(markers.asOfMarker)) {
        setCellValue(worksheet, row, col, null);
        clearedStamps++;
      }
    }
  }

  setCellValue(worksheet, anchorRow, stampColumn, normalizeAsOfStamp(asOfText, markers.asOfMarker));
  worksheet.getCell(anchorRow, stampColumn).style = withAlignment(getCell(worksheet, anchorRow, 1)?.style, 'right');

  return { anchorRow, stampColumn, synthesized, clearedStamps };
}

import type ExcelJS from 'exceljs';

/**
 * Style of a cell: font, border, fill, alignment, number format and protection.
 * Treated as a value: every copy is structural, so two cells never share one mutable style object.
 */
export type StyleBundle = Readonly<Partial<ExcelJS.Style>>;

export type HorizontalAlignment = 'left' | 'center' | 'right';
export type VerticalAlignment = 'top' | 'middle' | 'bottom';

/** Deep copy of a style bundle; a missing style copies as an empty one. */
export function cloneStyle(style: StyleBundle | undefined): StyleBundle {
  return structuredClone(style ?? {});
}

/**
 * Copy of `style` with its alignment replaced, keeping the vertical alignment unless the style has none.
 */
export function withAlignment(
  style: StyleBundle | undefined,
  horizontal: HorizontalAlignment,
  fallbackVertical: VerticalAlignment = 'middle'
): StyleBundle {
  const copy = cloneStyle(style);
  const current = copy.alignment;
  return {
    ...copy,
    alignment: { ...current, horizontal, vertical: current?.vertical ?? fallbackVertical },
  };
}

export function withNumberFormat(style: StyleBundle | undefined, numFmt: string): StyleBundle {
  return { ...cloneStyle(style), numFmt };
}

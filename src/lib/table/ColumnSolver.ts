import type { ColumnPlan, ColumnWidth } from './types';

/**
 * Assign column widths.
 *
 * Columns are visited from narrowest to widest content. A column narrower
 * than the running default width keeps its content width and is centred; the
 * space it leaves is shared among the columns not yet visited. Any other
 * column takes the running default and is left-aligned.
 */
export function solveColumnWidths(
  maxWidths: readonly number[],
  availableWidth: number,
  margin: number
): ColumnWidth[] {
  const count = maxWidths.length;
  if (count === 0) {
    return [];
  }

  const result: ColumnWidth[] = maxWidths.map(() => ({ width: 0, centered: false }));
  const order = maxWidths
    .map((width, index) => ({ width, index }))
    .sort((a, b) => a.width - b.width);

  let defaultWidth = Math.max(0, (availableWidth - (count - 1) * margin) / count);
  let remaining = count - 1;

  for (const { width, index } of order) {
    if (width < defaultWidth) {
      result[index] = { width, centered: true };
      if (remaining > 0) {
        defaultWidth += (defaultWidth - width) / remaining;
      }
      remaining--;
    } else {
      result[index] = { width: defaultWidth, centered: false };
    }
  }

  return result;
}

/**
 * Sum of column widths plus the margins between them.
 */
export function tableWidth(columns: readonly ColumnWidth[], margin: number): number {
  if (columns.length === 0) {
    return 0;
  }
  return columns.reduce((sum, column) => sum + column.width, 0) + (columns.length - 1) * margin;
}

/**
 * Lay columns out left to right from `left`.
 */
export function placeColumns(columns: readonly ColumnWidth[], left: number, margin: number): ColumnPlan[] {
  let x = left;
  return columns.map((column) => {
    const plan = { ...column, x };
    x += column.width + margin;
    return plan;
  });
}

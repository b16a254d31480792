import type { PageHandle } from '../rendering/types';

/**
 * A token collected inside a table. Literal tokens came from an escape and
 * never act as table markup.
 */
export interface TableToken {
  text: string;
  literal: boolean;
}

/**
 * A parsed table. Every row, header included, has the same number of cells.
 */
export interface TableContent {
  title: string;
  header: string[] | null;
  rows: string[][];
}

export interface ColumnWidth {
  width: number;
  /** Narrow columns are centred; columns at the shared default width are left-aligned. */
  centered: boolean;
}

export interface ColumnPlan extends ColumnWidth {
  x: number;
}

export interface RowPlan {
  header: boolean;
  /** Wrapped lines, one array per cell. */
  cells: string[][];
  lineCount: number;
  height: number;
  /** Shaded body row. */
  offRow: boolean;
}

export interface TablePlan {
  titleLines: string[];
  columns: ColumnPlan[];
  rows: RowPlan[];
  /** Left edge of the first column. */
  left: number;
  /** Rendered width: columns plus inter-column margins, never wider than nominalWidth. */
  width: number;
  nominalWidth: number;
  /** From the first line's baseline to the bottom of the last line drawn. */
  estimatedHeight: number;
  /** Title lines down to the bottom of the first grid line; 0 without a title. */
  titleBlockHeight: number;
}

/**
 * One visited line of the table grid.
 */
export interface TableLinePosition {
  rowIndex: number;
  lineIndex: number;
  pageIndex: number;
  page: PageHandle;
  y: number;
  offRow: boolean;
}

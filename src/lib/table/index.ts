export { TableLayout } from './TableLayout';
export { parseTableTokens, normalizeTable, TITLE_TAG, ROW_TAG, COLUMN_DELIMITER } from './TableParser';
export { solveColumnWidths, tableWidth, placeColumns } from './ColumnSolver';
export type {
  TableToken,
  TableContent,
  ColumnWidth,
  ColumnPlan,
  RowPlan,
  TablePlan,
  TableLinePosition
} from './types';

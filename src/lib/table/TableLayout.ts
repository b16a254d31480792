import type { LayoutConfig } from '../config';
import type { FlowRegion, FontStyle, TextFont } from '../types';
import type { Renderer } from '../rendering/types';
import { isDegenerateRegion, regionHeight, regionWidth } from '../layout/FlowRegion';
import type { FlowResult, PageCursor } from '../layout/PageCursor';
import type { FontMetrics } from '../text/FontMetrics';
import { splitTokens } from '../text/LineWrapper';
import type { TextFlow } from '../text/TextFlow';
import { placeColumns, solveColumnWidths, tableWidth } from './ColumnSolver';
import type { RowPlan, TableContent, TableLinePosition, TablePlan } from './types';

const TITLE_FONT: TextFont = { style: 'bold', textClass: 'tableTitle' };

function rowStyle(header: boolean): FontStyle {
  return header ? 'bold' : 'regular';
}

/**
 * Lays out a table: column solving, cell wrapping, row pagination and
 * off-row shading.
 *
 * Rendering walks the grid twice with the same line iterator, once for the
 * shading and once for the text, starting from the same cursor snapshot, so
 * both passes visit the same lines on the same pages.
 */
export class TableLayout {
  constructor(
    private readonly metrics: FontMetrics,
    private readonly textFlow: TextFlow,
    private readonly config: LayoutConfig,
    private readonly renderer: Renderer
  ) {}

  /**
   * Compute column widths, wrapped cells and heights for a table placed in `region`.
   */
  plan(table: TableContent, region: FlowRegion): TablePlan {
    const body = this.config.text.tableBody;
    const { horizontalCellMargin, verticalCellMargin, outerHorizontalMargin } = this.config.table;

    const nominalWidth = regionWidth(region) - 2 * outerHorizontalMargin;
    const headerRows = table.header ? 1 : 0;
    const grid = table.header ? [table.header, ...table.rows] : table.rows;
    const columnCount = grid.length > 0 ? grid[0].length : 0;

    const maxWidths: number[] = Array.from({ length: columnCount }, () => 0);
    grid.forEach((row, rowIndex) => {
      const style = rowStyle(rowIndex < headerRows);
      row.forEach((cell, column) => {
        const width = this.metrics.width(splitTokens(cell).join(' '), style, body.size);
        maxWidths[column] = Math.max(maxWidths[column], width);
      });
    });

    const widths = solveColumnWidths(maxWidths, nominalWidth, horizontalCellMargin);
    const width = Math.min(nominalWidth, tableWidth(widths, horizontalCellMargin));
    const left = region.xMin + (regionWidth(region) - width) / 2;
    const columns = placeColumns(widths, left, horizontalCellMargin);

    const rows: RowPlan[] = columnCount === 0 ? [] : grid.map((row, rowIndex) => {
      const header = rowIndex < headerRows;
      const style = rowStyle(header);
      const cells = row.map((cell, column) =>
        this.textFlow.wrapper.wrap(splitTokens(cell), widths[column].width, style, body.size, {
          resolveEscapes: false
        })
      );
      // An all-empty row still occupies one line.
      const lineCount = Math.max(1, ...cells.map((lines) => lines.length));
      return {
        header,
        cells,
        lineCount,
        height: this.metrics.textHeight(lineCount, style, body.size, body.newline),
        offRow: !header && (rowIndex - headerRows) % 2 === 1
      };
    });

    const titleLines =
      table.title.trim().length > 0
        ? this.textFlow.wrapCentered(table.title, TITLE_FONT, nominalWidth, { resolveEscapes: false })
        : [];
    const title = this.config.text.tableTitle;
    const titleHeight = this.metrics.textHeight(titleLines.length, TITLE_FONT.style, title.size, title.newline);
    const rowStep = body.newline + verticalCellMargin;

    // Heights follow the steps render() and walkLines() take, down to the
    // bottom of the last line drawn.
    let estimatedHeight = titleHeight;
    let titleBlockHeight = titleHeight;
    if (rows.length > 0) {
      const titleSteps = titleLines.length > 0 ? (titleLines.length - 1) * title.newline + rowStep : 0;
      const gridSteps =
        rows.reduce((sum, row) => sum + (row.lineCount - 1) * body.newline, 0) + (rows.length - 1) * rowStep;
      const first = rows[0];
      const last = rows[rows.length - 1];
      estimatedHeight = titleSteps + gridSteps + this.metrics.lineHeight(rowStyle(last.header), body.size);
      titleBlockHeight =
        titleLines.length > 0 ? titleSteps + this.metrics.lineHeight(rowStyle(first.header), body.size) : 0;
    }

    return {
      titleLines,
      columns,
      rows,
      left,
      width,
      nominalWidth,
      estimatedHeight,
      titleBlockHeight
    };
  }

  /**
   * Visit every grid line in row order, advancing the cursor. The first line
   * lands at the cursor's current y; the first line of each later row drops by
   * one newline plus the inter-row margin.
   */
  *walkLines(plan: TablePlan, cursor: PageCursor): Generator<TableLinePosition, void, undefined> {
    const { newline } = this.config.text.tableBody;
    const gap = this.config.table.verticalCellMargin;

    cursor.startBlock();
    for (let rowIndex = 0; rowIndex < plan.rows.length; rowIndex++) {
      const row = plan.rows[rowIndex];
      for (let lineIndex = 0; lineIndex < row.lineCount; lineIndex++) {
        cursor.advanceLine(lineIndex === 0 && rowIndex > 0 ? newline + gap : newline);
        yield {
          rowIndex,
          lineIndex,
          pageIndex: cursor.pageIndex,
          page: cursor.page,
          y: cursor.y,
          offRow: row.offRow
        };
      }
    }
  }

  /**
   * Render `table` with its first line at the cursor. Starts a new page first
   * when the table, or its title with the first grid line, would fit on an
   * empty page but not in the space left.
   */
  render(cursor: PageCursor, table: TableContent): FlowResult {
    const region = cursor.region;
    if (isDegenerateRegion(region)) {
      return cursor.result();
    }

    const plan = this.plan(table, region);
    if (plan.titleLines.length === 0 && plan.rows.length === 0) {
      return cursor.result();
    }

    const remaining = cursor.y - region.yMin;
    const fitsOnlyOnNewPage = (height: number) => height > remaining && height <= regionHeight(region);
    if (fitsOnlyOnNewPage(plan.estimatedHeight) || fitsOnlyOnNewPage(plan.titleBlockHeight)) {
      cursor.startNewPage();
    }

    if (plan.titleLines.length > 0) {
      const inset = this.config.table.outerHorizontalMargin;
      this.textFlow.writeCenteredLines(cursor, plan.titleLines, TITLE_FONT, region.xMin + inset, region.xMax - inset);
      if (plan.rows.length > 0) {
        cursor.breakLine(this.config.text.tableBody.newline + this.config.table.verticalCellMargin, plan.left);
      }
    }

    if (plan.rows.length > 0) {
      const start = cursor.snapshot();
      this.drawShading(cursor, plan);
      cursor.restore(start);
      this.drawCells(cursor, plan);
    }

    cursor.markWritten(plan.left + plan.width);
    return cursor.result();
  }

  private drawShading(cursor: PageCursor, plan: TablePlan): void {
    const { size, newline } = this.config.text.tableBody;
    const { offRowColor, offRowYAdjustScalar, offRowThicknessScalar, outerHorizontalMargin } = this.config.table;
    const yAdjust = size * offRowYAdjustScalar;
    const thickness = newline * offRowThicknessScalar;
    const xStart = plan.left - outerHorizontalMargin;
    const xEnd = plan.left + plan.width + outerHorizontalMargin;

    for (const position of this.walkLines(plan, cursor)) {
      if (!position.offRow) {
        continue;
      }
      const y = position.y + yAdjust;
      this.renderer.drawLineSegment(position.page, xStart, y, xEnd, y, offRowColor, thickness);
    }
  }

  private drawCells(cursor: PageCursor, plan: TablePlan): void {
    const { size, color } = this.config.text.tableBody;

    for (const position of this.walkLines(plan, cursor)) {
      const row = plan.rows[position.rowIndex];
      const style = rowStyle(row.header);
      row.cells.forEach((lines, column) => {
        if (position.lineIndex >= lines.length) {
          return;
        }
        const line = lines[position.lineIndex];
        const { x, width, centered } = plan.columns[column];
        const lineWidth = this.metrics.width(line, style, size);
        const lineX = centered ? x + (width - lineWidth) / 2 : x;
        this.renderer.drawText(position.page, lineX, position.y, line, style, size, color);
      });
    }
  }
}

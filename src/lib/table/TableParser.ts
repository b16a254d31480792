import type { TableContent, TableToken } from './types';

export const TITLE_TAG = '<title>';
export const ROW_TAG = '<row>';
export const COLUMN_DELIMITER = '|';

function isTag(token: TableToken, tag: string): boolean {
  return !token.literal && token.text === tag;
}

/**
 * Parse the tokens collected between two table tags.
 *
 * An optional title comes first, between a pair of title tags. Rows start at
 * each row tag and cells are separated by the column delimiter. The first row
 * is the header.
 */
export function parseTableTokens(tokens: readonly TableToken[]): TableContent {
  let position = 0;
  const title: string[] = [];

  if (tokens.length > 0 && isTag(tokens[0], TITLE_TAG)) {
    position = 1;
    while (position < tokens.length && !isTag(tokens[position], TITLE_TAG)) {
      title.push(tokens[position].text);
      position++;
    }
    position++;
  }

  const rows: TableToken[][] = [];
  let current: TableToken[] | null = null;
  for (; position < tokens.length; position++) {
    const token = tokens[position];
    if (isTag(token, ROW_TAG)) {
      current = [];
      rows.push(current);
      continue;
    }
    if (current === null) {
      current = [];
      rows.push(current);
    }
    current.push(token);
  }

  const grid = rows.map(splitCells);
  return normalizeTable(title.join(' '), grid.length > 0 ? grid[0] : null, grid.slice(1));
}

function splitCells(row: readonly TableToken[]): string[] {
  const cells: string[][] = [[]];
  for (const token of row) {
    if (token.literal) {
      cells[cells.length - 1].push(token.text);
      continue;
    }
    token.text.split(COLUMN_DELIMITER).forEach((part, index) => {
      if (index > 0) {
        cells.push([]);
      }
      if (part.length > 0) {
        cells[cells.length - 1].push(part);
      }
    });
  }
  return cells.map((words) => words.join(' '));
}

/**
 * Pad every row (and the header) with empty cells to the widest row.
 */
export function normalizeTable(title: string, header: readonly string[] | null, rows: readonly (readonly string[])[]): TableContent {
  const columnCount = Math.max(header?.length ?? 0, ...rows.map((row) => row.length));
  const pad = (row: readonly string[]): string[] => [
    ...row,
    ...Array.from({ length: columnCount - row.length }, () => '')
  ];
  return {
    title,
    header: header ? pad(header) : null,
    rows: rows.map(pad)
  };
}

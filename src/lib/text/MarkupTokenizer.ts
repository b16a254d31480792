import type { FontStyle } from '../types';
import { ESCAPE_CHAR, splitTokens } from './LineWrapper';

export const STYLE_TAGS: ReadonlyMap<string, FontStyle> = new Map<string, FontStyle>([
  ['<r>', 'regular'],
  ['<b>', 'bold'],
  ['<i>', 'italic'],
  ['<bi>', 'boldItalic'],
  ['<ib>', 'boldItalic']
]);

export const TABLE_TAG = '<table>';

const TABLE_REFERENCE = /^\[table\]\[(\d+)\]$/;

export type MarkupToken =
  | { kind: 'style'; style: FontStyle; raw: string }
  | { kind: 'table-toggle'; raw: string }
  | { kind: 'table-reference'; index: number; raw: string }
  | { kind: 'escaped'; text: string }
  | { kind: 'plain'; text: string }
  | { kind: 'paragraph-end' };

/**
 * Classify a single whitespace-free token.
 */
export function classifyToken(token: string): MarkupToken {
  if (token.startsWith(ESCAPE_CHAR)) {
    return { kind: 'escaped', text: token.slice(1) };
  }
  const style = STYLE_TAGS.get(token);
  if (style !== undefined) {
    return { kind: 'style', style, raw: token };
  }
  if (token === TABLE_TAG) {
    return { kind: 'table-toggle', raw: token };
  }
  const reference = TABLE_REFERENCE.exec(token);
  if (reference) {
    return { kind: 'table-reference', index: Number(reference[1]), raw: token };
  }
  return { kind: 'plain', text: token };
}

/**
 * Tokenize marked-up text. Every input line ends with a paragraph-end token.
 */
export function tokenizeMarkup(text: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  for (const paragraph of text.split('\n')) {
    for (const token of splitTokens(paragraph)) {
      tokens.push(classifyToken(token));
    }
    tokens.push({ kind: 'paragraph-end' });
  }
  return tokens;
}

/**
 * The text a token stands for when it is not acting as markup.
 */
export function tokenText(token: Exclude<MarkupToken, { kind: 'paragraph-end' }>): string {
  switch (token.kind) {
    case 'escaped':
    case 'plain':
      return token.text;
    default:
      return token.raw;
  }
}

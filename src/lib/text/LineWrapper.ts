import type { FontStyle } from '../types';
import type { FontMetrics } from './FontMetrics';

export const ESCAPE_CHAR = '\\';

/**
 * Split text into whitespace-separated tokens.
 */
export function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Strip exactly one leading escape character.
 */
export function resolveEscape(token: string): string {
  return token.startsWith(ESCAPE_CHAR) ? token.slice(1) : token;
}

export interface WrapOptions {
  /**
   * Width available to the first line when it resumes after other text.
   * Defaults to the full available width.
   */
  firstLineWidth?: number;
  /**
   * Strip one leading escape character from each token before measuring.
   * Off for text whose escapes were already resolved by the markup tokenizer.
   */
  resolveEscapes?: boolean;
}

/**
 * Greedy word wrapper. Tokens are never broken: a token wider than the
 * available width sits alone on its line.
 */
export class LineWrapper {
  constructor(private readonly metrics: FontMetrics) {}

  wrap(
    tokens: readonly string[],
    availableWidth: number,
    style: FontStyle,
    size: number,
    options: WrapOptions = {}
  ): string[] {
    const words = (options.resolveEscapes === false ? [...tokens] : tokens.map(resolveEscape)).filter(
      (word) => word.length > 0
    );
    const lines: string[] = [];
    let limit = options.firstLineWidth ?? availableWidth;
    let current: string | null = null;

    for (const word of words) {
      if (current === null) {
        // Resumed first line too short for even one word: leave it empty.
        if (limit < availableWidth && this.metrics.width(word, style, size) > limit) {
          lines.push('');
          limit = availableWidth;
        }
        current = word;
        continue;
      }

      const candidate: string = `${current} ${word}`;
      if (this.metrics.width(candidate, style, size) <= limit) {
        current = candidate;
      } else {
        lines.push(current);
        current = word;
        limit = availableWidth;
      }
    }

    if (current !== null) {
      lines.push(current);
    }
    return lines;
  }
}

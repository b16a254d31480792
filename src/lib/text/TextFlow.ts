import type { LayoutConfig } from '../config';
import type { TextFont } from '../types';
import type { Renderer } from '../rendering/types';
import { isDegenerateRegion } from '../layout/FlowRegion';
import type { FlowResult, PageCursor } from '../layout/PageCursor';
import type { FontMetrics } from './FontMetrics';
import { LineWrapper, splitTokens } from './LineWrapper';

/**
 * Tokens that turn a paragraph into a bullet item.
 */
export const BULLET_TOKENS: ReadonlySet<string> = new Set(['-', '•']);
export const BULLET_GLYPH = '•';

export interface FlowOptions {
  /** See WrapOptions.resolveEscapes. Defaults to true. */
  resolveEscapes?: boolean;
}

/**
 * Lays `\n`-separated paragraphs into a flow region, page by page.
 *
 * The first paragraph starts exactly at the cursor. Each later paragraph
 * starts one newline further down, indented by the tab amount. A paragraph
 * whose first token is a bullet starts at the left edge and hangs its text
 * at the bullet indent.
 */
export class TextFlow {
  readonly wrapper: LineWrapper;

  constructor(
    private readonly metrics: FontMetrics,
    private readonly config: LayoutConfig,
    private readonly renderer: Renderer
  ) {
    this.wrapper = new LineWrapper(metrics);
  }

  flow(cursor: PageCursor, text: string, font: TextFont, options: FlowOptions = {}): FlowResult {
    const region = cursor.region;
    if (isDegenerateRegion(region)) {
      return cursor.result();
    }

    const { newline } = this.config.text[font.textClass];
    const { tabAmount } = this.config.spacing;

    cursor.startBlock();
    if (cursor.x > region.xMax) {
      cursor.breakLine(newline, region.xMin + tabAmount);
    }

    text.split('\n').forEach((paragraph, index) => {
      const tokens = splitTokens(paragraph);
      if (tokens.length === 0) {
        return;
      }

      const lineStart = index > 0 || cursor.atLineStart;
      if (index > 0) {
        cursor.hangingIndent = 0;
      }

      if (lineStart && BULLET_TOKENS.has(tokens[0])) {
        this.flowBullet(cursor, tokens.slice(1), font, options);
      } else {
        const startX = index === 0 ? cursor.x : region.xMin + tabAmount;
        this.flowLines(cursor, tokens, startX, font, options);
      }
    });

    return cursor.result();
  }

  /**
   * Wrap `text` to `width`, one wrapped block per paragraph, for centred output.
   */
  wrapCentered(text: string, font: TextFont, width: number, options: FlowOptions = {}): string[] {
    const { size } = this.config.text[font.textClass];
    return text
      .split('\n')
      .flatMap((paragraph) =>
        this.wrapper.wrap(splitTokens(paragraph), width, font.style, size, {
          resolveEscapes: options.resolveEscapes
        })
      );
  }

  /**
   * Write already-wrapped lines, each centred between xMin and xMax.
   */
  writeCenteredLines(
    cursor: PageCursor,
    lines: readonly string[],
    font: TextFont,
    xMin: number,
    xMax: number
  ): FlowResult {
    if (isDegenerateRegion(cursor.region)) {
      return cursor.result();
    }
    const { size, newline, color } = this.config.text[font.textClass];

    cursor.startBlock();
    for (const line of lines) {
      cursor.advanceLine(newline);
      const width = this.metrics.width(line, font.style, size);
      const x = xMin + (xMax - xMin - width) / 2;
      this.renderer.drawText(cursor.page, x, cursor.y, line, font.style, size, color);
      cursor.markWritten(x + width);
    }
    return cursor.result();
  }

  private flowLines(
    cursor: PageCursor,
    tokens: readonly string[],
    startX: number,
    font: TextFont,
    options: FlowOptions
  ): void {
    const region = cursor.region;
    const { size, newline, color } = this.config.text[font.textClass];
    const continuationX = region.xMin + cursor.hangingIndent;

    const lines = this.wrapper.wrap(tokens, region.xMax - continuationX, font.style, size, {
      firstLineWidth: region.xMax - startX,
      resolveEscapes: options.resolveEscapes
    });

    lines.forEach((line, lineIndex) => {
      cursor.advanceLine(newline);
      if (line === '') {
        return;
      }
      const x = lineIndex === 0 ? startX : continuationX;
      this.renderer.drawText(cursor.page, x, cursor.y, line, font.style, size, color);
      cursor.markWritten(x + this.metrics.width(line, font.style, size));
    });
  }

  private flowBullet(
    cursor: PageCursor,
    tokens: readonly string[],
    font: TextFont,
    options: FlowOptions
  ): void {
    const region = cursor.region;
    const { size, newline, color } = this.config.text[font.textClass];
    const textX = region.xMin + this.config.spacing.bulletIndent;

    cursor.advanceLine(newline);
    this.renderer.drawText(cursor.page, region.xMin, cursor.y, BULLET_GLYPH, font.style, size, color);
    cursor.markWritten(textX);
    cursor.hangingIndent = this.config.spacing.bulletIndent;

    if (tokens.length > 0) {
      // The bullet line is already open: the first text line lands on it.
      cursor.startBlock();
      this.flowLines(cursor, tokens, textX, font, options);
    }
  }
}

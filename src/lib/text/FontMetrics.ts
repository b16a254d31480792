import { MetricsUnavailableError } from '../errors';
import { FONT_STYLES, type FontStyle } from '../types';

/**
 * Per-style font metrics as exposed by an embedded pdf-lib font.
 * Values are in points for the given size.
 */
export interface FontMetricsSource {
  widthOfTextAtSize(text: string, size: number): number;
  heightAtSize(size: number, options?: { descender?: boolean }): number;
}

export const MM_PER_POINT = 25.4 / 72;

/**
 * Converts font measurements into page units, applying each style's
 * calibration scalar.
 */
export class FontMetrics {
  private readonly spaceWidths: Map<string, number> = new Map();

  constructor(
    private readonly sources: Readonly<Record<FontStyle, FontMetricsSource>>,
    private readonly scalars: Readonly<Record<FontStyle, number>>,
    private readonly unitsPerPoint: number = MM_PER_POINT
  ) {
    for (const style of FONT_STYLES) {
      this.probe(style);
    }
  }

  /**
   * Width of `text` set at `size` points, in page units.
   */
  width(text: string, style: FontStyle, size: number): number {
    if (text.length === 0) {
      return 0;
    }
    return this.sources[style].widthOfTextAtSize(text, size) * this.unitsPerPoint * this.scalars[style];
  }

  /**
   * Ascent minus descent at `size`, in page units. Excludes inter-line spacing.
   */
  lineHeight(style: FontStyle, size: number): number {
    return this.sources[style].heightAtSize(size, { descender: true }) * this.unitsPerPoint * this.scalars[style];
  }

  spaceWidth(style: FontStyle, size: number): number {
    const key = `${style}:${size}`;
    let width = this.spaceWidths.get(key);
    if (width === undefined) {
      width = this.width(' ', style, size);
      this.spaceWidths.set(key, width);
    }
    return width;
  }

  /**
   * Height of `lineCount` stacked lines: (n - 1) * newline + lineHeight, 0 for no lines.
   */
  textHeight(lineCount: number, style: FontStyle, size: number, newline: number): number {
    if (lineCount <= 0) {
      return 0;
    }
    return (lineCount - 1) * newline + this.lineHeight(style, size);
  }

  private probe(style: FontStyle): void {
    const source = this.sources[style];
    let width: number;
    let height: number;
    try {
      width = source.widthOfTextAtSize('M', 10);
      height = source.heightAtSize(10, { descender: true });
    } catch (error) {
      throw new MetricsUnavailableError(`Font metrics for style "${style}" could not be read`, error);
    }
    if (!Number.isFinite(width) || width <= 0 || !Number.isFinite(height) || height <= 0) {
      throw new MetricsUnavailableError(`Font metrics for style "${style}" are invalid`, { width, height });
    }
  }
}

export interface Size {
  width: number;
  height: number;
}

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export type PageSize = 'A4' | 'Letter' | 'Legal' | 'A3' | 'Custom';
export type PageOrientation = 'portrait' | 'landscape';

/**
 * Font variant used for a run of text.
 */
export type FontStyle = 'regular' | 'bold' | 'italic' | 'boldItalic';

export const FONT_STYLES: readonly FontStyle[] = ['regular', 'bold', 'italic', 'boldItalic'];

/**
 * Semantic role of a piece of text. Selects font size, newline advance and colour,
 * independently of the font style.
 */
export type TextClass = 'title' | 'header' | 'body' | 'tableTitle' | 'tableBody';

/**
 * RGB colour with 0-255 channels.
 */
export type RGB = readonly [number, number, number];

/**
 * Rectangle that content may be placed in, in page units (millimetres).
 * The y axis grows upwards: yMax is the top edge.
 */
export interface FlowRegion {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;
}

export interface TextFont {
  style: FontStyle;
  textClass: TextClass;
}

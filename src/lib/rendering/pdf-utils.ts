/**
 * PDF utility functions for unit conversion, colours and font encoding.
 */

import { PDFPage, rgb, Color } from 'pdf-lib';
import type { RGB } from '../types';

export const POINTS_PER_MM = 72 / 25.4;

/**
 * Layout works in millimetres, pdf-lib in points.
 */
export function mmToPt(mm: number): number {
  return mm * POINTS_PER_MM;
}

/**
 * Convert a 0-255 RGB triple to a pdf-lib Color.
 */
export function toPdfColor(color: RGB): Color {
  const [r, g, b] = color;
  return rgb(r / 255, g / 255, b / 255);
}

/**
 * Characters outside Latin-1 that WinAnsi still encodes.
 */
const WIN_ANSI_EXTRAS = new Set([
  '€', '‚', 'ƒ', '„', '…', '†', '‡', 'ˆ', '‰', 'Š', '‹', 'Œ', 'Ž',
  '‘', '’', '“', '”', '•', '–', '—', '˜', '™', 'š', '›', 'œ', 'ž', 'Ÿ'
]);

/**
 * Filter text to only include WinAnsi-compatible characters.
 * Standard PDF fonts (Helvetica, Times, Courier) only support WinAnsi encoding.
 */
export function filterToWinAnsi(text: string): string {
  let result = '';
  for (const char of text) {
    const code = char.charCodeAt(0);
    if ((code >= 32 && code <= 126) || (code >= 160 && code <= 255) || WIN_ANSI_EXTRAS.has(char)) {
      result += char;
    } else if (code === 9) {
      // Tab -> spaces
      result += '    ';
    } else if (code === 10 || code === 13) {
      // Line breaking happens before drawing
      continue;
    } else {
      // Unsupported character - replace with space to maintain spacing
      result += ' ';
    }
  }
  return result;
}

/**
 * Draw a straight line given in millimetres.
 */
export function drawLine(
  page: PDFPage,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: Color,
  thickness: number
): void {
  page.drawLine({
    start: { x: mmToPt(x1), y: mmToPt(y1) },
    end: { x: mmToPt(x2), y: mmToPt(y2) },
    color,
    thickness: mmToPt(thickness)
  });
}

import { StandardFonts } from 'pdf-lib';
import type { LayoutConfigInput } from './schema';

/**
 * A4 portrait, Times, black text. Every field is present so partial
 * configuration files can be merged over it.
 */
export const DEFAULT_LAYOUT_CONFIG: LayoutConfigInput = {
  page: {
    size: 'A4',
    orientation: 'portrait',
    margins: { top: 10, right: 10, bottom: 10, left: 10 }
  },
  fonts: {
    resources: {
      regular: StandardFonts.TimesRoman,
      bold: StandardFonts.TimesRomanBold,
      italic: StandardFonts.TimesRomanItalic,
      boldItalic: StandardFonts.TimesRomanBoldItalic
    },
    scalars: { regular: 1, bold: 1, italic: 1, boldItalic: 1 }
  },
  text: {
    title: { size: 32, newline: 12, color: [0, 0, 0] },
    header: { size: 24, newline: 8, color: [115, 26, 26] },
    body: { size: 12, newline: 5, color: [0, 0, 0] },
    tableTitle: { size: 12, newline: 5, color: [0, 0, 0] },
    tableBody: { size: 12, newline: 5, color: [0, 0, 0] }
  },
  spacing: {
    tabAmount: 6,
    bulletIndent: 4
  },
  table: {
    horizontalCellMargin: 4,
    verticalCellMargin: 2,
    outerHorizontalMargin: 4,
    outerVerticalMargin: 6,
    offRowColor: [213, 209, 224],
    offRowYAdjustScalar: 0.1075,
    offRowThicknessScalar: 1
  },
  pageNumbers: {
    startingSide: 'left',
    flipSides: true,
    startingNumber: 1,
    style: 'regular',
    size: 12,
    color: [0, 0, 0],
    sideMargin: 10,
    bottomMargin: 5
  }
};

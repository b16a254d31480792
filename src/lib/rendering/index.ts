export { PdfRenderer } from './PdfRenderer';
export type { PdfRendererOptions } from './PdfRenderer';
export { embedFonts, isStandardFont } from './fonts';
export { filterToWinAnsi, mmToPt, toPdfColor, POINTS_PER_MM } from './pdf-utils';
export type { PageHandle, Renderer } from './types';

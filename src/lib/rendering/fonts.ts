import { readFile } from 'fs/promises';
import { PDFDocument, PDFFont, StandardFonts } from 'pdf-lib';
import fontkit from '@pdf-lib/fontkit';
import { MetricsUnavailableError } from '../errors';
import type { FontStyle } from '../types';

export function isStandardFont(name: string): name is StandardFonts {
  return Object.values(StandardFonts).some((font) => font === name);
}

/**
 * Embed one font per style. A resource is either a standard PDF font name
 * or the path of a TrueType/OpenType file.
 */
export async function embedFonts(
  pdfDoc: PDFDocument,
  resources: Readonly<Record<FontStyle, string>>
): Promise<Record<FontStyle, PDFFont>> {
  const [regular, bold, italic, boldItalic] = await Promise.all([
    embedFont(pdfDoc, 'regular', resources.regular),
    embedFont(pdfDoc, 'bold', resources.bold),
    embedFont(pdfDoc, 'italic', resources.italic),
    embedFont(pdfDoc, 'boldItalic', resources.boldItalic)
  ]);
  return { regular, bold, italic, boldItalic };
}

async function embedFont(pdfDoc: PDFDocument, style: FontStyle, resource: string): Promise<PDFFont> {
  try {
    if (isStandardFont(resource)) {
      return await pdfDoc.embedFont(resource);
    }
    const bytes = await readFile(resource);
    pdfDoc.registerFontkit(fontkit);
    return await pdfDoc.embedFont(bytes, { subset: true });
  } catch (error) {
    throw new MetricsUnavailableError(`Unable to load font "${resource}" for style "${style}"`, error);
  }
}

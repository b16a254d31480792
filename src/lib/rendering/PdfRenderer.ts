/**
 * PdfRenderer - draws laid-out spellbook pages into a pdf-lib document.
 *
 * Layout hands over millimetres with the origin at the bottom-left corner,
 * which is also pdf-lib's orientation, so only a unit conversion is needed.
 */

import { readFile } from 'fs/promises';
import { PDFDocument, PDFFont, PDFHexString, PDFImage, PDFName, PDFPage, PDFRef } from 'pdf-lib';
import type { LayoutConfig } from '../config';
import { ConfigurationError } from '../errors';
import type { FontMetricsSource } from '../text/FontMetrics';
import type { FontStyle, RGB } from '../types';
import { embedFonts, isStandardFont } from './fonts';
import { drawLine, filterToWinAnsi, mmToPt, toPdfColor } from './pdf-utils';
import type { PageHandle, Renderer } from './types';

export interface PdfRendererOptions {
  /** PNG or JPEG drawn under every page, stretched to the page size. */
  background?: string;
  /** Document title written to the PDF metadata. */
  title?: string;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];

interface Bookmark {
  title: string;
  page: PDFPage;
}

interface EmbeddedFont {
  font: PDFFont;
  /** Standard fonts only encode WinAnsi. */
  standard: boolean;
}

export class PdfRenderer implements Renderer {
  private readonly _pages: PDFPage[] = [];
  private readonly bookmarks: Bookmark[] = [];
  private outlineRef: PDFRef | null = null;

  private constructor(
    private readonly pdfDoc: PDFDocument,
    private readonly fonts: Readonly<Record<FontStyle, EmbeddedFont>>,
    private readonly background: PDFImage | null
  ) {}

  static async create(config: LayoutConfig, options: PdfRendererOptions = {}): Promise<PdfRenderer> {
    const pdfDoc = await PDFDocument.create();
    if (options.title) {
      pdfDoc.setTitle(options.title);
    }

    const resources = config.fonts.resources;
    const embedded = await embedFonts(pdfDoc, resources);
    const wrap = (style: FontStyle): EmbeddedFont => ({
      font: embedded[style],
      standard: isStandardFont(resources[style])
    });
    const fonts = {
      regular: wrap('regular'),
      bold: wrap('bold'),
      italic: wrap('italic'),
      boldItalic: wrap('boldItalic')
    };

    const background = options.background ? await readBackgroundImage(pdfDoc, options.background) : null;
    return new PdfRenderer(pdfDoc, fonts, background);
  }

  get pageCount(): number {
    return this._pages.length;
  }

  /**
   * Measurement sources for FontMetrics. Text is measured exactly as it will
   * be drawn, after WinAnsi filtering for standard fonts.
   */
  get metricsSources(): Record<FontStyle, FontMetricsSource> {
    return {
      regular: this.metricsSource('regular'),
      bold: this.metricsSource('bold'),
      italic: this.metricsSource('italic'),
      boldItalic: this.metricsSource('boldItalic')
    };
  }

  createPage(width: number, height: number): PageHandle {
    const page = this.pdfDoc.addPage([mmToPt(width), mmToPt(height)]);
    if (this.background) {
      page.drawImage(this.background, {
        x: 0,
        y: 0,
        width: page.getWidth(),
        height: page.getHeight()
      });
    }
    this._pages.push(page);
    return { index: this._pages.length - 1 };
  }

  drawText(page: PageHandle, x: number, y: number, text: string, style: FontStyle, size: number, color: RGB): void {
    const { font, standard } = this.fonts[style];
    const safeText = standard ? filterToWinAnsi(text) : text;
    if (safeText.length === 0) {
      return;
    }
    this.pageFor(page).drawText(safeText, {
      x: mmToPt(x),
      y: mmToPt(y),
      size,
      font,
      color: toPdfColor(color)
    });
  }

  drawLineSegment(
    page: PageHandle,
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    color: RGB,
    thickness: number
  ): void {
    drawLine(this.pageFor(page), x1, y1, x2, y2, toPdfColor(color), thickness);
  }

  addBookmark(page: PageHandle, title: string): void {
    this.bookmarks.push({ title, page: this.pageFor(page) });
  }

  async save(): Promise<Uint8Array> {
    this.writeOutline();
    return this.pdfDoc.save();
  }

  /**
   * Write the bookmarks as a flat outline: one item per bookmark, linked
   * through First/Last on the root and Prev/Next between items, each opening
   * its page at the top.
   */
  private writeOutline(): void {
    if (this.bookmarks.length === 0) {
      return;
    }
    const context = this.pdfDoc.context;
    const outlineRef = this.outlineRef ?? context.nextRef();
    this.outlineRef = outlineRef;
    const itemRefs = this.bookmarks.map(() => context.nextRef());

    this.bookmarks.forEach((bookmark, index) => {
      const item = context.obj({
        Title: PDFHexString.fromText(bookmark.title),
        Parent: outlineRef,
        Dest: [bookmark.page.ref, 'XYZ', null, null, null]
      });
      if (index > 0) {
        item.set(PDFName.of('Prev'), itemRefs[index - 1]);
      }
      if (index < itemRefs.length - 1) {
        item.set(PDFName.of('Next'), itemRefs[index + 1]);
      }
      context.assign(itemRefs[index], item);
    });

    context.assign(
      outlineRef,
      context.obj({
        Type: 'Outlines',
        First: itemRefs[0],
        Last: itemRefs[itemRefs.length - 1],
        Count: itemRefs.length
      })
    );
    this.pdfDoc.catalog.set(PDFName.of('Outlines'), outlineRef);
  }

  private metricsSource(style: FontStyle): FontMetricsSource {
    const { font, standard } = this.fonts[style];
    return {
      widthOfTextAtSize: (text, size) => font.widthOfTextAtSize(standard ? filterToWinAnsi(text) : text, size),
      heightAtSize: (size, options) => font.heightAtSize(size, options)
    };
  }

  private pageFor(handle: PageHandle): PDFPage {
    const page = this._pages[handle.index];
    if (!page) {
      throw new Error(`[PdfRenderer] Unknown page ${handle.index}`);
    }
    return page;
  }
}

async function readBackgroundImage(pdfDoc: PDFDocument, path: string): Promise<PDFImage> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new ConfigurationError(`Unable to read background image ${path}`, error);
  }
  const isPng = PNG_SIGNATURE.every((byte, index) => bytes[index] === byte);
  try {
    return isPng ? await pdfDoc.embedPng(bytes) : await pdfDoc.embedJpg(bytes);
  } catch (error) {
    throw new ConfigurationError(`Background image ${path} is not a PNG or JPEG file`, error);
  }
}

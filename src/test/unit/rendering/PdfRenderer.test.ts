/**
 * Unit tests for PdfRenderer
 */
import { describe, it, expect } from 'vitest';
import { PDFDict, PDFDocument, PDFHexString, PDFName, PDFNumber } from 'pdf-lib';
import { createLayoutConfig } from '../../../lib/config/loadConfig';
import { ConfigurationError, LayoutErrorCode, MetricsUnavailableError } from '../../../lib/errors';
import { PdfRenderer } from '../../../lib/rendering/PdfRenderer';

const config = createLayoutConfig();

describe('PdfRenderer', () => {
  it('should write pages of the requested size in points', async () => {
    const renderer = await PdfRenderer.create(config, { title: 'Test Book' });
    const page = renderer.createPage(25.4, 50.8);
    renderer.drawText(page, 10, 10, 'Magic Missile', 'bold', 12, [0, 0, 0]);
    renderer.drawLineSegment(page, 0, 5, 20, 5, [200, 200, 200], 1);

    expect(renderer.pageCount).toBe(1);
    const bytes = await renderer.save();
    const loaded = await PDFDocument.load(bytes);
    const [size] = loaded.getPages().map((p) => p.getSize());

    expect(loaded.getTitle()).toBe('Test Book');
    expect(size.width).toBeCloseTo(72, 5);
    expect(size.height).toBeCloseTo(144, 5);
  });

  it('should write bookmarks as a flat outline in call order', async () => {
    const renderer = await PdfRenderer.create(config);
    const first = renderer.createPage(100, 100);
    const second = renderer.createPage(100, 100);
    renderer.addBookmark(first, 'Title Page');
    renderer.addBookmark(second, 'Fireball');
    renderer.addBookmark(second, 'Shield');

    const loaded = await PDFDocument.load(await renderer.save());
    const outlines = loaded.catalog.lookup(PDFName.of('Outlines'), PDFDict);
    const titles: string[] = [];
    let item = outlines.lookupMaybe(PDFName.of('First'), PDFDict);
    while (item) {
      titles.push(item.lookup(PDFName.of('Title'), PDFHexString).decodeText());
      item = item.lookupMaybe(PDFName.of('Next'), PDFDict);
    }

    expect(outlines.lookup(PDFName.of('Count'), PDFNumber).asNumber()).toBe(3);
    expect(titles).toEqual(['Title Page', 'Fireball', 'Shield']);
  });

  it('should leave the outline out without bookmarks', async () => {
    const renderer = await PdfRenderer.create(config);
    renderer.createPage(100, 100);

    const loaded = await PDFDocument.load(await renderer.save());

    expect(loaded.catalog.get(PDFName.of('Outlines'))).toBeUndefined();
  });

  it('should measure standard fonts after WinAnsi filtering', async () => {
    const renderer = await PdfRenderer.create(config);
    const { regular } = renderer.metricsSources;

    expect(regular.widthOfTextAtSize('a✓', 12)).toBe(regular.widthOfTextAtSize('a ', 12));
  });

  it('should reject handles of pages it never created', async () => {
    const renderer = await PdfRenderer.create(config);

    expect(() => renderer.drawText({ index: 3 }, 0, 0, 'x', 'regular', 12, [0, 0, 0])).toThrow(
      '[PdfRenderer] Unknown page 3'
    );
  });

  it('should report a missing background image', async () => {
    const path = '/nonexistent/background.png';

    const result = PdfRenderer.create(config, { background: path });

    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(PdfRenderer.create(config, { background: path })).rejects.toThrow(
      `Unable to read background image ${path}`
    );
  });

  it('should report a font file that cannot be loaded', async () => {
    const path = '/nonexistent/font.ttf';
    const withFont = createLayoutConfig({ fonts: { resources: { italic: path } } });

    let caught: unknown;
    try {
      await PdfRenderer.create(withFont);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MetricsUnavailableError);
    expect(caught).toMatchObject({
      code: LayoutErrorCode.METRICS_UNAVAILABLE,
      message: `Unable to load font "${path}" for style "italic"`
    });
  });
});

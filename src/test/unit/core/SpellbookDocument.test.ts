/**
 * Unit tests for SpellbookDocument
 */
import { describe, it, expect, vi } from 'vitest';
import { SpellbookDocument } from '../../../lib/core/SpellbookDocument';
import { createFixedMetrics } from '../../helpers/fixedFont';
import { createTestConfig } from '../../helpers/layoutFixtures';
import { RecordingRenderer } from '../../helpers/RecordingRenderer';

const PAGE_NUMBERS = {
  startingSide: 'left',
  flipSides: true,
  startingNumber: 1,
  style: 'regular',
  size: 10,
  color: [0, 0, 0],
  sideMargin: 10,
  bottomMargin: 5
};

function createDocument(pageNumbers: unknown = null) {
  const renderer = new RecordingRenderer();
  const document = new SpellbookDocument(renderer, createFixedMetrics(), createTestConfig({ pageNumbers }));
  return { renderer, document };
}

describe('SpellbookDocument', () => {
  it('should create pages of the configured size', () => {
    const { renderer, document } = createDocument();
    document.addPage();

    expect(renderer.pages).toEqual([{ width: 100, height: 300 }]);
    expect(document.pageCount).toBe(1);
    expect(renderer.texts).toEqual([]);
  });

  it('should number pages and alternate sides', () => {
    const { renderer, document } = createDocument(PAGE_NUMBERS);
    document.addPage();
    document.addPage();
    document.addPage();

    expect(renderer.texts.map(({ page, text, x, y }) => ({ page, text, x, y }))).toEqual([
      { page: 0, text: '1', x: 10, y: 5 },
      { page: 1, text: '2', x: 89, y: 5 },
      { page: 2, text: '3', x: 10, y: 5 }
    ]);
  });

  it('should keep one side when sides do not flip', () => {
    const { renderer, document } = createDocument({
      ...PAGE_NUMBERS,
      startingSide: 'right',
      flipSides: false,
      startingNumber: 9
    });
    document.addPage();
    document.addPage();

    // "10" is two units wide
    expect(renderer.texts.map(({ text, x }) => ({ text, x }))).toEqual([
      { text: '9', x: 89 },
      { text: '10', x: 88 }
    ]);
  });

  it('should leave title pages unnumbered without advancing the counter', () => {
    const { renderer, document } = createDocument(PAGE_NUMBERS);
    document.addTitlePage();
    document.addPage();

    expect(renderer.texts.map(({ page, text, x }) => ({ page, text, x }))).toEqual([{ page: 1, text: '1', x: 10 }]);
  });

  it('should emit page-added with the printed number', () => {
    const { document } = createDocument(PAGE_NUMBERS);
    const handler = vi.fn();
    document.on('page-added', handler);

    document.addTitlePage();
    document.addPage();

    expect(handler.mock.calls).toEqual([[{ page: { index: 0 }, number: null }], [{ page: { index: 1 }, number: 1 }]]);
  });

  it('should number pages created by a cursor running off the page', () => {
    const { renderer, document } = createDocument(PAGE_NUMBERS);
    const cursor = document.startCursor(document.addPage());

    for (let i = 0; i < 60; i++) {
      cursor.advanceLine(5);
    }

    expect(document.pageCount).toBe(2);
    expect(renderer.textsOn(1)).toEqual(['2']);
  });

  it('should start cursors at the top-left of the body region', () => {
    const { document } = createDocument();
    const cursor = document.startCursor(document.addPage());

    expect(document.region).toEqual({ xMin: 10, xMax: 90, yMin: 20, yMax: 280 });
    expect(cursor.position()).toEqual({ page: { index: 0 }, x: 10, y: 280 });
  });
});

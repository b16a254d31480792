import type { LayoutConfig } from '../config';
import { EventEmitter } from '../events/EventEmitter';
import { bodyRegion } from '../layout/FlowRegion';
import { PageCursor, type PageSource } from '../layout/PageCursor';
import type { PageHandle, Renderer } from '../rendering/types';
import type { FontMetrics } from '../text/FontMetrics';
import type { FlowRegion } from '../types';

export interface PageAddedEvent {
  page: PageHandle;
  /** Printed page number, null for unnumbered pages. */
  number: number | null;
}

type DocumentEvents = {
  'page-added': [PageAddedEvent];
};

type PageSide = 'left' | 'right';

/**
 * The ordered page list of a spellbook. Any page cursor working on the book
 * appends pages through it, so page numbers stay in creation order.
 */
export class SpellbookDocument extends EventEmitter<DocumentEvents> implements PageSource {
  private readonly _pages: PageHandle[] = [];
  private readonly _region: FlowRegion;
  private _nextNumber: number;
  private _side: PageSide;

  constructor(
    private readonly renderer: Renderer,
    private readonly metrics: FontMetrics,
    private readonly config: LayoutConfig
  ) {
    super();
    this._region = bodyRegion(config);
    this._nextNumber = config.pageNumbers?.startingNumber ?? 1;
    this._side = config.pageNumbers?.startingSide ?? 'left';
  }

  get pages(): readonly PageHandle[] {
    return this._pages;
  }

  get pageCount(): number {
    return this._pages.length;
  }

  /**
   * Body region shared by every page.
   */
  get region(): FlowRegion {
    return this._region;
  }

  /**
   * Append a numbered page.
   */
  addPage(): PageHandle {
    const page = this.createPage();
    const number = this.config.pageNumbers ? this._nextNumber : null;
    if (number !== null) {
      this.drawPageNumber(page, number);
      this.advanceNumbering();
    }
    this.emit('page-added', { page, number });
    return page;
  }

  /**
   * Append a page that carries no number and leaves the numbering untouched.
   */
  addTitlePage(): PageHandle {
    const page = this.createPage();
    this.emit('page-added', { page, number: null });
    return page;
  }

  addBookmark(page: PageHandle, title: string): void {
    this.renderer.addBookmark(page, title);
  }

  /**
   * A cursor at the left edge of the body region on `page`, at the top unless `y` is given.
   */
  startCursor(page: PageHandle, y: number = this._region.yMax): PageCursor {
    return new PageCursor(this, this._region, { page, x: this._region.xMin, y });
  }

  private createPage(): PageHandle {
    const page = this.renderer.createPage(this.config.page.width, this.config.page.height);
    this._pages.push(page);
    return page;
  }

  private drawPageNumber(page: PageHandle, number: number): void {
    const options = this.config.pageNumbers;
    if (!options) {
      return;
    }
    const text = String(number);
    const x =
      this._side === 'left'
        ? options.sideMargin
        : this.config.page.width - options.sideMargin - this.metrics.width(text, options.style, options.size);
    try {
      this.renderer.drawText(page, x, options.bottomMargin, text, options.style, options.size, options.color);
    } catch (error) {
      console.warn(`[SpellbookDocument] Failed to draw page number ${text}:`, error);
    }
  }

  private advanceNumbering(): void {
    this._nextNumber++;
    if (this.config.pageNumbers?.flipSides) {
      this._side = this._side === 'left' ? 'right' : 'left';
    }
  }
}

import type { FlowRegion } from '../types';
import type { PageHandle } from '../rendering/types';

/**
 * Anything that can append a fresh page to the document.
 */
export interface PageSource {
  addPage(): PageHandle;
}

/**
 * Where a block starts: the page that is active plus the cursor position on it.
 */
export interface CursorPosition {
  page: PageHandle;
  x: number;
  y: number;
}

export interface CursorSnapshot {
  readonly x: number;
  readonly y: number;
  readonly pageIndex: number;
  readonly holdAdvance: boolean;
  readonly atLineStart: boolean;
  readonly hangingIndent: number;
}

/**
 * Final state of a write: the cursor after the last character and every page
 * the block touched, in order.
 */
export interface FlowResult {
  x: number;
  y: number;
  page: PageHandle;
  pages: readonly PageHandle[];
}

/**
 * Write position for one logical block of content.
 *
 * Owns the cursor and the flow sequence (pages touched by the block, index 0
 * being the page active when the block began). Pages are appended to the
 * sequence only when a line would land on or below the region's bottom edge;
 * once created they are revisited by index, so two passes over the same
 * content land on the same pages.
 */
export class PageCursor {
  private _x: number;
  private _y: number;
  private _pageIndex = 0;
  private readonly _pages: PageHandle[];
  private _holdAdvance = true;
  private _atLineStart = true;
  private _hangingIndent = 0;

  constructor(
    private readonly source: PageSource,
    readonly region: FlowRegion,
    start: CursorPosition
  ) {
    this._pages = [start.page];
    this._x = start.x;
    this._y = start.y;
  }

  get x(): number {
    return this._x;
  }

  set x(value: number) {
    this._x = value;
  }

  get y(): number {
    return this._y;
  }

  get page(): PageHandle {
    return this._pages[this._pageIndex];
  }

  get pageIndex(): number {
    return this._pageIndex;
  }

  /**
   * The flow sequence. Grows monotonically.
   */
  get pages(): readonly PageHandle[] {
    return this._pages;
  }

  /**
   * True until text is written on the current line.
   */
  get atLineStart(): boolean {
    return this._atLineStart;
  }

  /**
   * Offset from the region's left edge for continuation lines of a hanging paragraph.
   */
  get hangingIndent(): number {
    return this._hangingIndent;
  }

  set hangingIndent(value: number) {
    this._hangingIndent = value;
  }

  /**
   * Make the next advanceLine land exactly at the current y.
   */
  startBlock(): void {
    this._holdAdvance = true;
  }

  /**
   * Move down one line. The first call after startBlock (or construction)
   * keeps y where it is; every later call subtracts `height`. Either way the
   * page boundary is checked afterwards.
   */
  advanceLine(height: number): void {
    if (this._holdAdvance) {
      this._holdAdvance = false;
    } else {
      this._y -= height;
    }
    this.checkForNewPage();
  }

  /**
   * End the current line: move down by `height`, set x, and make the next
   * advanceLine land on the new line. Clears any hanging indent.
   */
  breakLine(height: number, x: number): void {
    this._y -= height;
    this._x = x;
    this._holdAdvance = true;
    this._atLineStart = true;
    this._hangingIndent = 0;
    this.checkForNewPage();
  }

  /**
   * Record that text now sits on the current line, ending at `endX`.
   */
  markWritten(endX: number): void {
    this._x = endX;
    this._atLineStart = false;
  }

  /**
   * Continue on the next page of the sequence, creating it if needed.
   */
  moveToNextPage(): void {
    this._pageIndex++;
    if (this._pageIndex >= this._pages.length) {
      this._pages.push(this.source.addPage());
    }
    this._y = this.region.yMax;
  }

  /**
   * Jump past every page in the sequence onto a brand new one, top of region,
   * left edge, next line landing there.
   */
  startNewPage(): void {
    this._pageIndex = this._pages.length - 1;
    this.moveToNextPage();
    this._x = this.region.xMin;
    this._holdAdvance = true;
    this._atLineStart = true;
  }

  snapshot(): CursorSnapshot {
    return {
      x: this._x,
      y: this._y,
      pageIndex: this._pageIndex,
      holdAdvance: this._holdAdvance,
      atLineStart: this._atLineStart,
      hangingIndent: this._hangingIndent
    };
  }

  restore(snapshot: CursorSnapshot): void {
    this._x = snapshot.x;
    this._y = snapshot.y;
    this._pageIndex = snapshot.pageIndex;
    this._holdAdvance = snapshot.holdAdvance;
    this._atLineStart = snapshot.atLineStart;
    this._hangingIndent = snapshot.hangingIndent;
  }

  /**
   * Where the next block should start.
   */
  position(): CursorPosition {
    return { page: this.page, x: this._x, y: this._y };
  }

  result(): FlowResult {
    return { x: this._x, y: this._y, page: this.page, pages: this._pages };
  }

  private checkForNewPage(): void {
    // A baseline must sit strictly above the bottom edge.
    if (this._y <= this.region.yMin) {
      this.moveToNextPage();
    }
  }
}

import type { FontStyle, RGB } from '../types';

/**
 * Opaque reference to a page created by a Renderer.
 */
export interface PageHandle {
  readonly index: number;
}

/**
 * Drawing surface consumed by the layout engine. Coordinates are in the same
 * page units as the flow region, origin at the bottom-left corner.
 */
export interface Renderer {
  /** Create a page, already carrying the background image if one is configured. */
  createPage(width: number, height: number): PageHandle;
  drawText(
    page: PageHandle,
    x: number,
    y: number,
    text: string,
    style: FontStyle,
    size: number,
    color: RGB
  ): void;
  drawLineSegment(
    page: PageHandle,
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    color: RGB,
    thickness: number
  ): void;
  /** Add a document outline entry pointing at `page`. Entries keep call order. */
  addBookmark(page: PageHandle, title: string): void;
}

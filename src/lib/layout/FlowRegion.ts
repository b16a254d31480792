import type { FlowRegion } from '../types';
import type { LayoutConfig } from '../config';

/**
 * True when the region has no positive width or height. Writes into such a
 * region draw nothing.
 */
export function isDegenerateRegion(region: FlowRegion): boolean {
  return !(region.xMin < region.xMax && region.yMin < region.yMax);
}

/**
 * The page area inside the configured margins.
 */
export function bodyRegion(config: LayoutConfig): FlowRegion {
  const { width, height, margins } = config.page;
  return {
    xMin: margins.left,
    xMax: width - margins.right,
    yMin: margins.bottom,
    yMax: height - margins.top
  };
}

export function regionWidth(region: FlowRegion): number {
  return region.xMax - region.xMin;
}

export function regionHeight(region: FlowRegion): number {
  return region.yMax - region.yMin;
}

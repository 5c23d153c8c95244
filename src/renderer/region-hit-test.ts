import type { ClickableRegion } from '../daemon/render-protocol.ts';
import { contentRowForScreenRow } from './viewport.ts';

export interface RegionHit {
  readonly action: string;
  readonly target: string;
}

const REGION_MISS: RegionHit = {
  action: '',
  target: '',
};

export function regionContains(
  region: ClickableRegion,
  contentRow: number,
  col: number,
  width: number,
): boolean {
  if (contentRow < region.start_line || contentRow > region.end_line) {
    return false;
  }
  const endCol = region.end_col === 0 ? width : region.end_col;
  return col >= region.start_col && col < endCol;
}

/** First region in storage order wins; overlapping regions are never ranked by size. */
export function findRegionAt(
  regions: readonly ClickableRegion[],
  contentRow: number,
  col: number,
  width: number,
): ClickableRegion | null {
  for (const region of regions) {
    if (regionContains(region, contentRow, col, width)) {
      return region;
    }
  }
  return null;
}

export function hitTestScreenPoint(
  regions: readonly ClickableRegion[],
  x: number,
  y: number,
  scrollOffset: number,
  width: number,
): RegionHit {
  const region = findRegionAt(regions, contentRowForScreenRow(y, scrollOffset), x, width);
  if (region === null) {
    return REGION_MISS;
  }
  return {
    action: region.action,
    target: region.target,
  };
}

export function isEdgeZoneColumn(x: number, width: number, edgeZoneCols: number): boolean {
  return edgeZoneCols > 0 && width > 0 && x >= width - edgeZoneCols;
}

/**
 * A plain left click in the rightmost columns on one of `edgeZoneActions`
 * opens the context menu instead.
 */
export function isEdgeZoneRightClick(
  hit: RegionHit,
  x: number,
  width: number,
  edgeZoneCols: number,
  edgeZoneActions: readonly string[],
): boolean {
  return isEdgeZoneColumn(x, width, edgeZoneCols) && edgeZoneActions.includes(hit.action);
}

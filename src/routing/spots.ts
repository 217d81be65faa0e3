import { makePoint, pointKey, rectBottom, rectCorners, rectLeft, rectRight, rectTop } from './geometry';
import type { Rulers } from './rulers';
import type { Point, Rect } from './types';

function strictlyInside(box: Rect, p: Point): boolean {
  return p.x > rectLeft(box) && p.x < rectRight(box) && p.y > rectTop(box) && p.y < rectBottom(box);
}

/**
 * Ruler intersections outside every obstacle's interior, row by row.
 * These cover the zero-width lanes along obstacle edges and the bounds,
 * where no routable cell has a corner.
 */
export function rulerSpots(rulers: Rulers, obstacles: readonly Rect[]): Point[] {
  const spots: Point[] = [];
  for (const y of rulers.hRulers) {
    for (const x of rulers.vRulers) {
      const p = makePoint(x, y);
      if (!obstacles.some((box) => strictlyInside(box, p))) spots.push(p);
    }
  }
  return spots;
}

/**
 * Candidate waypoints: every routable cell corner, then the extra points
 * (free ruler intersections, connector locations and their antennas).
 * First occurrence keeps its slot.
 */
export function extractSpots(grid: readonly Rect[], extra: readonly Point[]): Point[] {
  const seen = new Set<string>();
  const spots: Point[] = [];

  const add = (p: Point) => {
    const key = pointKey(p);
    if (seen.has(key)) return;
    seen.add(key);
    spots.push(p);
  };

  for (const cell of grid) {
    for (const corner of rectCorners(cell)) add(corner);
  }
  for (const p of extra) add(p);

  return spots;
}

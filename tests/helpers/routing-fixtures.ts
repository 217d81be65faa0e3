import { makeRect, rectIntersects, segmentRect } from '../../src/routing/geometry';
import type { ConnectorPoint, OrthogonalConnectorOpts, Point, Rect, Side } from '../../src/routing/types';

export function connector(shape: Rect, side: Side, distance = 0.5): ConnectorPoint {
  return { shape, side, distance };
}

/** Two 100x100 boxes side by side, 200 apart, joined right-to-left at mid height. */
export function sideBySide(overrides: Partial<OrthogonalConnectorOpts> = {}): OrthogonalConnectorOpts {
  return {
    pointA: connector(makeRect(0, 0, 100, 100), 'right'),
    pointB: connector(makeRect(300, 0, 100, 100), 'left'),
    shapeMargin: 10,
    globalBoundsMargin: 0,
    ...overrides,
  };
}

export function isOrthogonal(path: readonly Point[]): boolean {
  return path.every((p, i) => i === 0 || p.x === path[i - 1].x || p.y === path[i - 1].y);
}

export function hasCollinearTriple(path: readonly Point[]): boolean {
  for (let i = 0; i + 2 < path.length; i++) {
    const [a, b, c] = [path[i], path[i + 1], path[i + 2]];
    if ((a.x === b.x && b.x === c.x) || (a.y === b.y && b.y === c.y)) return true;
  }
  return false;
}

export function crossesInterior(a: Point, b: Point, box: Rect): boolean {
  return rectIntersects(segmentRect(a, b), box);
}

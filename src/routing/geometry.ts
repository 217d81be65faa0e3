/**
 * Geometry kernel for connector routing.
 *
 * Plain immutable value objects and pure helpers. All coordinates are
 * integers; nothing here mutates its arguments.
 */

import type {
  BendDirection,
  CardinalPoint,
  ConnectorPoint,
  Direction,
  Line,
  Point,
  Rect,
  Side,
  Size,
} from './types';

// ─── Constructors ───

export function makePoint(x: number, y: number): Point {
  return { x, y };
}

export function makeSize(width: number, height: number): Size {
  return { width, height };
}

export function makeRect(x: number, y: number, width: number, height: number): Rect {
  return { origin: makePoint(x, y), size: makeSize(width, height) };
}

export function rectFromLTRB(left: number, top: number, right: number, bottom: number): Rect {
  return makeRect(left, top, right - left, bottom - top);
}

export function makeLine(a: Point, b: Point): Line {
  return { a, b };
}

// ─── Points ───

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Key used to intern points in maps and sets. */
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

export function distance(a: Point, b: Point): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

/** Same y is horizontal, same x is vertical. Equal points count as horizontal. */
export function directionOf(a: Point, b: Point): Direction {
  if (a.y === b.y) return 'horizontal';
  if (a.x === b.x) return 'vertical';
  return 'other';
}

// ─── Rect measurements ───

export function sameRect(a: Rect, b: Rect): boolean {
  return samePoint(a.origin, b.origin) && a.size.width === b.size.width && a.size.height === b.size.height;
}

export const rectLeft = (r: Rect): number => r.origin.x;
export const rectTop = (r: Rect): number => r.origin.y;
export const rectRight = (r: Rect): number => r.origin.x + r.size.width;
export const rectBottom = (r: Rect): number => r.origin.y + r.size.height;

export function rectCenter(r: Rect): Point {
  return makePoint(r.origin.x + Math.trunc(r.size.width / 2), r.origin.y + Math.trunc(r.size.height / 2));
}

export function rectCorners(r: Rect): [Point, Point, Point, Point] {
  return [
    makePoint(rectLeft(r), rectTop(r)),
    makePoint(rectRight(r), rectTop(r)),
    makePoint(rectRight(r), rectBottom(r)),
    makePoint(rectLeft(r), rectBottom(r)),
  ];
}

/** Midpoint of the side facing the given cardinal direction. */
export function rectSideMidpoint(r: Rect, cardinal: CardinalPoint): Point {
  const c = rectCenter(r);
  switch (cardinal) {
    case 'north':
      return makePoint(c.x, rectTop(r));
    case 'east':
      return makePoint(rectRight(r), c.y);
    case 'south':
      return makePoint(c.x, rectBottom(r));
    case 'west':
      return makePoint(rectLeft(r), c.y);
  }
}

/** Inclusive on all four edges. */
export function rectContains(r: Rect, p: Point): boolean {
  return p.x >= rectLeft(r) && p.x <= rectRight(r) && p.y >= rectTop(r) && p.y <= rectBottom(r);
}

/**
 * Open-interval overlap: rects that only share an edge do not intersect.
 * A zero-height (or zero-width) rect intersects only when it runs strictly
 * through the other's interior, which is what makes it usable as a segment.
 */
export function rectIntersects(a: Rect, b: Rect): boolean {
  return (
    rectLeft(b) < rectRight(a) &&
    rectLeft(a) < rectRight(b) &&
    rectTop(b) < rectBottom(a) &&
    rectTop(a) < rectBottom(b)
  );
}

export function inflateRect(r: Rect, horizontal: number, vertical: number): Rect {
  return rectFromLTRB(
    rectLeft(r) - horizontal,
    rectTop(r) - vertical,
    rectRight(r) + horizontal,
    rectBottom(r) + vertical,
  );
}

export function unionRect(a: Rect, b: Rect): Rect {
  return rectFromLTRB(
    Math.min(rectLeft(a), rectLeft(b)),
    Math.min(rectTop(a), rectTop(b)),
    Math.max(rectRight(a), rectRight(b)),
    Math.max(rectBottom(a), rectBottom(b)),
  );
}

export function rectArea(r: Rect): number {
  return r.size.width * r.size.height;
}

/** Bounding rect of a segment; zero-thick for axis-aligned segments. */
export function segmentRect(a: Point, b: Point): Rect {
  return rectFromLTRB(Math.min(a.x, b.x), Math.min(a.y, b.y), Math.max(a.x, b.x), Math.max(a.y, b.y));
}

// ─── Sides and connector points ───

/** Top and bottom sides are crossed by vertical stubs. */
export function isVerticalSide(side: Side): boolean {
  return side === 'top' || side === 'bottom';
}

export function sideToCardinal(side: Side): CardinalPoint {
  switch (side) {
    case 'top':
      return 'north';
    case 'right':
      return 'east';
    case 'bottom':
      return 'south';
    case 'left':
      return 'west';
  }
}

/** Concrete boundary location of a connector point. */
export function resolveConnectorPoint(cp: ConnectorPoint): Point {
  const { shape, side, distance: d } = cp;
  switch (side) {
    case 'top':
      return makePoint(rectLeft(shape) + Math.round(d * shape.size.width), rectTop(shape));
    case 'bottom':
      return makePoint(rectLeft(shape) + Math.round(d * shape.size.width), rectBottom(shape));
    case 'left':
      return makePoint(rectLeft(shape), rectTop(shape) + Math.round(d * shape.size.height));
    case 'right':
      return makePoint(rectRight(shape), rectTop(shape) + Math.round(d * shape.size.height));
  }
}

/** Move a connector location outward from its side by `margin`. */
export function extrudeConnectorPoint(cp: ConnectorPoint, margin: number): Point {
  const p = resolveConnectorPoint(cp);
  switch (cp.side) {
    case 'top':
      return makePoint(p.x, p.y - margin);
    case 'right':
      return makePoint(p.x + margin, p.y);
    case 'bottom':
      return makePoint(p.x, p.y + margin);
    case 'left':
      return makePoint(p.x - margin, p.y);
  }
}

/**
 * Cardinal direction the path turns toward at `b` when travelling a → b → c.
 * Returns 'unknown' when the three points are not a right-angle bend.
 */
export function bendDirection(a: Point, b: Point, c: Point): BendDirection {
  const incoming = directionOf(a, b);
  const outgoing = directionOf(b, c);
  if (incoming === 'other' || outgoing === 'other' || incoming === outgoing) return 'unknown';
  if (samePoint(a, b) || samePoint(b, c)) return 'unknown';
  if (outgoing === 'vertical') return c.y < b.y ? 'north' : 'south';
  return c.x > b.x ? 'east' : 'west';
}

// ─── Geometry values ───

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Rect {
  readonly origin: Point;
  readonly size: Size;
}

export interface Line {
  readonly a: Point;
  readonly b: Point;
}

export type Side = 'top' | 'right' | 'bottom' | 'left';

export type CardinalPoint = 'north' | 'east' | 'south' | 'west';

export type BendDirection = CardinalPoint | 'unknown';

export type Direction = 'horizontal' | 'vertical' | 'other';

// ─── Request / response ───

export interface ConnectorPoint {
  shape: Rect;
  side: Side;
  /** Fraction in [0, 1] along the side, from its left (top/bottom) or top (left/right) end. */
  distance: number;
}

export interface OrthogonalConnectorOpts {
  pointA: ConnectorPoint;
  pointB: ConnectorPoint;
  shapeMargin: number;
  globalBoundsMargin: number;
  /** Omit or pass null for an unbounded routing area. */
  globalBounds?: Rect | null;
  /** Extra cost per bend, added to the summed segment lengths. Default 0. */
  bendPenalty?: number;
}

export interface OrthogonalConnectorByproduct {
  hRulers: number[];
  vRulers: number[];
  spots: Point[];
  grid: Rect[];
  connections: Line[];
  /** Simplified polyline, first point at pointA, last at pointB. */
  path: Point[];
}

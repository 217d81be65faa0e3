import { rectIntersects, samePoint, sameRect, segmentRect } from './geometry';
import { PointGraph } from './point-graph';
import type { Point, Rect } from './types';

/**
 * Connector-to-antenna segment. It is exempt from the clearance test of its
 * own margined shape (and of any obstacle with the same bounds).
 */
export interface Stub {
  from: Point;
  to: Point;
  shape: Rect;
}

/** True when the segment runs through an obstacle's interior. Touching an edge is fine. */
export function segmentBlocked(a: Point, b: Point, obstacles: readonly Rect[]): boolean {
  const seg = segmentRect(a, b);
  return obstacles.some((box) => rectIntersects(seg, box));
}

function groupBy(spots: readonly Point[], key: (p: Point) => number, order: (p: Point) => number): Point[][] {
  const groups = new Map<number, Point[]>();
  for (const p of spots) {
    const k = key(p);
    const group = groups.get(k);
    if (group) group.push(p);
    else groups.set(k, [p]);
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, group]) => group.sort((p, q) => order(p) - order(q)));
}

/** Connect every pair on the line whose segment is clear; stop extending once one is blocked. */
function connectLine(graph: PointGraph, line: readonly Point[], obstacles: readonly Rect[]): void {
  for (let i = 0; i < line.length - 1; i++) {
    for (let j = i + 1; j < line.length; j++) {
      if (segmentBlocked(line[i], line[j], obstacles)) break;
      graph.connect(line[i], line[j]);
    }
  }
}

/**
 * Build the routing graph over the spots.
 * Edges are axis-aligned only: horizontal edges row by row from the top,
 * then vertical edges column by column from the left, then connector stubs.
 */
export function buildRoutingGraph(
  spots: readonly Point[],
  obstacles: readonly Rect[],
  stubs: readonly Stub[] = [],
): PointGraph {
  const graph = new PointGraph();
  for (const p of spots) graph.add(p);

  for (const row of groupBy(spots, (p) => p.y, (p) => p.x)) {
    connectLine(graph, row, obstacles);
  }
  for (const column of groupBy(spots, (p) => p.x, (p) => p.y)) {
    connectLine(graph, column, obstacles);
  }

  for (const stub of stubs) {
    if (samePoint(stub.from, stub.to)) continue;
    if (!graph.has(stub.from) || !graph.has(stub.to)) continue;
    const others = obstacles.filter((box) => !sameRect(box, stub.shape));
    if (segmentBlocked(stub.from, stub.to, others)) continue;
    graph.connect(stub.from, stub.to);
  }

  return graph;
}

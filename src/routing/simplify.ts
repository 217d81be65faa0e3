import { makeLine, samePoint } from './geometry';
import type { Line, Point } from './types';

function collinear(a: Point, b: Point, c: Point): boolean {
  return (a.x === b.x && b.x === c.x) || (a.y === b.y && b.y === c.y);
}

/** Remove duplicate and collinear waypoints, keeping both ends. */
export function simplifyPath(points: readonly Point[]): Point[] {
  const result: Point[] = [];
  for (const p of points) {
    if (result.length > 0 && samePoint(result[result.length - 1], p)) continue;
    while (result.length >= 2 && collinear(result[result.length - 2], result[result.length - 1], p)) {
      result.pop();
    }
    result.push(p);
  }
  return result;
}

export function pathToLines(points: readonly Point[]): Line[] {
  const lines: Line[] = [];
  for (let i = 0; i < points.length - 1; i++) {
    lines.push(makeLine(points[i], points[i + 1]));
  }
  return lines;
}

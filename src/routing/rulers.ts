import { rectBottom, rectLeft, rectRight, rectTop } from './geometry';
import type { Point, Rect } from './types';

export interface Rulers {
  /** Distinct x values, ascending. */
  vRulers: number[];
  /** Distinct y values, ascending. */
  hRulers: number[];
}

function sortedUnique(values: number[], min: number, max: number): number[] {
  return [...new Set(values.filter((v) => v >= min && v <= max))].sort((a, b) => a - b);
}

/**
 * Collect the coordinates every bend of an optimal orthogonal route can sit on:
 * the margined shape edges, the connector coordinates and the routable bounds.
 * Values outside `bounds` are dropped.
 */
export function computeRulers(obstacles: readonly Rect[], connectors: readonly Point[], bounds: Rect): Rulers {
  const xs: number[] = [rectLeft(bounds), rectRight(bounds)];
  const ys: number[] = [rectTop(bounds), rectBottom(bounds)];

  for (const box of obstacles) {
    xs.push(rectLeft(box), rectRight(box));
    ys.push(rectTop(box), rectBottom(box));
  }
  for (const p of connectors) {
    xs.push(p.x);
    ys.push(p.y);
  }

  return {
    vRulers: sortedUnique(xs, rectLeft(bounds), rectRight(bounds)),
    hRulers: sortedUnique(ys, rectTop(bounds), rectBottom(bounds)),
  };
}

import { rectFromLTRB, rectIntersects } from './geometry';
import type { Rulers } from './rulers';
import type { Rect } from './types';

/**
 * Cells between consecutive rulers, row by row from the top, left to right.
 * Cells overlapping an obstacle's interior are left out.
 */
export function buildGrid(rulers: Rulers, obstacles: readonly Rect[]): Rect[] {
  const { vRulers, hRulers } = rulers;
  const cells: Rect[] = [];

  for (let j = 0; j < hRulers.length - 1; j++) {
    for (let i = 0; i < vRulers.length - 1; i++) {
      const cell = rectFromLTRB(vRulers[i], hRulers[j], vRulers[i + 1], hRulers[j + 1]);
      if (obstacles.some((box) => rectIntersects(cell, box))) continue;
      cells.push(cell);
    }
  }

  return cells;
}

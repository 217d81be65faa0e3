import { directionOf } from './geometry';
import type { PointGraph } from './point-graph';
import type { Point } from './types';

export interface PathfinderOptions {
  /** Added to the path cost for every change between horizontal and vertical travel. */
  bendPenalty?: number;
}

// ─── Binary min-heap for the Dijkstra frontier ───

interface QueueEntry {
  state: number;
  cost: number;
  bends: number;
  /** Push order; breaks ties so earlier-discovered states pop first. */
  seq: number;
}

function before(a: QueueEntry, b: QueueEntry): boolean {
  if (a.cost !== b.cost) return a.cost < b.cost;
  if (a.bends !== b.bends) return a.bends < b.bends;
  return a.seq < b.seq;
}

class MinHeap {
  private heap: QueueEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(entry: QueueEntry): void {
    this.heap.push(entry);
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): QueueEntry | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      this.sinkDown(0);
    }
    return top;
  }

  private bubbleUp(i: number): void {
    const heap = this.heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private sinkDown(i: number): void {
    const heap = this.heap;
    const n = heap.length;
    while (true) {
      let smallest = i;
      const l = 2 * i + 1;
      const r = 2 * i + 2;
      if (l < n && before(heap[l], heap[smallest])) smallest = l;
      if (r < n && before(heap[r], heap[smallest])) smallest = r;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
  }
}

// ─── Search ───

// Search states are (node, heading) pairs so bends can be counted.
const HEADING_NONE = 0;
const HEADING_HORIZONTAL = 1;
const HEADING_VERTICAL = 2;
const HEADINGS = 3;

/**
 * Dijkstra shortest path between two points of the graph.
 *
 * Cost is the summed edge weight plus `bendPenalty` per bend. Equal-cost
 * paths are ranked by bend count, then by the order their edges were added.
 * Returns null when either point is not a node or no path exists.
 */
export function shortestPath(
  graph: PointGraph,
  from: Point,
  to: Point,
  options: PathfinderOptions = {},
): Point[] | null {
  const bendPenalty = options.bendPenalty ?? 0;
  const source = graph.get(from);
  const target = graph.get(to);
  if (source === undefined || target === undefined) return null;
  if (source === target) return [graph.point(source)];

  const stateCount = graph.nodeCount * HEADINGS;
  const cost = new Array<number>(stateCount).fill(Infinity);
  const bends = new Array<number>(stateCount).fill(Infinity);
  const previous = new Array<number>(stateCount).fill(-1);
  const settled = new Array<boolean>(stateCount).fill(false);

  const open = new MinHeap();
  let seq = 0;
  const start = source * HEADINGS + HEADING_NONE;
  cost[start] = 0;
  bends[start] = 0;
  open.push({ state: start, cost: 0, bends: 0, seq: seq++ });

  while (open.size > 0) {
    const current = open.pop();
    if (current === undefined) break;
    if (settled[current.state]) continue;
    settled[current.state] = true;

    const node = Math.floor(current.state / HEADINGS);
    if (node === target) return unwind(graph, previous, current.state);

    const heading = current.state % HEADINGS;
    const here = graph.point(node);

    for (const edge of graph.neighbors(node)) {
      const nextHeading =
        directionOf(here, graph.point(edge.to)) === 'horizontal' ? HEADING_HORIZONTAL : HEADING_VERTICAL;
      const turned = heading !== HEADING_NONE && heading !== nextHeading;
      const nextState = edge.to * HEADINGS + nextHeading;
      if (settled[nextState]) continue;

      const nextCost = current.cost + edge.weight + (turned ? bendPenalty : 0);
      const nextBends = current.bends + (turned ? 1 : 0);
      if (nextCost < cost[nextState] || (nextCost === cost[nextState] && nextBends < bends[nextState])) {
        cost[nextState] = nextCost;
        bends[nextState] = nextBends;
        previous[nextState] = current.state;
        open.push({ state: nextState, cost: nextCost, bends: nextBends, seq: seq++ });
      }
    }
  }

  return null;
}

function unwind(graph: PointGraph, previous: readonly number[], end: number): Point[] {
  const path: Point[] = [];
  for (let state = end; state !== -1; state = previous[state]) {
    path.push(graph.point(Math.floor(state / HEADINGS)));
  }
  return path.reverse();
}

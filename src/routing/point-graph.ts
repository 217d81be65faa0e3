import { distance, pointKey } from './geometry';
import type { Point } from './types';

export interface GraphEdge {
  to: number;
  weight: number;
}

/**
 * Undirected weighted graph over points.
 * Points are interned by exact coordinate into a dense node arena; edges
 * refer to nodes by index.
 */
export class PointGraph {
  private readonly index = new Map<string, number>();
  private readonly points: Point[] = [];
  private readonly adjacency: GraphEdge[][] = [];
  private edges = 0;

  /** Intern a point, returning its node index. */
  add(p: Point): number {
    const key = pointKey(p);
    const existing = this.index.get(key);
    if (existing !== undefined) return existing;
    const ndx = this.points.length;
    this.points.push(p);
    this.adjacency.push([]);
    this.index.set(key, ndx);
    return ndx;
  }

  has(p: Point): boolean {
    return this.index.has(pointKey(p));
  }

  get(p: Point): number | undefined {
    return this.index.get(pointKey(p));
  }

  point(ndx: number): Point {
    return this.points[ndx];
  }

  /** Add reciprocal edges weighted by distance. Both points must already be nodes. */
  connect(a: Point, b: Point): void {
    const from = this.get(a);
    const to = this.get(b);
    if (from === undefined || to === undefined) {
      throw new Error(`Cannot connect ${pointKey(a)} to ${pointKey(b)}: point is not in the graph`);
    }
    if (from === to || this.isConnected(from, to)) return;
    const weight = distance(a, b);
    this.adjacency[from].push({ to, weight });
    this.adjacency[to].push({ to: from, weight });
    this.edges++;
  }

  isConnected(from: number, to: number): boolean {
    return this.adjacency[from].some((e) => e.to === to);
  }

  neighbors(ndx: number): readonly GraphEdge[] {
    return this.adjacency[ndx];
  }

  get nodeCount(): number {
    return this.points.length;
  }

  /** Number of undirected edges. */
  get edgeCount(): number {
    return this.edges;
  }
}

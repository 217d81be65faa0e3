import { describe, it, expect } from 'vitest';
import { makePoint, rectFromLTRB } from '../../../src/routing/geometry';
import { PointGraph } from '../../../src/routing/point-graph';
import { buildRoutingGraph, segmentBlocked } from '../../../src/routing/routing-graph';

describe('PointGraph', () => {
  it('interns points by coordinate', () => {
    const graph = new PointGraph();
    const a = graph.add(makePoint(1, 2));
    const b = graph.add(makePoint(3, 4));
    expect(graph.add(makePoint(1, 2))).toBe(a);
    expect(b).toBe(1);
    expect(graph.nodeCount).toBe(2);
    expect(graph.get(makePoint(3, 4))).toBe(b);
    expect(graph.get(makePoint(9, 9))).toBeUndefined();
    expect(graph.point(a)).toEqual({ x: 1, y: 2 });
  });

  it('adds reciprocal edges weighted by distance', () => {
    const graph = new PointGraph();
    graph.add(makePoint(0, 0));
    graph.add(makePoint(0, 30));
    graph.connect(makePoint(0, 0), makePoint(0, 30));
    expect(graph.neighbors(0)).toEqual([{ to: 1, weight: 30 }]);
    expect(graph.neighbors(1)).toEqual([{ to: 0, weight: 30 }]);
    expect(graph.edgeCount).toBe(1);
  });

  it('ignores repeated connections and self loops', () => {
    const graph = new PointGraph();
    graph.add(makePoint(0, 0));
    graph.add(makePoint(5, 0));
    graph.connect(makePoint(0, 0), makePoint(5, 0));
    graph.connect(makePoint(5, 0), makePoint(0, 0));
    graph.connect(makePoint(0, 0), makePoint(0, 0));
    expect(graph.edgeCount).toBe(1);
  });

  it('refuses to connect unknown points', () => {
    const graph = new PointGraph();
    graph.add(makePoint(0, 0));
    expect(() => graph.connect(makePoint(0, 0), makePoint(1, 0))).toThrow(
      'Cannot connect 0,0 to 1,0: point is not in the graph',
    );
  });
});

describe('buildRoutingGraph', () => {
  const obstacle = rectFromLTRB(10, -10, 20, 10);

  it('only connects aligned spots whose segment stays out of obstacles', () => {
    const spots = [makePoint(0, 0), makePoint(30, 0), makePoint(0, 20), makePoint(30, 20)];
    const graph = buildRoutingGraph(spots, [obstacle]);

    expect(graph.edgeCount).toBe(3);
    expect(graph.isConnected(0, 1)).toBe(false);
    expect(graph.isConnected(2, 3)).toBe(true);
    expect(graph.isConnected(0, 2)).toBe(true);
    expect(graph.isConnected(0, 3)).toBe(false);
  });

  it('connects every clear pair on a line, not only neighbours', () => {
    const spots = [makePoint(0, 50), makePoint(10, 50), makePoint(20, 50)];
    const graph = buildRoutingGraph(spots, []);
    expect(graph.edgeCount).toBe(3);
    expect(graph.neighbors(0)).toEqual([
      { to: 1, weight: 10 },
      { to: 2, weight: 20 },
    ]);
  });

  it('allows segments along an obstacle edge', () => {
    expect(segmentBlocked(makePoint(10, -10), makePoint(20, -10), [obstacle])).toBe(false);
    expect(segmentBlocked(makePoint(0, 0), makePoint(30, 0), [obstacle])).toBe(true);
  });

  it('links a connector to its antenna through its own shape', () => {
    const shape = rectFromLTRB(-10, -10, 10, 10);
    const spots = [makePoint(0, 0), makePoint(10, 0), makePoint(20, 0)];

    const without = buildRoutingGraph(spots, [shape]);
    expect(without.neighbors(0)).toEqual([]);

    const withStub = buildRoutingGraph(spots, [shape], [{ from: makePoint(0, 0), to: makePoint(10, 0), shape }]);
    expect(withStub.neighbors(0)).toEqual([{ to: 1, weight: 10 }]);
    expect(withStub.edgeCount).toBe(2);
  });

  it('still blocks a stub that runs into the other shape', () => {
    const own = rectFromLTRB(-10, -10, 10, 10);
    const other = rectFromLTRB(5, -20, 30, 20);
    const spots = [makePoint(0, 0), makePoint(10, 0)];
    const graph = buildRoutingGraph(spots, [own, other], [{ from: makePoint(0, 0), to: makePoint(10, 0), shape: own }]);
    expect(graph.edgeCount).toBe(0);
  });
});

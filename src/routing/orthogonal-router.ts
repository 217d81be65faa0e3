/**
 * Orthogonal connector router.
 *
 * Joins a point on the boundary of one rectangle to a point on the boundary
 * of another with a path of horizontal and vertical segments that keeps
 * `shapeMargin` clear of both shapes.
 *
 * Pipeline for one request:
 * - rulers: distinct x/y values from the margined shapes, connectors and bounds
 * - grid: cells between consecutive rulers, minus those inside a margined shape
 * - spots: cell corners, free ruler intersections, the connector points and their antennas
 * - graph: axis-aligned edges between spots that stay out of shape interiors
 * - Dijkstra from connector A to connector B, then collinear simplification
 */

import { createLogger } from '../utils/logger';
import { InvalidConfigurationError, RoutingError, UnroutableError } from './errors';
import {
  extrudeConnectorPoint,
  inflateRect,
  rectContains,
  resolveConnectorPoint,
  unionRect,
} from './geometry';
import { buildGrid } from './grid';
import { parseRouteOptions, type NormalizedRouteOptions } from './options';
import { shortestPath } from './pathfinder';
import { buildRoutingGraph } from './routing-graph';
import { computeRulers } from './rulers';
import { pathToLines, simplifyPath } from './simplify';
import { extractSpots, rulerSpots } from './spots';
import type { OrthogonalConnectorByproduct, OrthogonalConnectorOpts, Point, Rect } from './types';

const log = createLogger('router');

// ─── Bounds ───

/**
 * Area the route may use: the global bounds grown by `globalBoundsMargin`,
 * or, when unbounded, both margined shapes plus that margin.
 */
function routableBounds(opts: NormalizedRouteOptions, inflatedA: Rect, inflatedB: Rect): Rect {
  const m = opts.globalBoundsMargin;
  if (opts.globalBounds) return inflateRect(opts.globalBounds, m, m);
  return inflateRect(unionRect(inflatedA, inflatedB), m, m);
}

function assertInside(bounds: Rect, p: Point, name: string): void {
  if (!rectContains(bounds, p)) {
    throw new InvalidConfigurationError(`${name} at (${p.x}, ${p.y}) lies outside the global bounds`);
  }
}

// ─── Public API ───

/**
 * Route a connector between two shapes.
 *
 * Throws InvalidConfigurationError for malformed input and UnroutableError
 * when the shapes leave no orthogonal path between the connector points.
 */
export function route(opts: OrthogonalConnectorOpts): OrthogonalConnectorByproduct {
  const o = parseRouteOptions(opts);
  const margin = o.shapeMargin;

  const start = resolveConnectorPoint(o.pointA);
  const end = resolveConnectorPoint(o.pointB);
  const inflatedA = inflateRect(o.pointA.shape, margin, margin);
  const inflatedB = inflateRect(o.pointB.shape, margin, margin);
  const obstacles = [inflatedA, inflatedB];

  const bounds = routableBounds(o, inflatedA, inflatedB);
  assertInside(bounds, start, 'pointA');
  assertInside(bounds, end, 'pointB');

  // Antennas outside the bounds are left out, which isolates their connector.
  const antennaA = extrudeConnectorPoint(o.pointA, margin);
  const antennaB = extrudeConnectorPoint(o.pointB, margin);
  const extra = [start, antennaA, end, antennaB].filter((p) => rectContains(bounds, p));

  const rulers = computeRulers(obstacles, [start, end], bounds);
  const grid = buildGrid(rulers, obstacles);
  const spots = extractSpots(grid, [...rulerSpots(rulers, obstacles), ...extra]);
  const graph = buildRoutingGraph(spots, obstacles, [
    { from: start, to: antennaA, shape: inflatedA },
    { from: end, to: antennaB, shape: inflatedB },
  ]);

  log.debug(
    `rulers ${rulers.vRulers.length}x${rulers.hRulers.length}, ${grid.length} cells, ` +
      `${graph.nodeCount} spots, ${graph.edgeCount} edges`,
  );

  const raw = shortestPath(graph, start, end, { bendPenalty: o.bendPenalty });
  if (!raw) throw new UnroutableError(start, end);

  const path = simplifyPath(raw);
  log.debug(`route found with ${path.length} points (${raw.length} before simplification)`);

  return {
    hRulers: rulers.hRulers,
    vRulers: rulers.vRulers,
    spots,
    grid,
    connections: pathToLines(path),
    path,
  };
}

export type RouteResult =
  | { ok: true; value: OrthogonalConnectorByproduct }
  | { ok: false; error: RoutingError };

/**
 * Run a routing call, capturing RoutingError as a failed result. Anything
 * else still propagates.
 */
export function settleRoute(run: () => OrthogonalConnectorByproduct): RouteResult {
  try {
    return { ok: true, value: run() };
  } catch (error) {
    if (RoutingError.isRoutingError(error)) {
      log.debug(`routing failed (${error.code}): ${error.message}`);
      return { ok: false, error };
    }
    throw error;
  }
}

/** Non-throwing wrapper around route(). */
export function routeSafe(opts: OrthogonalConnectorOpts): RouteResult {
  return settleRoute(() => route(opts));
}

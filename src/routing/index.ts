export { route, routeSafe, settleRoute } from './orthogonal-router';
export type { RouteResult } from './orthogonal-router';
export { createRouter } from './router';
export type { ConnectorRequest, ConnectorRouter } from './router';
export { RoutingError, InvalidConfigurationError, UnroutableError } from './errors';
export type { RoutingErrorCode } from './errors';
export { parseRouteOptions, routeOptionsSchema } from './options';
export type { NormalizedRouteOptions } from './options';
export { PointGraph } from './point-graph';
export type { GraphEdge } from './point-graph';
export { computeRulers } from './rulers';
export type { Rulers } from './rulers';
export { buildGrid } from './grid';
export { extractSpots, rulerSpots } from './spots';
export { buildRoutingGraph, segmentBlocked } from './routing-graph';
export type { Stub } from './routing-graph';
export { shortestPath } from './pathfinder';
export type { PathfinderOptions } from './pathfinder';
export { simplifyPath, pathToLines } from './simplify';
export * from './geometry';
export type * from './types';

import { getDefaultConfig, mergeConfig } from '../config/defaults';
import { parseRouterConfig } from '../config/loader';
import type { PartialRouterConfig, RouterConfig } from '../config/types';
import { createLogger } from '../utils/logger';
import { LRUCache, type CacheStats } from '../utils/lru-cache';
import { parseRouteOptions } from './options';
import { route, settleRoute, type RouteResult } from './orthogonal-router';
import type { OrthogonalConnectorByproduct, OrthogonalConnectorOpts } from './types';

const log = createLogger('router');

type DefaultedField = 'shapeMargin' | 'globalBoundsMargin' | 'bendPenalty';

/** Routing request whose margins and bend penalty fall back to the router config. */
export type ConnectorRequest = Omit<OrthogonalConnectorOpts, DefaultedField> &
  Partial<Pick<OrthogonalConnectorOpts, DefaultedField>>;

export interface ConnectorRouter {
  readonly config: RouterConfig;
  route(request: ConnectorRequest): OrthogonalConnectorByproduct;
  routeSafe(request: ConnectorRequest): RouteResult;
  /** Hit/miss counters of the result cache; null when caching is off. */
  cacheStats(): CacheStats | null;
  clearCache(): void;
}

/**
 * Create a router bound to a configuration.
 *
 * With `cacheSize > 0` results are memoized per normalized request. Each
 * call still receives its own copy of the byproduct. Throws when the config
 * holds invalid values.
 */
export function createRouter(config: PartialRouterConfig = {}): ConnectorRouter {
  const resolved = mergeConfig(getDefaultConfig(), parseRouterConfig(config, 'createRouter'));
  const cache = resolved.cacheSize > 0 ? new LRUCache<string, OrthogonalConnectorByproduct>(resolved.cacheSize) : null;

  const withDefaults = (request: ConnectorRequest): OrthogonalConnectorOpts => ({
    ...request,
    shapeMargin: request.shapeMargin ?? resolved.shapeMargin,
    globalBoundsMargin: request.globalBoundsMargin ?? resolved.globalBoundsMargin,
    bendPenalty: request.bendPenalty ?? resolved.bendPenalty,
  });

  const routeWithCache = (request: ConnectorRequest): OrthogonalConnectorByproduct => {
    const opts = withDefaults(request);
    if (!cache) return route(opts);

    const key = JSON.stringify(parseRouteOptions(opts));
    const hit = cache.get(key);
    if (hit) {
      const { hits, misses } = cache.stats();
      log.debug(`cache hit (${hits} hits, ${misses} misses)`);
      return structuredClone(hit);
    }
    const result = route(opts);
    cache.set(key, result);
    return structuredClone(result);
  };

  return {
    config: resolved,
    route: routeWithCache,
    routeSafe(request: ConnectorRequest): RouteResult {
      return settleRoute(() => routeWithCache(request));
    },
    cacheStats(): CacheStats | null {
      return cache ? cache.stats() : null;
    },
    clearCache(): void {
      cache?.clear();
    },
  };
}

/**
 * Configuration types for the connector router
 */

/**
 * Defaults applied by a router instance to requests that omit them
 */
export interface RouterConfig {
  /** Clearance kept around each shape */
  shapeMargin: number;
  /** Extra room around the routable area */
  globalBoundsMargin: number;
  /** Cost added per bend when ranking paths */
  bendPenalty: number;
  /** Number of results memoized per router; 0 disables the cache */
  cacheSize: number;
}

export type PartialRouterConfig = Partial<RouterConfig>;

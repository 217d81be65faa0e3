import type { PartialRouterConfig, RouterConfig } from './types';

export const DEFAULT_CONFIG: RouterConfig = {
  shapeMargin: 10,
  globalBoundsMargin: 20,
  bendPenalty: 0,
  cacheSize: 0,
};

export function getDefaultConfig(): RouterConfig {
  return { ...DEFAULT_CONFIG };
}

/**
 * Overlay the defined fields of a partial config
 */
export function mergeConfig(base: RouterConfig, override: PartialRouterConfig): RouterConfig {
  return {
    shapeMargin: override.shapeMargin ?? base.shapeMargin,
    globalBoundsMargin: override.globalBoundsMargin ?? base.globalBoundsMargin,
    bendPenalty: override.bendPenalty ?? base.bendPenalty,
    cacheSize: override.cacheSize ?? base.cacheSize,
  };
}

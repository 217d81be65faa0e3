/**
 * ortho-connector
 *
 * Right-angle connector routing between two rectangular shapes.
 */

export * from './routing/index';
export { loadRouterConfig, loadRouterConfigSync, parseRouterConfig, routerConfigSchema } from './config/loader';
export { DEFAULT_CONFIG, getDefaultConfig, mergeConfig } from './config/defaults';
export type { RouterConfig, PartialRouterConfig } from './config/types';
export { createLogger } from './utils/logger';
export type { CacheStats } from './utils/lru-cache';
export type { Logger } from './utils/logger';
export { getErrorMessage, wrapError } from './utils/error-utils';

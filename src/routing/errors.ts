import type { Point } from './types';

export type RoutingErrorCode = 'INVALID_CONFIGURATION' | 'UNROUTABLE';

/**
 * Base class for every failure reported by the router.
 */
export class RoutingError extends Error {
  constructor(
    message: string,
    public readonly code: RoutingErrorCode,
  ) {
    super(message);
    this.name = 'RoutingError';
  }

  static isRoutingError(error: unknown): error is RoutingError {
    return error instanceof RoutingError;
  }
}

/**
 * Thrown before any routing work when the request is malformed or a
 * connector lies outside the routable bounds.
 */
export class InvalidConfigurationError extends RoutingError {
  constructor(
    message: string,
    public readonly issues: string[] = [message],
  ) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

/** No orthogonal path joins the two connector points. */
export class UnroutableError extends RoutingError {
  constructor(
    public readonly from: Point,
    public readonly to: Point,
    message = `No orthogonal route from (${from.x}, ${from.y}) to (${to.x}, ${to.y})`,
  ) {
    super(message, 'UNROUTABLE');
    this.name = 'UnroutableError';
  }
}

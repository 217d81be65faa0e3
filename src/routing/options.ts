import { z } from 'zod';
import { InvalidConfigurationError } from './errors';
import type { ConnectorPoint, Rect } from './types';

const coordinate = z.number().int().safe();
const extent = coordinate.min(0);

export const pointSchema = z.object({ x: coordinate, y: coordinate });

export const sizeSchema = z.object({ width: extent, height: extent });

export const rectSchema = z.object({ origin: pointSchema, size: sizeSchema });

export const sideSchema = z.enum(['top', 'right', 'bottom', 'left']);

export const connectorPointSchema = z.object({
  shape: rectSchema,
  side: sideSchema,
  distance: z.number().min(0).max(1),
});

export const routeOptionsSchema = z.object({
  pointA: connectorPointSchema,
  pointB: connectorPointSchema,
  shapeMargin: extent,
  globalBoundsMargin: extent,
  globalBounds: rectSchema.nullish(),
  bendPenalty: z.number().finite().min(0).optional(),
});

/** Request with every optional field settled. */
export interface NormalizedRouteOptions {
  pointA: ConnectorPoint;
  pointB: ConnectorPoint;
  shapeMargin: number;
  globalBoundsMargin: number;
  globalBounds: Rect | null;
  bendPenalty: number;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : 'options';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a routing request. Throws InvalidConfigurationError listing every
 * problem found.
 */
export function parseRouteOptions(input: unknown): NormalizedRouteOptions {
  const result = routeOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new InvalidConfigurationError(`Invalid routing options: ${issues.join('; ')}`, issues);
  }
  const opts = result.data;
  return {
    pointA: opts.pointA,
    pointB: opts.pointB,
    shapeMargin: opts.shapeMargin,
    globalBoundsMargin: opts.globalBoundsMargin,
    globalBounds: opts.globalBounds ?? null,
    bendPenalty: opts.bendPenalty ?? 0,
  };
}

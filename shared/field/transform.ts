import type { FieldConfiguration, FieldPoint, PixelPoint, RenderGeometry } from './types';

export const YARD_LINE_COUNT = 20;

// Truncates toward zero, so negative coordinates bias toward the origin too.
export function scaleUnit(value: number, scale: number): number {
  return Math.trunc(value * scale);
}

export function toCanvasPoint(point: FieldPoint, { scale, padding }: RenderGeometry): PixelPoint {
  return {
    x: scaleUnit(point[0], scale) + padding,
    y: scaleUnit(point[1], scale) + padding,
  };
}

export function measureFieldCanvas(
  config: Pick<FieldConfiguration, 'width' | 'length'>,
  { scale, padding }: RenderGeometry,
): { width: number; height: number } {
  return {
    width: scaleUnit(config.length, scale) + padding * 2,
    height: scaleUnit(config.width, scale) + padding * 2,
  };
}

/** x of the i-th yard line after the first goal line (i = 0 is the goal line itself). */
export function yardLineX(
  config: Pick<FieldConfiguration, 'goalLine1' | 'yardLineInterval'>,
  index: number,
  { scale, padding }: RenderGeometry,
): number {
  return scaleUnit(config.goalLine1, scale) + index * scaleUnit(config.yardLineInterval, scale) + padding;
}

/**
 * Yard lines 1..20 that land strictly inside the right edge of the field.
 */
export function visibleYardLines(config: FieldConfiguration, geometry: RenderGeometry): number[] {
  const rightEdge = scaleUnit(config.length, geometry.scale) + geometry.padding;
  const positions: number[] = [];
  for (let i = 1; i <= YARD_LINE_COUNT; i += 1) {
    const x = yardLineX(config, i, geometry);
    if (x < rightEdge) {
      positions.push(x);
    }
  }
  return positions;
}

/**
 * Keeps entries with at least two finite coordinates. Anything else
 * (empty arrays, nulls, NaN) is dropped rather than reported.
 */
export function sanitizeFieldPoints(points: ReadonlyArray<ArrayLike<number> | null | undefined> | null | undefined): FieldPoint[] {
  if (!points) {
    return [];
  }
  const sanitized: FieldPoint[] = [];
  for (const entry of points) {
    if (!entry || typeof entry !== 'object' || entry.length < 2) {
      continue;
    }
    const x = Number(entry[0]);
    const y = Number(entry[1]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      continue;
    }
    sanitized.push([x, y]);
  }
  return sanitized;
}

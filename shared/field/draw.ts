import { emitFieldRender } from '../telemetry/field';
import { createFieldCanvas, type FieldCanvas } from './canvas';
import { colorFromHex, FIELD_COLORS, type FieldColor } from './color';
import { vertexLabel } from './configuration';
import { resolveRenderGeometry } from './rc';
import {
  measureFieldCanvas,
  sanitizeFieldPoints,
  scaleUnit,
  toCanvasPoint,
  visibleYardLines,
  yardLineX,
  YARD_LINE_COUNT,
} from './transform';
import type { CanvasMode, FieldConfiguration, FieldPoint, RenderGeometry } from './types';

export type FieldStyle = {
  backgroundColor: FieldColor;
  lineColor: FieldColor;
  lineThickness: number;
  pointRadius: number;
};

export const DEFAULT_FIELD_STYLE: Readonly<FieldStyle> = {
  backgroundColor: FIELD_COLORS.grass,
  lineColor: FIELD_COLORS.white,
  lineThickness: 4,
  pointRadius: 8,
};

export type PointEntry = ArrayLike<number> | null | undefined;

export type PathEntry = ReadonlyArray<PointEntry> | null | undefined;

type CanvasTarget = {
  /** Draw onto this canvas in place instead of rendering a fresh field. */
  canvas?: FieldCanvas | null;
};

export type DrawFieldOptions = Partial<RenderGeometry> &
  Partial<Pick<FieldStyle, 'backgroundColor' | 'lineColor' | 'lineThickness'>>;

export type DrawPointsOptions = Partial<RenderGeometry> &
  CanvasTarget & {
    faceColor?: FieldColor;
    edgeColor?: FieldColor;
    radius?: number;
    thickness?: number;
  };

export type DrawPathsOptions = Partial<RenderGeometry> &
  CanvasTarget & {
    color?: FieldColor;
    thickness?: number;
  };

export type DrawVerticesOptions = Partial<RenderGeometry> &
  CanvasTarget & {
    radius?: number;
    showLabels?: boolean;
    labelColor?: FieldColor;
    defaultColor?: FieldColor;
  };

function resolveCanvas(
  config: FieldConfiguration,
  target: FieldCanvas | null | undefined,
  geometry: RenderGeometry,
): { canvas: FieldCanvas; mode: CanvasMode } {
  if (target) {
    return { canvas: target, mode: 'borrowed' };
  }
  return { canvas: drawField(config, geometry), mode: 'owned' };
}

function parsePaletteColor(value: string | undefined, fallback: FieldColor): FieldColor {
  if (!value) {
    return fallback;
  }
  try {
    return colorFromHex(value);
  } catch (error) {
    console.warn('[field/draw] unusable vertex color, using default', error);
    return fallback;
  }
}

/**
 * Renders the field outline onto a new canvas sized
 * `(trunc(length*scale) + 2p) x (trunc(width*scale) + 2p)`.
 *
 * Edges come from the configuration; yard lines and hash marks are
 * generated from `goalLine1` and `yardLineInterval`. Yard lines that would
 * land on or past the right edge are left out. The configuration is not
 * validated.
 */
export function drawField(config: FieldConfiguration, options: DrawFieldOptions = {}): FieldCanvas {
  const geometry = resolveRenderGeometry(options);
  const { scale, padding } = geometry;
  const lineColor = options.lineColor ?? DEFAULT_FIELD_STYLE.lineColor;
  const thickness = options.lineThickness ?? DEFAULT_FIELD_STYLE.lineThickness;

  const size = measureFieldCanvas(config, geometry);
  const canvas = createFieldCanvas(
    size.width,
    size.height,
    options.backgroundColor ?? DEFAULT_FIELD_STYLE.backgroundColor,
  );

  let edgesDrawn = 0;
  for (const [start, end] of config.edges) {
    const from = config.vertices[start - 1];
    const to = config.vertices[end - 1];
    if (!from || !to) {
      continue;
    }
    canvas.line(toCanvasPoint(from, geometry), toCanvasPoint(to, geometry), lineColor, thickness);
    edgesDrawn += 1;
  }

  const scaledWidth = scaleUnit(config.width, scale);
  for (const x of visibleYardLines(config, geometry)) {
    canvas.line({ x, y: padding }, { x, y: scaledWidth + padding }, lineColor, thickness);
  }

  const hashDistance = scaleUnit(config.hashDistanceFromSideline, scale);
  const halfHash = Math.trunc(scaleUnit(config.hashLength, scale) / 2);
  const hashRows = [hashDistance + padding, scaledWidth - hashDistance + padding];
  for (let i = 0; i <= YARD_LINE_COUNT; i += 1) {
    const x = yardLineX(config, i, geometry);
    for (const y of hashRows) {
      canvas.line({ x, y: y - halfHash }, { x, y: y + halfHash }, lineColor, thickness);
    }
  }

  emitFieldRender({
    kind: 'field',
    mode: 'owned',
    width: canvas.width,
    height: canvas.height,
    items: edgesDrawn,
    skipped: config.edges.length - edgesDrawn,
  });
  return canvas;
}

/**
 * Draws each point as a filled disk with a stroked ring on top. Entries
 * without two finite coordinates are skipped.
 */
export function drawPointsOnField(
  config: FieldConfiguration,
  points: ReadonlyArray<PointEntry>,
  options: DrawPointsOptions = {},
): FieldCanvas {
  const geometry = resolveRenderGeometry(options);
  const { canvas, mode } = resolveCanvas(config, options.canvas, geometry);
  const faceColor = options.faceColor ?? FIELD_COLORS.red;
  const edgeColor = options.edgeColor ?? FIELD_COLORS.black;
  const radius = options.radius ?? 10;
  const thickness = options.thickness ?? 2;

  const valid = sanitizeFieldPoints(points);
  for (const point of valid) {
    const center = toCanvasPoint(point, geometry);
    canvas.disk(center, radius, faceColor);
    canvas.ring(center, radius, edgeColor, thickness);
  }

  emitFieldRender({
    kind: 'points',
    mode,
    width: canvas.width,
    height: canvas.height,
    items: valid.length,
    skipped: points.length - valid.length,
  });
  return canvas;
}

export function drawPathsOnField(
  config: FieldConfiguration,
  paths: ReadonlyArray<PathEntry>,
  options: DrawPathsOptions = {},
): FieldCanvas {
  const geometry = resolveRenderGeometry(options);
  const { canvas, mode } = resolveCanvas(config, options.canvas, geometry);
  const color = options.color ?? FIELD_COLORS.white;
  const thickness = options.thickness ?? 4;

  let drawn = 0;
  for (const path of paths) {
    const valid = sanitizeFieldPoints(path);
    // a single point is not a path
    if (valid.length < 2) {
      continue;
    }
    canvas.polyline(
      valid.map((point) => toCanvasPoint(point, geometry)),
      color,
      thickness,
    );
    drawn += 1;
  }

  emitFieldRender({
    kind: 'paths',
    mode,
    width: canvas.width,
    height: canvas.height,
    items: drawn,
    skipped: paths.length - drawn,
  });
  return canvas;
}

/**
 * Marks every configured vertex in its palette color, optionally with its
 * label, so keypoint detections can be checked against the geometry.
 */
export function drawFieldVertices(config: FieldConfiguration, options: DrawVerticesOptions = {}): FieldCanvas {
  const geometry = resolveRenderGeometry(options);
  const { canvas, mode } = resolveCanvas(config, options.canvas, geometry);
  const radius = options.radius ?? DEFAULT_FIELD_STYLE.pointRadius;
  const defaultColor = options.defaultColor ?? FIELD_COLORS.red;
  const labelColor = options.labelColor ?? FIELD_COLORS.white;
  const labelSize = Math.max(10, Math.round(radius * 1.5));

  config.vertices.forEach((vertex: FieldPoint, index) => {
    const center = toCanvasPoint(vertex, geometry);
    const color = parsePaletteColor(config.colors?.[index], defaultColor);
    canvas.disk(center, radius, color);
    if (options.showLabels) {
      const text = config.labels?.[index] ?? vertexLabel(index);
      canvas.label(text, { x: center.x + radius + 2, y: center.y }, labelColor, labelSize, color);
    }
  });

  emitFieldRender({
    kind: 'vertices',
    mode,
    width: canvas.width,
    height: canvas.height,
    items: config.vertices.length,
    skipped: 0,
  });
  return canvas;
}

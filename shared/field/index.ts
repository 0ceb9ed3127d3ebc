export { FieldCanvas, createFieldCanvas, type PixelBuffer } from './canvas';
export {
  FIELD_COLORS,
  colorFromHex,
  fieldColor,
  toCssColor,
  toPixelTriplet,
  type FieldColor,
  type PixelOrder,
  type PixelTriplet,
} from './color';
export {
  FOOTBALL_FIELD_EDGES,
  NCAA_FIELD_MEASUREMENTS,
  createFootballFieldConfiguration,
  footballFieldVertices,
  vertexLabel,
  type FootballFieldConfiguration,
  type FootballFieldMeasurements,
} from './configuration';
export {
  DEFAULT_FIELD_STYLE,
  drawField,
  drawFieldVertices,
  drawPathsOnField,
  drawPointsOnField,
  type DrawFieldOptions,
  type DrawPathsOptions,
  type DrawPointsOptions,
  type DrawVerticesOptions,
  type FieldStyle,
  type PathEntry,
  type PointEntry,
} from './draw';
export { DEFAULT_RENDER_GEOMETRY, resolveRenderGeometry } from './rc';
export {
  measureFieldCanvas,
  sanitizeFieldPoints,
  scaleUnit,
  toCanvasPoint,
  visibleYardLines,
  yardLineX,
} from './transform';
export type { CanvasMode, FieldConfiguration, FieldEdge, FieldPoint, PixelPoint, RenderGeometry } from './types';

export type FieldPoint = [number, number];

// 1-based indices into FieldConfiguration.vertices
export type FieldEdge = [number, number];

export type FieldConfiguration = {
  width: number;
  length: number;
  hashLength: number;
  hashDistanceFromSideline: number;
  yardLineInterval: number;
  goalLine1: number;
  vertices: readonly FieldPoint[];
  edges: readonly FieldEdge[];
  labels?: readonly string[];
  colors?: readonly string[];
};

export type RenderGeometry = {
  scale: number;
  padding: number;
};

export type PixelPoint = { x: number; y: number };

export type CanvasMode = 'owned' | 'borrowed';

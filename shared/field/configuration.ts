import type { FieldConfiguration, FieldEdge, FieldPoint } from './types';

// NCAA field measured in inches (1 yard = 36)
export type FootballFieldMeasurements = {
  width: number;
  length: number;
  endZoneDepth: number;
  goalLine1: number;
  goalLine2: number;
  hashDistanceFromSideline: number;
  hashLength: number;
  yardLineInterval: number;
  fiftyYardLine: number;
  numberDistanceFromSideline: number;
};

export type FootballFieldConfiguration = FieldConfiguration &
  FootballFieldMeasurements & {
    labels: string[];
    colors: string[];
  };

export const NCAA_FIELD_MEASUREMENTS: Readonly<FootballFieldMeasurements> = {
  width: 1920,
  length: 4320,
  endZoneDepth: 360,
  goalLine1: 360,
  goalLine2: 3960,
  hashDistanceFromSideline: 720,
  hashLength: 24,
  yardLineInterval: 180,
  fiftyYardLine: 2160,
  numberDistanceFromSideline: 324,
};

const MEASUREMENT_KEYS: readonly (keyof FootballFieldMeasurements)[] = [
  'width',
  'length',
  'endZoneDepth',
  'goalLine1',
  'goalLine2',
  'hashDistanceFromSideline',
  'hashLength',
  'yardLineInterval',
  'fiftyYardLine',
  'numberDistanceFromSideline',
];

export const FOOTBALL_FIELD_EDGES: readonly FieldEdge[] = [
  // sidelines
  [1, 3],
  [2, 4],
  // end zone back lines
  [1, 2],
  [3, 4],
  // goal lines
  [5, 6],
  [7, 8],
  // 50-yard line
  [9, 10],
  [1, 5],
  [2, 6],
  [3, 7],
  [4, 8],
  // hash rows: goal lines and midfield, then 20/30/40 on each half
  [12, 13],
  [14, 15],
  [16, 17],
  [18, 19],
  [20, 21],
  [22, 23],
  [24, 25],
  [26, 27],
  [28, 29],
  [5, 9],
  [6, 10],
  [9, 7],
  [10, 8],
];

const CORNER_COLOR = '#FF1493';
const MIDFIELD_COLOR = '#00BFFF';
const HASH_COLOR = '#FF6347';

export function footballFieldVertices(m: FootballFieldMeasurements): FieldPoint[] {
  const topHash = m.hashDistanceFromSideline;
  const bottomHash = m.width - m.hashDistanceFromSideline;
  const hashPair = (x: number): FieldPoint[] => [
    [x, topHash],
    [x, bottomHash],
  ];
  return [
    [0, 0],
    [0, m.width],
    [m.length, 0],
    [m.length, m.width],
    [m.goalLine1, 0],
    [m.goalLine1, m.width],
    [m.goalLine2, 0],
    [m.goalLine2, m.width],
    [m.fiftyYardLine, 0],
    [m.fiftyYardLine, m.width],
    [m.fiftyYardLine, m.width / 2],
    ...hashPair(m.goalLine1),
    ...hashPair(m.goalLine2),
    ...hashPair(m.fiftyYardLine),
    ...hashPair(m.goalLine1 + m.yardLineInterval * 2),
    ...hashPair(m.goalLine1 + m.yardLineInterval * 4),
    ...hashPair(m.goalLine1 + m.yardLineInterval * 6),
    ...hashPair(m.goalLine2 - m.yardLineInterval * 6),
    ...hashPair(m.goalLine2 - m.yardLineInterval * 4),
    ...hashPair(m.goalLine2 - m.yardLineInterval * 2),
    [m.goalLine1 + m.yardLineInterval * 2, m.numberDistanceFromSideline],
    [m.goalLine1 + m.yardLineInterval * 2, m.width - m.numberDistanceFromSideline],
    [m.fiftyYardLine, m.numberDistanceFromSideline],
  ];
}

export function vertexLabel(index: number): string {
  return String(index + 1).padStart(2, '0');
}

function vertexColor(index: number): string {
  if (index < 8) {
    return CORNER_COLOR;
  }
  if (index < 11) {
    return MIDFIELD_COLOR;
  }
  if (index < 29) {
    return HASH_COLOR;
  }
  return MIDFIELD_COLOR;
}

export function createFootballFieldConfiguration(
  overrides: Partial<FootballFieldMeasurements> = {},
): FootballFieldConfiguration {
  const measurements: FootballFieldMeasurements = { ...NCAA_FIELD_MEASUREMENTS };
  for (const key of MEASUREMENT_KEYS) {
    const value = overrides[key];
    // an explicit undefined keeps the default
    if (value !== undefined) {
      measurements[key] = value;
    }
  }
  const vertices = footballFieldVertices(measurements);
  return {
    ...measurements,
    vertices,
    edges: FOOTBALL_FIELD_EDGES.map(([start, end]): FieldEdge => [start, end]),
    labels: vertices.map((_, index) => vertexLabel(index)),
    colors: vertices.map((_, index) => vertexColor(index)),
  };
}

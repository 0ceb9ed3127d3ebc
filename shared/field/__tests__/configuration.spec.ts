import { describe, expect, it } from 'vitest';

import {
  FOOTBALL_FIELD_EDGES,
  NCAA_FIELD_MEASUREMENTS,
  createFootballFieldConfiguration,
  vertexLabel,
} from '../configuration';

describe('createFootballFieldConfiguration', () => {
  it('uses NCAA measurements by default', () => {
    const config = createFootballFieldConfiguration();
    expect(config.width).toBe(1920);
    expect(config.length).toBe(4320);
    expect(config.goalLine1).toBe(360);
    expect(config.yardLineInterval).toBe(180);
    expect(config.hashLength).toBe(24);
  });

  it('derives 32 vertices from the measurements', () => {
    const { vertices } = createFootballFieldConfiguration();
    expect(vertices).toHaveLength(32);
    expect(vertices[0]).toEqual([0, 0]);
    expect(vertices[3]).toEqual([4320, 1920]);
    expect(vertices[10]).toEqual([2160, 960]);
    // 20-yard line hashes
    expect(vertices[17]).toEqual([720, 720]);
    expect(vertices[18]).toEqual([720, 1200]);
    // 80-yard line hashes
    expect(vertices[27]).toEqual([3600, 720]);
    expect(vertices[31]).toEqual([2160, 324]);
  });

  it('moves vertices with overridden measurements', () => {
    const config = createFootballFieldConfiguration({ width: 1800 });
    expect(config.vertices[1]).toEqual([0, 1800]);
    expect(config.vertices[12]).toEqual([360, 1080]);
    expect(NCAA_FIELD_MEASUREMENTS.width).toBe(1920);
  });

  it('keeps the default for measurements passed as undefined', () => {
    const config = createFootballFieldConfiguration({ width: undefined, hashLength: 30 });
    expect(config.width).toBe(1920);
    expect(config.hashLength).toBe(30);
    expect(config.vertices[1]).toEqual([0, 1920]);
  });

  it('only references existing vertices from edges', () => {
    const config = createFootballFieldConfiguration();
    expect(config.edges).toHaveLength(24);
    for (const [start, end] of config.edges) {
      expect(config.vertices[start - 1]).toBeDefined();
      expect(config.vertices[end - 1]).toBeDefined();
    }
  });

  it('returns edges the caller can change without touching the defaults', () => {
    const config = createFootballFieldConfiguration();
    config.edges[0][0] = 2;
    expect(FOOTBALL_FIELD_EDGES[0]).toEqual([1, 3]);
  });

  it('labels and colors every vertex', () => {
    const config = createFootballFieldConfiguration();
    expect(config.labels).toHaveLength(32);
    expect(config.labels[0]).toBe('01');
    expect(config.labels[31]).toBe('32');
    expect(config.colors[7]).toBe('#FF1493');
    expect(config.colors[8]).toBe('#00BFFF');
    expect(config.colors[11]).toBe('#FF6347');
    expect(config.colors[28]).toBe('#FF6347');
    expect(config.colors[29]).toBe('#00BFFF');
  });
});

describe('vertexLabel', () => {
  it('pads one-based indices to two digits', () => {
    expect(vertexLabel(0)).toBe('01');
    expect(vertexLabel(9)).toBe('10');
    expect(vertexLabel(119)).toBe('120');
  });
});

import { describe, expect, it } from 'vitest';

import { FieldCanvas, createFieldCanvas } from '../canvas';
import { FIELD_COLORS, fieldColor } from '../color';

describe('createFieldCanvas', () => {
  it('rejects empty sizes', () => {
    expect(() => createFieldCanvas(0, 10, FIELD_COLORS.black)).toThrow(
      'Canvas size must be positive, received 0x10',
    );
    expect(() => new FieldCanvas(10, Number.NaN)).toThrow('Canvas size must be positive');
  });

  it('fills with the background color', () => {
    const canvas = createFieldCanvas(4, 3, fieldColor(10, 20, 30));
    expect(canvas.width).toBe(4);
    expect(canvas.height).toBe(3);
    expect(canvas.pixelAt(3, 2)).toEqual([10, 20, 30]);
    expect(canvas.pixelAt(3, 2, 'bgr')).toEqual([30, 20, 10]);
  });
});

describe('FieldCanvas', () => {
  it('returns null outside the surface', () => {
    const canvas = createFieldCanvas(4, 3, FIELD_COLORS.black);
    expect(canvas.pixelAt(-1, 0)).toBeNull();
    expect(canvas.pixelAt(4, 0)).toBeNull();
    expect(canvas.pixelAt(0, 3)).toBeNull();
  });

  it('exports a height x width x 3 buffer', () => {
    const canvas = createFieldCanvas(4, 3, fieldColor(10, 20, 30));
    const rgb = canvas.toPixelBuffer();
    expect(rgb.data).toHaveLength(4 * 3 * 3);
    expect(rgb.channels).toBe(3);
    expect(Array.from(rgb.data.slice(0, 6))).toEqual([10, 20, 30, 10, 20, 30]);

    const bgr = canvas.toPixelBuffer('bgr');
    expect(bgr.order).toBe('bgr');
    expect(Array.from(bgr.data.slice(0, 3))).toEqual([30, 20, 10]);
  });

  it('stores rows top to bottom', () => {
    const canvas = createFieldCanvas(20, 20, FIELD_COLORS.black);
    canvas.line({ x: 0, y: 12 }, { x: 20, y: 12 }, FIELD_COLORS.white, 4);
    const { data, width } = canvas.toPixelBuffer();
    const offset = (11 * width + 5) * 3;
    expect(Array.from(data.slice(offset, offset + 3))).toEqual([255, 255, 255]);
    expect(Array.from(data.slice(5 * 3, 5 * 3 + 3))).toEqual([0, 0, 0]);
  });

  it('clones into an independent surface', () => {
    const canvas = createFieldCanvas(20, 20, FIELD_COLORS.black);
    const copy = canvas.clone();
    canvas.disk({ x: 10, y: 10 }, 5, FIELD_COLORS.white);

    expect(canvas.pixelAt(10, 10)).toEqual([255, 255, 255]);
    expect(copy.pixelAt(10, 10)).toEqual([0, 0, 0]);
  });

  it('encodes PNG bytes', () => {
    const png = createFieldCanvas(8, 8, FIELD_COLORS.grass).encodePng();
    expect(Array.from(png.subarray(0, 8))).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });
});

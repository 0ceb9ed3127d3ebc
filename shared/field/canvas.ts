import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';

import { toCssColor, type FieldColor, type PixelOrder, type PixelTriplet } from './color';
import type { PixelPoint } from './types';

export type PixelBuffer = {
  width: number;
  height: number;
  channels: 3;
  order: PixelOrder;
  // row-major, height x width x 3
  data: Uint8Array;
};

const LABEL_FONT = 'sans-serif';
const LABEL_INSET = 2;

/**
 * Mutable raster surface the field renderer draws into. Every draw call
 * works in place; callers that need the previous state should `clone()`.
 */
export class FieldCanvas {
  readonly width: number;

  readonly height: number;

  private readonly surface: Canvas;

  private readonly ctx: SKRSContext2D;

  constructor(width: number, height: number) {
    if (!Number.isFinite(width) || !Number.isFinite(height) || width < 1 || height < 1) {
      throw new Error(`Canvas size must be positive, received ${width}x${height}`);
    }
    this.width = Math.trunc(width);
    this.height = Math.trunc(height);
    this.surface = createCanvas(this.width, this.height);
    this.ctx = this.surface.getContext('2d');
  }

  fill(color: FieldColor): void {
    this.ctx.fillStyle = toCssColor(color);
    this.ctx.fillRect(0, 0, this.width, this.height);
  }

  line(from: PixelPoint, to: PixelPoint, color: FieldColor, thickness: number): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.strokeStyle = toCssColor(color);
    ctx.lineWidth = thickness;
    ctx.lineCap = 'round';
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    ctx.stroke();
    ctx.restore();
  }

  polyline(points: readonly PixelPoint[], color: FieldColor, thickness: number): void {
    if (points.length < 2) {
      return;
    }
    const ctx = this.ctx;
    ctx.save();
    ctx.strokeStyle = toCssColor(color);
    ctx.lineWidth = thickness;
    ctx.lineCap = 'round';
    ctx.lineJoin = 'round';
    ctx.beginPath();
    ctx.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i += 1) {
      ctx.lineTo(points[i].x, points[i].y);
    }
    ctx.stroke();
    ctx.restore();
  }

  disk(center: PixelPoint, radius: number, color: FieldColor): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.fillStyle = toCssColor(color);
    ctx.beginPath();
    ctx.arc(center.x, center.y, Math.max(0, radius), 0, Math.PI * 2);
    ctx.fill();
    ctx.restore();
  }

  ring(center: PixelPoint, radius: number, color: FieldColor, thickness: number): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.strokeStyle = toCssColor(color);
    ctx.lineWidth = thickness;
    ctx.beginPath();
    ctx.arc(center.x, center.y, Math.max(0, radius), 0, Math.PI * 2);
    ctx.stroke();
    ctx.restore();
  }

  /**
   * Writes `text` starting at `at` (vertically centred), on a plate of
   * `background` when given. The plate is at least 0.6em wide per character.
   */
  label(text: string, at: PixelPoint, color: FieldColor, sizePx: number, background?: FieldColor): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.font = `600 ${sizePx}px ${LABEL_FONT}`;
    ctx.textAlign = 'left';
    ctx.textBaseline = 'middle';
    if (background) {
      const textWidth = Math.max(ctx.measureText(text).width, text.length * sizePx * 0.6);
      ctx.fillStyle = toCssColor(background);
      ctx.fillRect(at.x, at.y - sizePx / 2 - LABEL_INSET, textWidth + LABEL_INSET * 2, sizePx + LABEL_INSET * 2);
    }
    ctx.fillStyle = toCssColor(color);
    ctx.fillText(text, at.x + LABEL_INSET, at.y);
    ctx.restore();
  }

  pixelAt(x: number, y: number, order: PixelOrder = 'rgb'): PixelTriplet | null {
    const px = Math.trunc(x);
    const py = Math.trunc(y);
    if (px < 0 || py < 0 || px >= this.width || py >= this.height) {
      return null;
    }
    const { data } = this.ctx.getImageData(px, py, 1, 1);
    return order === 'bgr' ? [data[2], data[1], data[0]] : [data[0], data[1], data[2]];
  }

  toPixelBuffer(order: PixelOrder = 'rgb'): PixelBuffer {
    const rgba = this.ctx.getImageData(0, 0, this.width, this.height).data;
    const pixelCount = this.width * this.height;
    const data = new Uint8Array(pixelCount * 3);
    const [first, last] = order === 'bgr' ? [2, 0] : [0, 2];
    for (let i = 0; i < pixelCount; i += 1) {
      data[i * 3] = rgba[i * 4 + first];
      data[i * 3 + 1] = rgba[i * 4 + 1];
      data[i * 3 + 2] = rgba[i * 4 + last];
    }
    return { width: this.width, height: this.height, channels: 3, order, data };
  }

  clone(): FieldCanvas {
    const copy = new FieldCanvas(this.width, this.height);
    copy.ctx.drawImage(this.surface, 0, 0);
    return copy;
  }

  encodePng(): Buffer {
    return this.surface.encodeSync('png');
  }
}

export function createFieldCanvas(width: number, height: number, background: FieldColor): FieldCanvas {
  const canvas = new FieldCanvas(width, height);
  canvas.fill(background);
  return canvas;
}

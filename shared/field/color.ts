export type FieldColor = { r: number; g: number; b: number };

export type PixelOrder = 'rgb' | 'bgr';

export type PixelTriplet = [number, number, number];

const clampChannel = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(255, Math.max(0, Math.round(value)));
};

export function fieldColor(r: number, g: number, b: number): FieldColor {
  return { r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) };
}

/**
 * Parses `#rgb` or `#rrggbb` (the leading `#` is optional).
 * Throws on anything else so a typo in a palette fails loudly.
 */
export function colorFromHex(hex: string): FieldColor {
  const raw = hex.trim().replace(/^#/, '');
  if (!/^[0-9a-fA-F]+$/.test(raw)) {
    throw new Error(`Invalid hex color: ${JSON.stringify(hex)}`);
  }
  if (raw.length === 3) {
    const [r, g, b] = raw.split('').map((nibble) => Number.parseInt(nibble, 16) * 17);
    return fieldColor(r, g, b);
  }
  if (raw.length === 6) {
    return fieldColor(
      Number.parseInt(raw.slice(0, 2), 16),
      Number.parseInt(raw.slice(2, 4), 16),
      Number.parseInt(raw.slice(4, 6), 16),
    );
  }
  throw new Error(`Invalid hex color: ${JSON.stringify(hex)}`);
}

export function toPixelTriplet(color: FieldColor, order: PixelOrder = 'rgb'): PixelTriplet {
  return order === 'bgr' ? [color.b, color.g, color.r] : [color.r, color.g, color.b];
}

export function toCssColor(color: FieldColor): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

export const FIELD_COLORS = {
  grass: fieldColor(34, 139, 34),
  white: fieldColor(255, 255, 255),
  black: fieldColor(0, 0, 0),
  red: fieldColor(255, 0, 0),
} as const;

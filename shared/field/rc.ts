import type { RenderGeometry } from './types';

export type RcSource = Record<string, unknown> | null | undefined;

const SCALE_KEY = 'field.render.scale';
const PADDING_KEY = 'field.render.padding';

export const DEFAULT_RENDER_GEOMETRY: Readonly<RenderGeometry> = {
  scale: 0.1,
  padding: 50,
};

function getGlobalRc(): RcSource {
  if (typeof globalThis === 'undefined') {
    return null;
  }
  const holder = globalThis as typeof globalThis & { RC?: RcSource };
  return holder.RC ?? null;
}

function readEnvValue(key: string): string | undefined {
  if (typeof process === 'undefined' || typeof process.env !== 'object') {
    return undefined;
  }
  const value = process.env[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function readRcValue(source: RcSource, key: string): unknown {
  if (!source || typeof source !== 'object') {
    return undefined;
  }
  return source[key];
}

function normalizeNumber(value: unknown, accept: (n: number) => boolean): number | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(numeric) && accept(numeric) ? numeric : null;
}

function readNumberSetting({
  rcKey,
  envKey,
  fallback,
  accept,
}: {
  rcKey: string;
  envKey: string;
  fallback: number;
  accept: (n: number) => boolean;
}): number {
  const env = normalizeNumber(readEnvValue(envKey), accept);
  if (env !== null) {
    return env;
  }
  const rc = normalizeNumber(readRcValue(getGlobalRc(), rcKey), accept);
  if (rc !== null) {
    return rc;
  }
  return fallback;
}

export function fieldRenderScale(): number {
  return readNumberSetting({
    rcKey: SCALE_KEY,
    envKey: 'FIELD_RENDER_SCALE',
    fallback: DEFAULT_RENDER_GEOMETRY.scale,
    accept: (n) => n > 0,
  });
}

export function fieldRenderPadding(): number {
  return Math.trunc(
    readNumberSetting({
      rcKey: PADDING_KEY,
      envKey: 'FIELD_RENDER_PADDING',
      fallback: DEFAULT_RENDER_GEOMETRY.padding,
      accept: (n) => n >= 0,
    }),
  );
}

/**
 * Explicit options win, then FIELD_RENDER_* env vars, then globalThis.RC.
 */
export function resolveRenderGeometry(options: Partial<RenderGeometry> = {}): RenderGeometry {
  return {
    scale: options.scale ?? fieldRenderScale(),
    padding: options.padding ?? fieldRenderPadding(),
  };
}

export function __setFieldRcForTests(rc: RcSource | null): void {
  if (typeof globalThis === 'undefined') {
    return;
  }
  const holder = globalThis as typeof globalThis & { RC?: RcSource };
  if (rc === null) {
    delete holder.RC;
    return;
  }
  holder.RC = rc;
}

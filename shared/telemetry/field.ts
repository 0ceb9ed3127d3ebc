import type { CanvasMode } from '../field/types';

export type FieldTelemetryEmitter = (event: string, payload: Record<string, unknown>) => void;

export type FieldRenderKind = 'field' | 'points' | 'paths' | 'vertices';

let emitter: FieldTelemetryEmitter | null = null;

function safeEmit(event: string, payload: Record<string, unknown>): void {
  if (!emitter) {
    return;
  }
  try {
    emitter(event, payload);
  } catch (error) {
    if (typeof process !== 'undefined' && process.env?.NODE_ENV !== 'production') {
      // eslint-disable-next-line no-console
      console.warn('[telemetry/field] emit failed', error);
    }
  }
}

export function setFieldTelemetryEmitter(candidate: FieldTelemetryEmitter | null | undefined): void {
  emitter = typeof candidate === 'function' ? candidate : null;
}

export function emitFieldRender(payload: {
  kind: FieldRenderKind;
  mode: CanvasMode;
  width: number;
  height: number;
  items: number;
  skipped: number;
}): void {
  safeEmit('field.render.v1', {
    kind: payload.kind,
    mode: payload.mode,
    width: payload.width,
    height: payload.height,
    items: Number.isFinite(payload.items) ? payload.items : 0,
    skipped: Number.isFinite(payload.skipped) ? payload.skipped : 0,
    ts: Date.now(),
  });
}

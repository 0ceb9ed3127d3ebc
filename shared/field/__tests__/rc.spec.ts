import { afterEach, describe, expect, it, vi } from 'vitest';

import { __setFieldRcForTests, fieldRenderPadding, fieldRenderScale, resolveRenderGeometry } from '../rc';

afterEach(() => {
  vi.unstubAllEnvs();
  __setFieldRcForTests(null);
});

describe('field render rc', () => {
  it('falls back to defaults', () => {
    vi.stubEnv('FIELD_RENDER_SCALE', '');
    vi.stubEnv('FIELD_RENDER_PADDING', '');
    expect(resolveRenderGeometry()).toEqual({ scale: 0.1, padding: 50 });
  });

  it('reads globalThis.RC', () => {
    vi.stubEnv('FIELD_RENDER_SCALE', '');
    vi.stubEnv('FIELD_RENDER_PADDING', '');
    __setFieldRcForTests({ 'field.render.scale': 0.25, 'field.render.padding': '12' });
    expect(fieldRenderScale()).toBe(0.25);
    expect(fieldRenderPadding()).toBe(12);
  });

  it('prefers the environment over RC', () => {
    vi.stubEnv('FIELD_RENDER_SCALE', '0.2');
    vi.stubEnv('FIELD_RENDER_PADDING', '7.9');
    __setFieldRcForTests({ 'field.render.scale': 0.25, 'field.render.padding': 12 });
    expect(resolveRenderGeometry()).toEqual({ scale: 0.2, padding: 7 });
  });

  it('ignores unusable values', () => {
    vi.stubEnv('FIELD_RENDER_SCALE', '0');
    vi.stubEnv('FIELD_RENDER_PADDING', '-4');
    __setFieldRcForTests({ 'field.render.scale': 'wide', 'field.render.padding': null });
    expect(resolveRenderGeometry()).toEqual({ scale: 0.1, padding: 50 });
  });

  it('lets explicit options win', () => {
    vi.stubEnv('FIELD_RENDER_SCALE', '0.2');
    vi.stubEnv('FIELD_RENDER_PADDING', '7');
    expect(resolveRenderGeometry({ scale: 1, padding: 0 })).toEqual({ scale: 1, padding: 0 });
    expect(resolveRenderGeometry({ padding: 3 })).toEqual({ scale: 0.2, padding: 3 });
  });
});

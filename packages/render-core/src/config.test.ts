import { describe, expect, it } from 'vitest';

import {
  DEFAULT_RENDER_CONTEXT_CONFIG,
  clampSurfaceSize,
  resolveRenderContextConfig,
} from './config.js';
import { RenderContextConfigError } from './errors.js';

describe('resolveRenderContextConfig', () => {
  it('fills defaults and floors the surface size to at least one pixel', () => {
    const config = resolveRenderContextConfig({ size: { width: 100.7, height: 0 } });

    expect(config).toEqual({
      label: undefined,
      size: { width: 100, height: 1 },
      ...DEFAULT_RENDER_CONTEXT_CONFIG,
    });
    expect(config.surfaceUsage).toBe(0x10);
    expect(config.mapAlignment).toBe(8);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps explicit overrides', () => {
    const config = resolveRenderContextConfig({
      label: 'main',
      size: { width: 320, height: 200 },
      preferredFormats: ['rgba8unorm'],
      alphaMode: 'premultiplied',
      mapAlignment: 16,
    });

    expect(config.label).toBe('main');
    expect(config.preferredFormats).toEqual(['rgba8unorm']);
    expect(config.alphaMode).toBe('premultiplied');
    expect(config.mapAlignment).toBe(16);
  });

  it('reports every rejected field with its path', () => {
    let caught: unknown;
    try {
      resolveRenderContextConfig({
        size: { width: Number.POSITIVE_INFINITY, height: 10 },
        mapAlignment: 12,
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RenderContextConfigError);
    const configError = caught instanceof RenderContextConfigError ? caught : undefined;
    expect(configError?.issues).toEqual([
      { path: 'size.width', message: 'Surface dimensions must be finite numbers.' },
      { path: 'mapAlignment', message: 'mapAlignment must be a power of two.' },
    ]);
    expect(configError?.message).toBe(
      'Invalid render context options: size.width: Surface dimensions must be finite numbers.; mapAlignment: mapAlignment must be a power of two.',
    );
  });

  it('rejects unknown options', () => {
    expect(() =>
      resolveRenderContextConfig({ size: { width: 1, height: 1 }, vsync: true }),
    ).toThrow(RenderContextConfigError);
  });

  it('rejects a present mode', () => {
    expect(() =>
      resolveRenderContextConfig({ size: { width: 1, height: 1 }, presentMode: 'mailbox' }),
    ).toThrowError("Invalid render context options: Unrecognized key(s) in object: 'presentMode'");
  });
});

describe('clampSurfaceSize', () => {
  it('floors to integers and clamps degenerate sides to one', () => {
    expect(clampSurfaceSize({ width: 0, height: 33.9 })).toEqual({ width: 1, height: 33 });
    expect(clampSurfaceSize({ width: Number.NaN, height: -5 })).toEqual({ width: 1, height: 1 });
  });
});

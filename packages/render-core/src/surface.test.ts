import { describe, expect, it } from 'vitest';

import { RenderContextConstructionError } from './errors.js';
import { createSurfaceConfiguration, selectSurfaceFormat } from './surface.js';

describe('selectSurfaceFormat', () => {
  const formats: GPUTextureFormat[] = ['bgra8unorm', 'rgba8unorm', 'rgba8unorm-srgb'];

  it('takes the first preferred format the surface supports', () => {
    expect(selectSurfaceFormat({ formats }, ['rgba16float', 'rgba8unorm'])).toBe('rgba8unorm');
  });

  it('falls back to the first sRGB format', () => {
    expect(selectSurfaceFormat({ formats }, ['rgba16float'])).toBe('rgba8unorm-srgb');
  });

  it('falls back to the first capability when none is sRGB', () => {
    expect(selectSurfaceFormat({ formats: ['bgra8unorm', 'rgba8unorm'] }, [])).toBe('bgra8unorm');
  });

  it('rejects a surface without formats', () => {
    expect(() => selectSurfaceFormat({ formats: [] }, [])).toThrowError(
      RenderContextConstructionError,
    );
  });
});

describe('createSurfaceConfiguration', () => {
  it('flattens the size into a frozen configuration', () => {
    const configuration = createSurfaceConfiguration({
      format: 'bgra8unorm',
      size: { width: 800, height: 600 },
      usage: 0x10,
      alphaMode: 'opaque',
    });

    expect(configuration).toEqual({
      format: 'bgra8unorm',
      width: 800,
      height: 600,
      usage: 0x10,
      alphaMode: 'opaque',
    });
    expect(Object.isFrozen(configuration)).toBe(true);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';

import { captureError, createFakeGpu, createTestContext } from './__tests__/fake-gpu.js';
import { rgba8unorm } from './element-type.js';
import { RenderContextConfigError } from './errors.js';
import { ShaderStage } from './gpu-flags.js';
import { RenderContext, createRenderContext } from './render-context.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from './telemetry.js';

describe('RenderContext', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('configures the surface once at construction', () => {
    const { context, surface } = createTestContext();

    expect(surface.configurations).toEqual([
      {
        format: 'bgra8unorm-srgb',
        width: 640,
        height: 480,
        usage: 0x10,
        alphaMode: 'opaque',
      },
    ]);
    expect(context.surfaceFormat).toBe('bgra8unorm-srgb');
    expect(context.surfaceSize).toEqual({ width: 640, height: 480 });
    expect(context.passOrder).toEqual([]);
  });

  it('honors preferred formats and presentation options', () => {
    const { context, surface } = createTestContext({
      preferredFormats: ['rgba8unorm', 'bgra8unorm'],
      alphaMode: 'premultiplied',
    });

    expect(context.surfaceFormat).toBe('bgra8unorm');
    expect(surface.configurations[0]).toMatchObject({
      format: 'bgra8unorm',
      alphaMode: 'premultiplied',
    });
  });

  it('rejects invalid options before touching the surface', () => {
    const { device, surface } = createFakeGpu();

    expect(() =>
      createRenderContext(device, surface, { size: { width: 10, height: 10 }, mapAlignment: 3 }),
    ).toThrow(RenderContextConfigError);
    expect(surface.configurations).toEqual([]);
  });

  it('rejects a surface that reports no formats', () => {
    const { device, surface } = createFakeGpu([]);

    expect(
      captureError(() => new RenderContext(device, surface, { size: { width: 1, height: 1 } })),
    ).toMatchObject({
      code: 'unsupported-surface',
      message: 'Presentation surface reported no supported texture formats.',
    });
  });

  it('treats handles it never issued as misuse', () => {
    const { context } = createTestContext();

    expect(() => context.getBuffer({ kind: 'buffer', index: 0 })).toThrowError(
      "Invalid buffer handle #0 (kind 'buffer') passed to getBuffer.",
    );
    expect(captureError(() => context.getTexture({ kind: 'sampler', index: 0 }))).toMatchObject({
      code: 'invalid-handle',
    });
  });

  it('clamps and applies a new surface size', () => {
    const { context, surface } = createTestContext();

    context.resize({ width: 0, height: 200.9 });

    expect(context.surfaceSize).toEqual({ width: 1, height: 200 });
    expect(surface.configurations).toHaveLength(2);
    expect(surface.configurations[1]).toMatchObject({ width: 1, height: 200 });
  });

  it('reallocates surface-relative textures and their dependents once per resize', () => {
    const counters = vi.fn();
    setTelemetry({ ...silentTelemetry, recordCounters: counters });
    const { context, fake } = createTestContext();
    const color = context.textureBuilder(rgba8unorm, 'color').sizeSurface().sampled().build();
    const half = context.textureBuilder(rgba8unorm, 'half').sizeScaledSurface(0.5).sampled().build();
    const fixed = context
      .textureBuilder(rgba8unorm, 'fixed')
      .sizeFixed({ dimension: '2d', width: 8, height: 8 })
      .sampled()
      .build();
    context
      .bindGroupBuilder('both')
      .bindTexture(0, ShaderStage.FRAGMENT, color)
      .bindTexture(1, ShaderStage.FRAGMENT, half)
      .build();
    context.bindGroupBuilder('static').bindTexture(0, ShaderStage.FRAGMENT, fixed).build();

    context.resize({ width: 800, height: 600 });

    expect(fake.textures).toHaveLength(5);
    expect(fake.bindGroups).toHaveLength(3);
    expect(fake.bindGroups[2]?.descriptor.label).toBe('both');
    expect(context.getTexture(half).extent).toEqual({ width: 400, height: 300, depthOrArrayLayers: 1 });
    expect(counters).toHaveBeenCalledWith('ResizeCascade', {
      texturesReallocated: 2,
      bindGroupsRecreated: 1,
    });
  });

  it('leaves resources alone when the size does not change', () => {
    const counters = vi.fn();
    setTelemetry({ ...silentTelemetry, recordCounters: counters });
    const { context, fake, surface } = createTestContext();
    const color = context.textureBuilder(rgba8unorm).sizeSurface().sampled().build();
    context.bindGroupBuilder().bindTexture(0, ShaderStage.FRAGMENT, color).build();

    context.resize({ width: 640, height: 480 });

    expect(surface.configurations).toHaveLength(2);
    expect(fake.textures).toHaveLength(1);
    expect(fake.bindGroups).toHaveLength(1);
    expect(counters).toHaveBeenCalledWith('ResizeCascade', {
      texturesReallocated: 0,
      bindGroupsRecreated: 0,
    });
  });

  it('reconfigures the surface on recreate without touching resources', () => {
    const { context, fake, surface } = createTestContext();
    context.textureBuilder(rgba8unorm).sizeSurface().build();

    context.recreate();
    context.recreate();

    expect(surface.configurations).toHaveLength(3);
    expect(surface.configurations[2]).toEqual(surface.configurations[0]);
    expect(fake.textures).toHaveLength(1);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';

import { boundResource, captureError, createTestContext } from './__tests__/fake-gpu.js';
import { elements, f32, mat4x4f, rgba8unorm, vec4f } from './element-type.js';
import { ShaderStage } from './gpu-flags.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from './telemetry.js';

describe('bind groups', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('resolves identical bindings when recreated twice without a reallocation', () => {
    const { context, fake } = createTestContext();
    const lights = context.bufferBuilder(vec4f, 'lights').storage().build(8);
    const shadow = context
      .textureBuilder(rgba8unorm, 'shadow')
      .sizeFixed({ dimension: '2d', width: 4, height: 4 })
      .sampled()
      .build();
    const sampler = context.samplerBuilder('shadow').build();
    const handle = context
      .bindGroupBuilder('lighting')
      .bindStorageBuffer(0, ShaderStage.FRAGMENT, lights)
      .bindTexture(1, ShaderStage.FRAGMENT, shadow)
      .bindSampler(2, ShaderStage.FRAGMENT, sampler)
      .build();
    const group = context.getBindGroup(handle);

    group.recreate();
    const first = group.resolvedEntries;
    group.recreate();
    const second = group.resolvedEntries;

    expect(second).toEqual(first);
    expect(second.map(boundResource)).toEqual([
      fake.buffers[0],
      context.getTexture(shadow).view,
      context.getSampler(sampler).resource,
    ]);
    const firstResources = first.map(boundResource);
    second.map(boundResource).forEach((resource, index) => {
      expect(resource).toBe(firstResources[index]);
    });
    expect(fake.bindGroupLayouts).toHaveLength(1);
    expect(fake.bindGroups).toHaveLength(3);
    expect(fake.bindGroups[2]?.descriptor.entries).toEqual(fake.bindGroups[1]?.descriptor.entries);
  });

  it('derives layout entries from the bound resources', () => {
    const { context, fake } = createTestContext();
    const camera = context.bufferBuilder(mat4x4f, 'camera').uniform().build(1);
    const particles = context.bufferBuilder(vec4f, 'particles').storage().build(64);
    const albedo = context
      .textureBuilder(rgba8unorm, 'albedo')
      .sizeFixed({ dimension: '2d', width: 4, height: 4 })
      .sampled()
      .build();
    const target = context
      .textureBuilder(rgba8unorm, 'target')
      .sizeSurface()
      .storage()
      .build();
    const sampler = context.samplerBuilder().build();

    context
      .bindGroupBuilder('material')
      .bindUniformBuffer(0, ShaderStage.VERTEX, camera)
      .bindStorageBuffer(1, ShaderStage.COMPUTE, particles, { readOnly: true, elementCount: 64 })
      .bindTexture(2, ShaderStage.FRAGMENT, albedo)
      .bindStorageTexture(3, ShaderStage.COMPUTE, target)
      .bindSampler(4, ShaderStage.FRAGMENT, sampler)
      .build();

    expect(fake.bindGroupLayouts).toEqual([
      {
        label: 'material',
        entries: [
          {
            binding: 0,
            visibility: ShaderStage.VERTEX,
            buffer: { type: 'uniform', hasDynamicOffset: false, minBindingSize: 64 },
          },
          {
            binding: 1,
            visibility: ShaderStage.COMPUTE,
            buffer: { type: 'read-only-storage', hasDynamicOffset: false, minBindingSize: 1024 },
          },
          {
            binding: 2,
            visibility: ShaderStage.FRAGMENT,
            texture: { sampleType: 'float', viewDimension: '2d', multisampled: false },
          },
          {
            binding: 3,
            visibility: ShaderStage.COMPUTE,
            storageTexture: { access: 'write-only', format: 'rgba8unorm', viewDimension: '2d' },
          },
          { binding: 4, visibility: ShaderStage.FRAGMENT, sampler: { type: 'filtering' } },
        ],
      },
    ]);
  });

  it('binds the current buffer, view and sampler objects', () => {
    const { context, fake } = createTestContext();
    const uniforms = context.bufferBuilder(vec4f).uniform().build(1);
    const texture = context
      .textureBuilder(rgba8unorm)
      .sizeFixed({ dimension: '2d', width: 1, height: 1 })
      .sampled()
      .build();
    const sampler = context.samplerBuilder().build();

    const handle = context
      .bindGroupBuilder()
      .bindUniformBuffer(0, ShaderStage.FRAGMENT, uniforms)
      .bindTexture(1, ShaderStage.FRAGMENT, texture)
      .bindSampler(2, ShaderStage.FRAGMENT, sampler)
      .build();
    const group = context.getBindGroup(handle);

    expect(group.resolvedEntries.map(boundResource)).toEqual([
      context.getBuffer(uniforms).resource,
      context.getTexture(texture).view,
      context.getSampler(sampler).resource,
    ]);
    expect(group.resource).toBe(fake.bindGroups[0]);
  });

  it('leaves an unsized storage binding unchecked', () => {
    const { context, fake } = createTestContext();
    const data = context.bufferBuilder(vec4f).storage().build(8);

    context.bindGroupBuilder().bindStorageBuffer(0, ShaderStage.COMPUTE, data).build();

    expect(fake.bindGroupLayouts[0]?.entries).toEqual([
      {
        binding: 0,
        visibility: ShaderStage.COMPUTE,
        buffer: { type: 'storage', hasDynamicOffset: false, minBindingSize: 0 },
      },
    ]);
  });

  it('records each dependency once', () => {
    const { context } = createTestContext();
    const buffer = context.bufferBuilder(vec4f).uniform().storage().build(1);

    const handle = context
      .bindGroupBuilder()
      .bindUniformBuffer(0, ShaderStage.VERTEX, buffer)
      .bindStorageBuffer(1, ShaderStage.VERTEX, buffer)
      .build();

    expect(context.getBindGroup(handle).buffers).toEqual([buffer]);
    expect(context.getBindGroup(handle).textures).toEqual([]);
  });

  it('rejects elements that break the map alignment', () => {
    const { context } = createTestContext();
    const scalar = context.bufferBuilder(f32, 'time').uniform().build(1);

    expect(() =>
      context.bindGroupBuilder('globals').bindUniformBuffer(0, ShaderStage.VERTEX, scalar).build(),
    ).toThrowError(
      "buffer 'time' bound at slot 0 of bind group 'globals' has 4-byte elements; shader-visible buffers need a multiple of 8.",
    );
  });

  it('honors a configured map alignment', () => {
    const { context } = createTestContext({ mapAlignment: 4 });
    const scalar = context.bufferBuilder(f32).uniform().build(1);

    expect(() =>
      context.bindGroupBuilder().bindUniformBuffer(0, ShaderStage.VERTEX, scalar).build(),
    ).not.toThrow();
  });

  it('rejects a slot assigned twice', () => {
    const { context } = createTestContext();
    const buffer = context.bufferBuilder(vec4f).uniform().build(1);

    expect(
      captureError(() =>
        context
          .bindGroupBuilder()
          .bindUniformBuffer(0, ShaderStage.VERTEX, buffer)
          .bindUniformBuffer(0, ShaderStage.FRAGMENT, buffer)
          .build(),
      ),
    ).toMatchObject({ code: 'duplicate-binding' });
  });

  it('rejects handles that do not resolve', () => {
    const { context } = createTestContext();

    expect(
      captureError(() =>
        context
          .bindGroupBuilder()
          .bindUniformBuffer(0, ShaderStage.VERTEX, { kind: 'buffer', index: 7 })
          .build(),
      ),
    ).toMatchObject({ code: 'invalid-handle' });
  });

  it('is recreated when a bound buffer is reallocated', () => {
    const { context, fake } = createTestContext();
    const progress = vi.fn();
    setTelemetry({ ...silentTelemetry, recordProgress: progress });
    const lights = context.bufferBuilder(vec4f, 'lights').copyDst().storage().build(1);
    const unrelated = context.bufferBuilder(vec4f).uniform().build(1);
    const lit = context
      .bindGroupBuilder('lit')
      .bindStorageBuffer(0, ShaderStage.FRAGMENT, lights)
      .build();
    const other = context.bindGroupBuilder().bindUniformBuffer(0, ShaderStage.VERTEX, unrelated).build();

    context.writeBuffer(
      lights,
      elements(vec4f, [
        [1, 1, 1, 1],
        [0, 0, 0, 1],
      ]),
    );

    expect(fake.bindGroups).toHaveLength(3);
    expect(context.getBindGroup(lit).resource).toBe(fake.bindGroups[2]);
    expect(context.getBindGroup(lit).resolvedEntries.map(boundResource)).toEqual([
      context.getBuffer(lights).resource,
    ]);
    expect(context.getBindGroup(other).resource).toBe(fake.bindGroups[1]);
    expect(progress).toHaveBeenCalledWith('BindGroupsRecreated', { count: 1, labels: ['lit'] });
  });
});

import type { BufferHandle } from './buffer.js';
import { BuilderSeal, type RenderDevice, type ResourceState } from './context-state.js';
import { RenderContextConstructionError, describeLabel } from './errors.js';
import { type Handle, handlesEqual } from './handle.js';
import type { SamplerHandle } from './sampler.js';
import type { TextureHandle } from './texture.js';

export type BindGroupHandle = Handle<BindGroup>;

export type BindingResourceKind =
  | 'uniform-buffer'
  | 'storage-buffer'
  | 'sampled-texture'
  | 'storage-texture'
  | 'sampler';

/**
 * One slot of a bind group and the resource it resolves against.
 */
export type BindingTarget =
  | {
      readonly binding: number;
      readonly kind: 'uniform-buffer' | 'storage-buffer';
      readonly buffer: BufferHandle;
    }
  | {
      readonly binding: number;
      readonly kind: 'sampled-texture' | 'storage-texture';
      readonly texture: TextureHandle;
    }
  | { readonly binding: number; readonly kind: 'sampler'; readonly sampler: SamplerHandle };

type ResourceLookup = Pick<ResourceState, 'buffers' | 'textures' | 'samplers'>;

/**
 * A compiled layout plus its live instantiation.
 *
 * The layout and the dependency lists are fixed at build time. `recreate`
 * re-resolves every target against the registries and replaces only the
 * instantiation, so the handle stays valid across reallocations.
 */
export class BindGroup {
  readonly label: string | undefined;
  readonly layout: GPUBindGroupLayout;
  readonly layoutEntries: readonly GPUBindGroupLayoutEntry[];
  readonly targets: readonly BindingTarget[];
  readonly buffers: readonly BufferHandle[];
  readonly textures: readonly TextureHandle[];
  readonly samplers: readonly SamplerHandle[];

  private group: GPUBindGroup;
  private entries: readonly GPUBindGroupEntry[];

  constructor(
    private readonly device: RenderDevice,
    private readonly lookup: ResourceLookup,
    label: string | undefined,
    layoutEntries: readonly GPUBindGroupLayoutEntry[],
    targets: readonly BindingTarget[],
  ) {
    this.label = label;
    this.layoutEntries = layoutEntries;
    this.targets = targets;
    this.buffers = dependencies(targets, (target) =>
      target.kind === 'uniform-buffer' || target.kind === 'storage-buffer'
        ? target.buffer
        : undefined,
    );
    this.textures = dependencies(targets, (target) =>
      target.kind === 'sampled-texture' || target.kind === 'storage-texture'
        ? target.texture
        : undefined,
    );
    this.samplers = dependencies(targets, (target) =>
      target.kind === 'sampler' ? target.sampler : undefined,
    );
    this.layout = device.createBindGroupLayout({ label, entries: [...layoutEntries] });
    this.entries = this.resolveEntries();
    this.group = this.instantiate();
  }

  get resource(): GPUBindGroup {
    return this.group;
  }

  /** The entries the current instantiation was created from. */
  get resolvedEntries(): readonly GPUBindGroupEntry[] {
    return this.entries;
  }

  dependsOn(buffers: readonly BufferHandle[], textures: readonly TextureHandle[]): boolean {
    return (
      this.buffers.some((own) => buffers.some((other) => handlesEqual(own, other))) ||
      this.textures.some((own) => textures.some((other) => handlesEqual(own, other)))
    );
  }

  recreate(): void {
    this.entries = this.resolveEntries();
    this.group = this.instantiate();
  }

  private resolveEntries(): readonly GPUBindGroupEntry[] {
    const usage = describeLabel('bind group', this.label);
    return Object.freeze(
      this.targets.map((target): GPUBindGroupEntry => {
        switch (target.kind) {
          case 'uniform-buffer':
          case 'storage-buffer':
            return {
              binding: target.binding,
              resource: { buffer: this.lookup.buffers.require(target.buffer, usage).resource },
            };
          case 'sampled-texture':
          case 'storage-texture':
            return {
              binding: target.binding,
              resource: this.lookup.textures.require(target.texture, usage).view,
            };
          case 'sampler':
            return {
              binding: target.binding,
              resource: this.lookup.samplers.require(target.sampler, usage).resource,
            };
        }
      }),
    );
  }

  private instantiate(): GPUBindGroup {
    return this.device.createBindGroup({
      label: this.label,
      layout: this.layout,
      entries: [...this.entries],
    });
  }
}

function dependencies<T>(
  targets: readonly BindingTarget[],
  select: (target: BindingTarget) => Handle<T> | undefined,
): readonly Handle<T>[] {
  const handles: Handle<T>[] = [];
  for (const target of targets) {
    const handle = select(target);
    if (handle && !handles.some((existing) => handlesEqual(existing, handle))) {
      handles.push(handle);
    }
  }
  return Object.freeze(handles);
}

export interface StorageBufferOptions {
  /** @defaultValue `false` */
  readonly readOnly?: boolean;
  /** Minimum number of elements the shader reads; unchecked when omitted. */
  readonly elementCount?: number;
}

export interface SampledTextureOptions {
  /** @defaultValue `'float'` */
  readonly sampleType?: GPUTextureSampleType;
  /** @defaultValue `'2d'` */
  readonly viewDimension?: GPUTextureViewDimension;
  /** @defaultValue `false` */
  readonly multisampled?: boolean;
}

export interface StorageTextureOptions {
  /** @defaultValue `'write-only'` */
  readonly access?: GPUStorageTextureAccess;
  /** @defaultValue `'2d'` */
  readonly viewDimension?: GPUTextureViewDimension;
}

interface PendingSlot {
  readonly binding: number;
  readonly visibility: number;
}

type PendingEntry =
  | (PendingSlot & { readonly kind: 'uniform-buffer'; readonly buffer: BufferHandle })
  | (PendingSlot & {
      readonly kind: 'storage-buffer';
      readonly buffer: BufferHandle;
      readonly storage: StorageBufferOptions;
    })
  | (PendingSlot & {
      readonly kind: 'sampled-texture';
      readonly texture: TextureHandle;
      readonly sampled: SampledTextureOptions;
    })
  | (PendingSlot & {
      readonly kind: 'storage-texture';
      readonly texture: TextureHandle;
      readonly storageTexture: StorageTextureOptions;
    })
  | (PendingSlot & {
      readonly kind: 'sampler';
      readonly sampler: SamplerHandle;
      readonly samplerType: GPUSamplerBindingType;
    });

function toTarget(entry: PendingEntry): BindingTarget {
  switch (entry.kind) {
    case 'uniform-buffer':
    case 'storage-buffer':
      return { binding: entry.binding, kind: entry.kind, buffer: entry.buffer };
    case 'sampled-texture':
    case 'storage-texture':
      return { binding: entry.binding, kind: entry.kind, texture: entry.texture };
    case 'sampler':
      return { binding: entry.binding, kind: entry.kind, sampler: entry.sampler };
  }
}

export class BindGroupBuilder {
  private readonly pending: PendingEntry[] = [];
  private readonly seal = new BuilderSeal('Bind group builder');

  constructor(
    private readonly state: ResourceState,
    private readonly label?: string,
  ) {}

  /**
   * @param visibility - `ShaderStage` bits.
   */
  bindUniformBuffer(binding: number, visibility: number, buffer: BufferHandle): this {
    this.pending.push({ binding, kind: 'uniform-buffer', buffer, visibility });
    return this;
  }

  bindStorageBuffer(
    binding: number,
    visibility: number,
    buffer: BufferHandle,
    options: StorageBufferOptions = {},
  ): this {
    this.pending.push({ binding, kind: 'storage-buffer', buffer, visibility, storage: options });
    return this;
  }

  bindTexture(
    binding: number,
    visibility: number,
    texture: TextureHandle,
    options: SampledTextureOptions = {},
  ): this {
    this.pending.push({ binding, kind: 'sampled-texture', texture, visibility, sampled: options });
    return this;
  }

  /** The storage format is taken from the texture itself. */
  bindStorageTexture(
    binding: number,
    visibility: number,
    texture: TextureHandle,
    options: StorageTextureOptions = {},
  ): this {
    this.pending.push({
      binding,
      kind: 'storage-texture',
      texture,
      visibility,
      storageTexture: options,
    });
    return this;
  }

  bindSampler(
    binding: number,
    visibility: number,
    sampler: SamplerHandle,
    samplerType: GPUSamplerBindingType = 'filtering',
  ): this {
    this.pending.push({ binding, kind: 'sampler', sampler, visibility, samplerType });
    return this;
  }

  build(): BindGroupHandle {
    this.seal.seal();
    const usage = describeLabel('bind group', this.label);
    const seen = new Set<number>();
    for (const entry of this.pending) {
      if (seen.has(entry.binding)) {
        throw new RenderContextConstructionError(
          'duplicate-binding',
          `Binding slot ${entry.binding} of ${usage} is assigned more than once.`,
        );
      }
      seen.add(entry.binding);
    }

    const layoutEntries = Object.freeze(this.pending.map((entry) => this.layoutEntry(entry, usage)));
    const targets = Object.freeze(this.pending.map(toTarget));
    const group = new BindGroup(this.state.device, this.state, this.label, layoutEntries, targets);
    return this.state.bindGroups.add(group);
  }

  private layoutEntry(entry: PendingEntry, usage: string): GPUBindGroupLayoutEntry {
    const { binding, visibility } = entry;
    switch (entry.kind) {
      case 'uniform-buffer':
        return {
          binding,
          visibility,
          buffer: {
            type: 'uniform',
            hasDynamicOffset: false,
            minBindingSize: this.alignedElementSize(entry.buffer, binding, usage),
          },
        };
      case 'storage-buffer': {
        const elementSize = this.alignedElementSize(entry.buffer, binding, usage);
        const { readOnly = false, elementCount } = entry.storage;
        return {
          binding,
          visibility,
          buffer: {
            type: readOnly ? 'read-only-storage' : 'storage',
            hasDynamicOffset: false,
            minBindingSize: elementCount === undefined ? 0 : elementSize * elementCount,
          },
        };
      }
      case 'sampled-texture':
        this.state.textures.require(entry.texture, usage);
        return {
          binding,
          visibility,
          texture: {
            sampleType: entry.sampled.sampleType ?? 'float',
            viewDimension: entry.sampled.viewDimension ?? '2d',
            multisampled: entry.sampled.multisampled ?? false,
          },
        };
      case 'storage-texture':
        return {
          binding,
          visibility,
          storageTexture: {
            access: entry.storageTexture.access ?? 'write-only',
            format: this.state.textures.require(entry.texture, usage).format,
            viewDimension: entry.storageTexture.viewDimension ?? '2d',
          },
        };
      case 'sampler':
        this.state.samplers.require(entry.sampler, usage);
        return { binding, visibility, sampler: { type: entry.samplerType } };
    }
  }

  private alignedElementSize(handle: BufferHandle, binding: number, usage: string): number {
    const buffer = this.state.buffers.require(handle, usage);
    const elementSize = buffer.elementType.byteSize;
    const alignment = this.state.config.mapAlignment;
    if (elementSize % alignment !== 0) {
      throw new RenderContextConstructionError(
        'misaligned-buffer',
        `${describeLabel('buffer', buffer.label)} bound at slot ${binding} of ${usage} has ${elementSize}-byte elements; shader-visible buffers need a multiple of ${alignment}.`,
      );
    }
    return elementSize;
  }
}

import type { SurfaceSize } from './config.js';
import { BuilderSeal, type RenderDevice, type ResourceState } from './context-state.js';
import type { ElementArray, ElementType } from './element-type.js';
import {
  ElementTypeMismatchError,
  RenderContextConstructionError,
  describeLabel,
} from './errors.js';
import { TextureUsage } from './gpu-flags.js';
import type { Handle } from './handle.js';
import { telemetry } from './telemetry.js';

export type TextureHandle = Handle<Texture>;

/**
 * Stands in for the surface texture acquired at frame time. Only valid as a
 * render pass color attachment.
 */
export const PRESENTATION_TARGET: TextureHandle = Object.freeze({ kind: 'texture', index: -1 });

export function isPresentationTarget(handle: TextureHandle): boolean {
  return handle.kind === PRESENTATION_TARGET.kind && handle.index === PRESENTATION_TARGET.index;
}

export type TextureExtent =
  | { readonly dimension: '1d'; readonly width: number }
  | {
      readonly dimension: '2d';
      readonly width: number;
      readonly height: number;
      readonly layers?: number;
    }
  | {
      readonly dimension: '3d';
      readonly width: number;
      readonly height: number;
      readonly depth: number;
    };

export type TextureSizePolicy =
  | { readonly kind: 'fixed'; readonly extent: TextureExtent }
  | { readonly kind: 'surface' }
  | { readonly kind: 'scaled-surface'; readonly scale: number };

export interface ResolvedExtent {
  readonly width: number;
  readonly height: number;
  readonly depthOrArrayLayers: number;
}

export function resolveExtent(policy: TextureSizePolicy, surface: SurfaceSize): ResolvedExtent {
  switch (policy.kind) {
    case 'surface':
      return { width: surface.width, height: surface.height, depthOrArrayLayers: 1 };
    case 'scaled-surface':
      return {
        width: Math.max(1, Math.floor(surface.width * policy.scale)),
        height: Math.max(1, Math.floor(surface.height * policy.scale)),
        depthOrArrayLayers: 1,
      };
    case 'fixed':
      return fixedExtent(policy.extent);
  }
}

function fixedExtent(extent: TextureExtent): ResolvedExtent {
  switch (extent.dimension) {
    case '1d':
      return { width: extent.width, height: 1, depthOrArrayLayers: 1 };
    case '2d':
      return { width: extent.width, height: extent.height, depthOrArrayLayers: extent.layers ?? 1 };
    case '3d':
      return { width: extent.width, height: extent.height, depthOrArrayLayers: extent.depth };
  }
}

function extentsEqual(a: ResolvedExtent, b: ResolvedExtent): boolean {
  return (
    a.width === b.width &&
    a.height === b.height &&
    a.depthOrArrayLayers === b.depthOrArrayLayers
  );
}

function validateExtent(extent: TextureExtent, resource: string): void {
  const { width, height, depthOrArrayLayers } = fixedExtent(extent);
  if (![width, height, depthOrArrayLayers].every((side) => Number.isInteger(side) && side >= 1)) {
    throw new RenderContextConstructionError(
      'invalid-size-policy',
      `Extent of ${resource} must be positive integers, got ${JSON.stringify(extent)}.`,
    );
  }
}

export interface TextureDescriptor {
  readonly label: string | undefined;
  readonly elementType: ElementType<unknown>;
  readonly format: GPUTextureFormat;
  readonly dimension: GPUTextureDimension;
  readonly mipLevelCount: number;
  readonly sampleCount: number;
  readonly usage: number;
}

/**
 * Device image memory. Surface-relative textures follow the presentation
 * surface; fixed ones change size only through {@link Texture.resize}.
 */
export class Texture {
  readonly label: string | undefined;
  readonly elementType: ElementType<unknown>;
  readonly format: GPUTextureFormat;
  readonly dimension: GPUTextureDimension;
  readonly mipLevelCount: number;
  readonly sampleCount: number;
  readonly usage: number;

  private policy: TextureSizePolicy;
  private currentExtent: ResolvedExtent;
  private gpuTexture: GPUTexture;
  private currentView: GPUTextureView;

  constructor(
    private readonly device: RenderDevice,
    descriptor: TextureDescriptor,
    policy: TextureSizePolicy,
    surface: SurfaceSize,
  ) {
    this.label = descriptor.label;
    this.elementType = descriptor.elementType;
    this.format = descriptor.format;
    this.dimension = descriptor.dimension;
    this.mipLevelCount = descriptor.mipLevelCount;
    this.sampleCount = descriptor.sampleCount;
    this.usage = descriptor.usage;
    this.policy = policy;
    this.currentExtent = resolveExtent(policy, surface);
    this.gpuTexture = this.allocate(this.currentExtent);
    this.currentView = this.gpuTexture.createView({ label: this.label });
  }

  get resource(): GPUTexture {
    return this.gpuTexture;
  }

  /** Cached; replaced only when the texture is reallocated. */
  get view(): GPUTextureView {
    return this.currentView;
  }

  get extent(): ResolvedExtent {
    return this.currentExtent;
  }

  get sizePolicy(): TextureSizePolicy {
    return this.policy;
  }

  get surfaceRelative(): boolean {
    return this.policy.kind !== 'fixed';
  }

  /**
   * Re-evaluates a surface-relative size policy.
   *
   * @returns `true` when the texture was reallocated.
   */
  onSurfaceResize(surface: SurfaceSize): boolean {
    if (this.policy.kind === 'fixed') {
      return false;
    }
    const next = resolveExtent(this.policy, surface);
    if (extentsEqual(next, this.currentExtent)) {
      return false;
    }
    this.reallocate(next);
    return true;
  }

  /**
   * Reallocates the texture at `extent`, which must keep its dimensionality.
   * Always a structural change. A surface-relative texture keeps its policy,
   * so the next surface resize derives its extent from the surface again.
   */
  resize(extent: TextureExtent): true {
    if (extent.dimension !== this.dimension) {
      throw new RenderContextConstructionError(
        'dimension-mismatch',
        `Cannot resize ${describeLabel('texture', this.label)} from ${this.dimension} to ${extent.dimension}.`,
      );
    }
    validateExtent(extent, describeLabel('texture', this.label));
    if (this.policy.kind === 'fixed') {
      this.policy = { kind: 'fixed', extent };
    }
    this.reallocate(fixedExtent(extent));
    return true;
  }

  /**
   * Uploads texels covering the whole of mip level 0.
   */
  write(data: ElementArray): void {
    if (data.type !== this.elementType) {
      throw new ElementTypeMismatchError(
        describeLabel('texture', this.label),
        this.elementType.name,
        data.type.name,
      );
    }
    const { width, height, depthOrArrayLayers } = this.currentExtent;
    const texels = width * height * depthOrArrayLayers;
    if (data.count !== texels) {
      throw new RenderContextConstructionError(
        'element-count-mismatch',
        `Write to ${describeLabel('texture', this.label)} carries ${data.count} texels; its ${width}x${height}x${depthOrArrayLayers} extent needs ${texels}.`,
      );
    }
    this.device.queue.writeTexture(
      { texture: this.gpuTexture },
      data.bytes,
      { bytesPerRow: width * this.elementType.byteSize, rowsPerImage: height },
      { width, height, depthOrArrayLayers },
    );
  }

  private allocate(extent: ResolvedExtent): GPUTexture {
    return this.device.createTexture({
      label: this.label,
      size: { ...extent },
      dimension: this.dimension,
      format: this.format,
      mipLevelCount: this.mipLevelCount,
      sampleCount: this.sampleCount,
      usage: this.usage,
    });
  }

  private reallocate(extent: ResolvedExtent): void {
    this.gpuTexture.destroy();
    this.currentExtent = extent;
    this.gpuTexture = this.allocate(extent);
    this.currentView = this.gpuTexture.createView({ label: this.label });
    telemetry.recordProgress('TextureReallocated', { label: this.label, ...extent });
  }
}

export class TextureBuilder<T> {
  private textureDimension: GPUTextureDimension = '2d';
  private policy: TextureSizePolicy | undefined;
  private mipLevelCount = 1;
  private sampleCount = 1;
  private usage = 0;
  private readonly seal = new BuilderSeal('Texture builder');

  constructor(
    private readonly state: ResourceState,
    private readonly elementType: ElementType<T>,
    private readonly label?: string,
  ) {}

  /** @defaultValue `'2d'` */
  dimension(dimension: GPUTextureDimension): this {
    this.textureDimension = dimension;
    return this;
  }

  sizeFixed(extent: TextureExtent): this {
    if (this.policy.kind === 'fixed') {
      this.policy = { kind: 'fixed', extent };
    }
    return this;
  }

  /** Tracks the presentation surface size. */
  sizeSurface(): this {
    this.policy = { kind: 'surface' };
    return this;
  }

  /** Tracks `scale` times the presentation surface size, each side at least 1. */
  sizeScaledSurface(scale: number): this {
    this.policy = { kind: 'scaled-surface', scale };
    return this;
  }

  mipLevels(count: number): this {
    this.mipLevelCount = count;
    return this;
  }

  samples(count: number): this {
    this.sampleCount = count;
    return this;
  }

  copySrc(): this {
    this.usage |= TextureUsage.COPY_SRC;
    return this;
  }

  copyDst(): this {
    this.usage |= TextureUsage.COPY_DST;
    return this;
  }

  sampled(): this {
    this.usage |= TextureUsage.TEXTURE_BINDING;
    return this;
  }

  storage(): this {
    this.usage |= TextureUsage.STORAGE_BINDING;
    return this;
  }

  renderAttachment(): this {
    this.usage |= TextureUsage.RENDER_ATTACHMENT;
    return this;
  }

  build(): TextureHandle {
    this.seal.seal();
    const resource = describeLabel('texture', this.label);
    const policy = this.policy;
    if (!policy) {
      throw new RenderContextConstructionError(
        'missing-size-policy',
        `Texture builder for ${resource} has no size policy; call sizeFixed, sizeSurface or sizeScaledSurface.`,
      );
    }
    this.validatePolicy(policy, resource);

    const format = this.elementType.textureFormat;
    if (!format) {
      throw new RenderContextConstructionError(
        'missing-field',
        `Element type '${this.elementType.name}' of ${resource} has no texture format.`,
      );
    }

    const texture = new Texture(
      this.state.device,
      {
        label: this.label,
        elementType: this.elementType,
        format,
        dimension: this.textureDimension,
        mipLevelCount: this.mipLevelCount,
        sampleCount: this.sampleCount,
        usage: this.usage,
      },
      policy,
      this.state.surfaceSize,
    );
    return this.state.textures.add(texture);
  }

  private validatePolicy(policy: TextureSizePolicy, resource: string): void {
    if (policy.kind === 'fixed') {
      if (policy.extent.dimension !== this.textureDimension) {
        throw new RenderContextConstructionError(
          'dimension-mismatch',
          `Fixed extent of ${resource} is ${policy.extent.dimension} but the texture is ${this.textureDimension}.`,
        );
      }
      validateExtent(policy.extent, resource);
      return;
    }

    if (this.textureDimension !== '2d') {
      throw new RenderContextConstructionError(
        'invalid-size-policy',
        `Surface-relative sizing requires a 2d texture; ${resource} is ${this.textureDimension}.`,
      );
    }
    if (policy.kind === 'scaled-surface' && !(Number.isFinite(policy.scale) && policy.scale > 0)) {
      throw new RenderContextConstructionError(
        'invalid-size-policy',
        `Surface scale of ${resource} must be a positive finite number, got ${policy.scale}.`,
      );
    }
  }
}

import { BuilderSeal, type ResourceState } from './context-state.js';
import type { Handle } from './handle.js';

export interface Sampler {
  readonly label: string | undefined;
  readonly descriptor: Readonly<GPUSamplerDescriptor>;
  readonly resource: GPUSampler;
}

export type SamplerHandle = Handle<Sampler>;

/**
 * Filtering and addressing state. Defaults match the device's own: clamp to
 * edge, nearest filtering, LOD 0 to 32, no comparison, anisotropy 1.
 */
export class SamplerBuilder {
  private descriptor: GPUSamplerDescriptor;
  private readonly seal = new BuilderSeal('Sampler builder');

  constructor(
    private readonly state: ResourceState,
    label?: string,
  ) {
    this.descriptor = {
      label,
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
      addressModeW: 'clamp-to-edge',
      magFilter: 'nearest',
      minFilter: 'nearest',
      mipmapFilter: 'nearest',
      lodMinClamp: 0,
      lodMaxClamp: 32,
      maxAnisotropy: 1,
    };
  }

  addressMode(u: GPUAddressMode, v: GPUAddressMode = u, w: GPUAddressMode = v): this {
    this.descriptor = { ...this.descriptor, addressModeU: u, addressModeV: v, addressModeW: w };
    return this;
  }

  magFilter(filter: GPUFilterMode): this {
    this.descriptor = { ...this.descriptor, magFilter: filter };
    return this;
  }

  minFilter(filter: GPUFilterMode): this {
    this.descriptor = { ...this.descriptor, minFilter: filter };
    return this;
  }

  mipmapFilter(filter: GPUMipmapFilterMode): this {
    this.descriptor = { ...this.descriptor, mipmapFilter: filter };
    return this;
  }

  lodClamp(min: number, max: number): this {
    this.descriptor = { ...this.descriptor, lodMinClamp: min, lodMaxClamp: max };
    return this;
  }

  compare(compare: GPUCompareFunction): this {
    this.descriptor = { ...this.descriptor, compare };
    return this;
  }

  anisotropyClamp(maxAnisotropy: number): this {
    this.descriptor = { ...this.descriptor, maxAnisotropy };
    return this;
  }

  build(): SamplerHandle {
    this.seal.seal();
    const descriptor = Object.freeze({ ...this.descriptor });
    return this.state.samplers.add(
      Object.freeze({
        label: descriptor.label,
        descriptor,
        resource: this.state.device.createSampler(descriptor),
      }),
    );
  }
}

import type { BindGroup } from './bind-group.js';
import type { ElementBuffer } from './buffer.js';
import type { ComputePass } from './compute-pass.js';
import type { ComputePipeline } from './compute-pipeline.js';
import type { RenderContextConfig, SurfaceSize } from './config.js';
import { RenderContextConstructionError } from './errors.js';
import type { Handle, Registry } from './handle.js';
import type { RenderPass } from './render-pass.js';
import type { RenderPipeline } from './render-pipeline.js';
import type { Sampler } from './sampler.js';
import type { Shader } from './shader.js';
import type { Texture } from './texture.js';

/**
 * The slice of `GPUDevice` the render context drives. Anything satisfying it,
 * including an in-process fake, can back a context.
 */
export type RenderDevice = Pick<
  GPUDevice,
  | 'queue'
  | 'createBuffer'
  | 'createTexture'
  | 'createSampler'
  | 'createBindGroupLayout'
  | 'createBindGroup'
  | 'createPipelineLayout'
  | 'createShaderModule'
  | 'createRenderPipeline'
  | 'createComputePipeline'
  | 'createCommandEncoder'
>;

export type ScheduledPass =
  | { readonly kind: 'render'; readonly handle: Handle<RenderPass> }
  | { readonly kind: 'compute'; readonly handle: Handle<ComputePass> };

/**
 * Everything a builder or the frame executor reads from its owning context.
 */
export interface ResourceState {
  readonly device: RenderDevice;
  readonly config: RenderContextConfig;
  readonly shaders: Registry<Shader>;
  readonly buffers: Registry<ElementBuffer>;
  readonly textures: Registry<Texture>;
  readonly samplers: Registry<Sampler>;
  readonly bindGroups: Registry<BindGroup>;
  readonly renderPipelines: Registry<RenderPipeline>;
  readonly computePipelines: Registry<ComputePipeline>;
  readonly renderPasses: Registry<RenderPass>;
  readonly computePasses: Registry<ComputePass>;
  /** Every pass in declaration order; the frame executor replays this list. */
  readonly passOrder: ScheduledPass[];
  readonly surfaceSize: SurfaceSize;
  readonly surfaceFormat: GPUTextureFormat;
}

/**
 * Guards a builder against being finalized twice.
 */
export class BuilderSeal {
  private finalized = false;

  constructor(private readonly builder: string) {}

  seal(): void {
    if (this.finalized) {
      throw new RenderContextConstructionError(
        'builder-finalized',
        `${this.builder} has already been built; acquire a new builder from the context.`,
      );
    }
    this.finalized = true;
  }
}

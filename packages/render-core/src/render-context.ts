import { type BindGroup, BindGroupBuilder, type BindGroupHandle } from './bind-group.js';
import { BufferBuilder, type BufferHandle, type ElementBuffer } from './buffer.js';
import { type ComputePass, ComputePassBuilder, type ComputePassHandle } from './compute-pass.js';
import {
  type ComputePipeline,
  ComputePipelineBuilder,
  type ComputePipelineHandle,
} from './compute-pipeline.js';
import {
  type RenderContextConfig,
  type RenderContextConfigInput,
  type SurfaceSize,
  clampSurfaceSize,
  resolveRenderContextConfig,
} from './config.js';
import type { RenderDevice, ResourceState, ScheduledPass } from './context-state.js';
import { recreateDependents } from './dependency-cascade.js';
import type { ElementArray, ElementType } from './element-type.js';
import { RenderContextConstructionError } from './errors.js';
import { type FrameResult, executeFrame } from './frame-executor.js';
import { type Handle, Registry } from './handle.js';
import { type RenderPass, RenderPassBuilder, type RenderPassHandle } from './render-pass.js';
import {
  type RenderPipeline,
  RenderPipelineBuilder,
  type RenderPipelineHandle,
} from './render-pipeline.js';
import { type Sampler, SamplerBuilder, type SamplerHandle } from './sampler.js';
import {
  type Shader,
  type ShaderCompiler,
  type ShaderHandle,
  compileShader,
  createDeviceShaderCompiler,
} from './shader.js';
import {
  type PresentationSurface,
  type SurfaceConfiguration,
  createSurfaceConfiguration,
  selectSurfaceFormat,
} from './surface.js';
import { telemetry } from './telemetry.js';
import {
  type Texture,
  TextureBuilder,
  type TextureExtent,
  type TextureHandle,
} from './texture.js';

export type RenderContextOptions = RenderContextConfigInput & {
  /** Replaces `device.createShaderModule` for {@link RenderContext.registerShader}. */
  readonly shaderCompiler?: ShaderCompiler;
};

/**
 * Sole owner of every GPU resource created through it.
 *
 * Builders borrow the context's registries, validate in `build()` and return
 * handles valid for the context's lifetime. Resources are never removed.
 */
export class RenderContext {
  readonly config: RenderContextConfig;

  private readonly state: MutableResourceState;
  private readonly compileShaderSource: ShaderCompiler;

  constructor(
    device: RenderDevice,
    private readonly surface: PresentationSurface,
    options: RenderContextOptions,
  ) {
    const { shaderCompiler, ...configInput } = options;
    this.config = resolveRenderContextConfig(configInput);
    this.compileShaderSource = shaderCompiler ?? createDeviceShaderCompiler(device);

    const format = selectSurfaceFormat(surface.getCapabilities(), this.config.preferredFormats);
    this.state = {
      device,
      config: this.config,
      shaders: new Registry<Shader>('shader'),
      buffers: new Registry<ElementBuffer>('buffer'),
      textures: new Registry<Texture>('texture'),
      samplers: new Registry<Sampler>('sampler'),
      bindGroups: new Registry<BindGroup>('bind-group'),
      renderPipelines: new Registry<RenderPipeline>('render-pipeline'),
      computePipelines: new Registry<ComputePipeline>('compute-pipeline'),
      renderPasses: new Registry<RenderPass>('render-pass'),
      computePasses: new Registry<ComputePass>('compute-pass'),
      passOrder: [],
      surfaceSize: this.config.size,
      surfaceFormat: format,
    };
    surface.configure(this.surfaceConfiguration);
  }

  get surfaceSize(): SurfaceSize {
    return this.state.surfaceSize;
  }

  get surfaceFormat(): GPUTextureFormat {
    return this.state.surfaceFormat;
  }

  /** The configuration the surface was last configured with. */
  get surfaceConfiguration(): SurfaceConfiguration {
    return createSurfaceConfiguration({
      format: this.state.surfaceFormat,
      size: this.state.surfaceSize,
      usage: this.config.surfaceUsage,
      alphaMode: this.config.alphaMode,
    });
  }

  /** Every pass, render and compute, in the order frames replay them. */
  get passOrder(): readonly ScheduledPass[] {
    return this.state.passOrder;
  }

  bufferBuilder<T>(elementType: ElementType<T>, label?: string): BufferBuilder<T> {
    return new BufferBuilder(this.state, elementType, label);
  }

  textureBuilder<T>(elementType: ElementType<T>, label?: string): TextureBuilder<T> {
    return new TextureBuilder(this.state, elementType, label);
  }

  samplerBuilder(label?: string): SamplerBuilder {
    return new SamplerBuilder(this.state, label);
  }

  bindGroupBuilder(label?: string): BindGroupBuilder {
    return new BindGroupBuilder(this.state, label);
  }

  renderPipelineBuilder(label?: string): RenderPipelineBuilder {
    return new RenderPipelineBuilder(this.state, label);
  }

  computePipelineBuilder(label?: string): ComputePipelineBuilder {
    return new ComputePipelineBuilder(this.state, label);
  }

  renderPassBuilder(label?: string): RenderPassBuilder {
    return new RenderPassBuilder(this.state, label);
  }

  computePassBuilder(label?: string): ComputePassBuilder {
    return new ComputePassBuilder(this.state, label);
  }

  /**
   * @throws {@link ShaderCompilationError} when the compiler rejects `source`.
   */
  registerShader(source: string, label?: string): ShaderHandle {
    return this.state.shaders.add(compileShader(this.compileShaderSource, source, label));
  }

  getBuffer(handle: BufferHandle): ElementBuffer {
    return this.state.buffers.require(handle, 'getBuffer');
  }

  getTexture(handle: TextureHandle): Texture {
    return this.state.textures.require(handle, 'getTexture');
  }

  getSampler(handle: SamplerHandle): Sampler {
    return this.state.samplers.require(handle, 'getSampler');
  }

  getShader(handle: ShaderHandle): Shader {
    return this.state.shaders.require(handle, 'getShader');
  }

  getBindGroup(handle: BindGroupHandle): BindGroup {
    return this.state.bindGroups.require(handle, 'getBindGroup');
  }

  getRenderPipeline(handle: RenderPipelineHandle): RenderPipeline {
    return this.state.renderPipelines.require(handle, 'getRenderPipeline');
  }

  getComputePipeline(handle: ComputePipelineHandle): ComputePipeline {
    return this.state.computePipelines.require(handle, 'getComputePipeline');
  }

  getRenderPass(handle: RenderPassHandle): RenderPass {
    return this.state.renderPasses.require(handle, 'getRenderPass');
  }

  getComputePass(handle: ComputePassHandle): ComputePass {
    return this.state.computePasses.require(handle, 'getComputePass');
  }

  /**
   * Replaces a buffer's contents. When the buffer is reallocated, every bind
   * group referencing it is recreated before this returns.
   *
   * @returns whether the buffer was reallocated.
   */
  writeBuffer(handle: BufferHandle, data: ElementArray): boolean {
    const reallocated = this.state.buffers.require(handle, 'writeBuffer').write(data);
    if (reallocated) {
      recreateDependents(this.state.bindGroups, { buffers: [handle] });
    }
    return reallocated;
  }

  writeTexture(handle: TextureHandle, data: ElementArray): void {
    this.state.textures.require(handle, 'writeTexture').write(data);
  }

  /**
   * Reallocates a texture at `extent` and recreates dependent bind groups.
   * Surface-relative textures return to the surface size on the next
   * {@link RenderContext.resize}.
   */
  resizeTexture(handle: TextureHandle, extent: TextureExtent): true {
    this.state.textures.require(handle, 'resizeTexture').resize(extent);
    recreateDependents(this.state.bindGroups, { textures: [handle] });
    return true;
  }

  /**
   * Replaces a pass's pipeline list. Every handle must resolve; the order of
   * the rest of the frame is untouched.
   */
  reorderPipelines(pass: RenderPassHandle, pipelines: readonly RenderPipelineHandle[]): void;
  reorderPipelines(pass: ComputePassHandle, pipelines: readonly ComputePipelineHandle[]): void;
  reorderPipelines(
    pass: RenderPassHandle | ComputePassHandle,
    pipelines: readonly Handle<unknown>[],
  ): void {
    const usage = 'reorderPipelines';
    if (this.state.renderPasses.owns(pass)) {
      const renderPass = this.state.renderPasses.require(pass, usage);
      renderPass.reorder(requireAll(this.state.renderPipelines, pipelines, usage));
      return;
    }
    const computePass = this.state.computePasses.require(pass, usage);
    computePass.reorder(requireAll(this.state.computePipelines, pipelines, usage));
  }

  /**
   * Resizes the presentation surface, reallocates every surface-relative
   * texture whose extent changed and recreates each dependent bind group
   * once. Safe to call repeatedly with the same size.
   */
  resize(size: SurfaceSize): void {
    this.state.surfaceSize = clampSurfaceSize(size);
    this.reconfigureSurface();

    const reallocated: TextureHandle[] = [];
    for (const [handle, texture] of this.state.textures.entries()) {
      if (texture.onSurfaceResize(this.state.surfaceSize)) {
        reallocated.push(handle);
      }
    }
    const bindGroupsRecreated = recreateDependents(this.state.bindGroups, {
      textures: reallocated,
    });
    telemetry.recordCounters('ResizeCascade', {
      texturesReallocated: reallocated.length,
      bindGroupsRecreated,
    });
  }

  /** Reconfigures the surface with its current configuration. */
  recreate(): void {
    this.reconfigureSurface();
  }

  render(): FrameResult {
    return executeFrame(this.state, {
      surface: this.surface,
      reconfigure: () => this.reconfigureSurface(),
    });
  }

  private reconfigureSurface(): void {
    this.surface.configure(this.surfaceConfiguration);
  }
}

function requireAll<T>(
  registry: Registry<T>,
  handles: readonly Handle<unknown>[],
  usage: string,
): Handle<T>[] {
  return handles.map((handle) => {
    if (!registry.owns(handle)) {
      throw new RenderContextConstructionError(
        'invalid-handle',
        `Expected a ${registry.kind} handle in ${usage}, got kind '${handle.kind}'.`,
      );
    }
    registry.require(handle, usage);
    return handle;
  });
}

type MutableResourceState = {
  -readonly [Key in keyof ResourceState]: ResourceState[Key];
};

export function createRenderContext(
  device: RenderDevice,
  surface: PresentationSurface,
  options: RenderContextOptions,
): RenderContext {
  return new RenderContext(device, surface, options);
}

import type { BindGroupHandle } from './bind-group.js';
import { type BufferHandle, type ElementBuffer, indexFormatFor } from './buffer.js';
import { BuilderSeal, type ResourceState } from './context-state.js';
import { RenderContextConstructionError, describeLabel } from './errors.js';
import type { Handle } from './handle.js';
import type { ShaderHandle } from './shader.js';

export type RenderPipelineHandle = Handle<RenderPipeline>;

export type PolygonMode = 'fill' | 'line' | 'point';

export interface ShaderStageReference {
  readonly shader: ShaderHandle;
  readonly entryPoint?: string;
}

export interface DepthStencilOptions {
  readonly format: GPUTextureFormat;
  /** @defaultValue `true` */
  readonly depthWriteEnabled?: boolean;
  /** @defaultValue `'less'` */
  readonly depthCompare?: GPUCompareFunction;
  readonly stencilFront?: GPUStencilFaceState;
  readonly stencilBack?: GPUStencilFaceState;
  readonly stencilReadMask?: number;
  readonly stencilWriteMask?: number;
  /** Constant depth bias. @defaultValue `0` */
  readonly depthBias?: number;
  /** @defaultValue `0` */
  readonly depthBiasSlopeScale?: number;
  /** @defaultValue `0` */
  readonly depthBiasClamp?: number;
}

/**
 * A compiled render program and the handles it draws from. Immutable once
 * built.
 */
export interface RenderPipeline {
  readonly label: string | undefined;
  readonly resource: GPURenderPipeline;
  readonly topology: GPUPrimitiveTopology;
  readonly vertexBuffers: readonly BufferHandle[];
  readonly instanceBuffers: readonly BufferHandle[];
  readonly indexBuffer: BufferHandle | undefined;
  readonly bindGroups: readonly BindGroupHandle[];
}

function isStripTopology(topology: GPUPrimitiveTopology): boolean {
  return topology === 'line-strip' || topology === 'triangle-strip';
}

/**
 * Resolves the index format of a buffer from its element width.
 *
 * @throws {@link RenderContextConstructionError} for widths other than 2 or 4.
 */
export function requireIndexFormat(buffer: ElementBuffer): GPUIndexFormat {
  const format = indexFormatFor(buffer.elementType);
  if (!format) {
    throw new RenderContextConstructionError(
      'invalid-index-format',
      `${describeLabel('buffer', buffer.label)} has ${buffer.elementType.byteSize}-byte elements and cannot be used as an index buffer.`,
    );
  }
  return format;
}

export class RenderPipelineBuilder {
  private vertex: ShaderStageReference | undefined;
  private fragment: ShaderStageReference | undefined;
  private primitiveTopology: GPUPrimitiveTopology | undefined;
  private winding: GPUFrontFace | undefined;
  private cull: GPUCullMode = 'none';
  private polygon: PolygonMode = 'fill';
  private unclipped = false;
  private depth: DepthStencilOptions | undefined;
  private multisampleState: GPUMultisampleState = { count: 1 };
  private readonly colorTargets: GPUColorTargetState[] = [];
  private readonly vertexBuffers: BufferHandle[] = [];
  private readonly instanceBuffers: BufferHandle[] = [];
  private index: BufferHandle | undefined;
  private readonly bindGroups: BindGroupHandle[] = [];
  private readonly seal = new BuilderSeal('Render pipeline builder');

  constructor(
    private readonly state: ResourceState,
    private readonly label?: string,
  ) {}

  vertexShader(shader: ShaderHandle, entryPoint?: string): this {
    this.vertex = { shader, entryPoint };
    return this;
  }

  fragmentShader(shader: ShaderHandle, entryPoint?: string): this {
    this.fragment = { shader, entryPoint };
    return this;
  }

  topology(topology: GPUPrimitiveTopology): this {
    this.primitiveTopology = topology;
    return this;
  }

  frontFace(frontFace: GPUFrontFace): this {
    this.winding = frontFace;
    return this;
  }

  /** @defaultValue `'none'` */
  cullMode(cullMode: GPUCullMode): this {
    this.cull = cullMode;
    return this;
  }

  /** @defaultValue `'fill'` */
  polygonMode(mode: PolygonMode): this {
    this.polygon = mode;
    return this;
  }

  unclippedDepth(enabled = true): this {
    this.unclipped = enabled;
    return this;
  }

  depthStencil(options: DepthStencilOptions): this {
    this.depth = options;
    return this;
  }

  multisample(count: number, mask?: number, alphaToCoverageEnabled = false): this {
    this.multisampleState = { count, mask, alphaToCoverageEnabled };
    return this;
  }

  /** Without any, a fragment stage writes one target in the surface format. */
  addColorTarget(format: GPUTextureFormat, blend?: GPUBlendState, writeMask?: number): this {
    this.colorTargets.push({ format, blend, writeMask });
    return this;
  }

  addVertexBuffer(buffer: BufferHandle): this {
    this.vertexBuffers.push(buffer);
    return this;
  }

  /** Instance buffers occupy the vertex slots after every vertex buffer. */
  addInstanceBuffer(buffer: BufferHandle): this {
    this.instanceBuffers.push(buffer);
    return this;
  }

  indexBuffer(buffer: BufferHandle): this {
    this.index = buffer;
    return this;
  }

  /** Bound at the slot matching the order of the calls. */
  addBindGroup(bindGroup: BindGroupHandle): this {
    this.bindGroups.push(bindGroup);
    return this;
  }

  build(): RenderPipelineHandle {
    this.seal.seal();
    const usage = describeLabel('render pipeline', this.label);
    const vertex = this.vertex;
    const topology = this.primitiveTopology;
    const frontFace = this.winding;
    if (!vertex) {
      throw missingField(usage, 'a vertex shader');
    }
    if (!topology) {
      throw missingField(usage, 'a primitive topology');
    }
    if (!frontFace) {
      throw missingField(usage, 'a front face winding');
    }
    if (this.polygon !== 'fill') {
      throw new RenderContextConstructionError(
        'unsupported-polygon-mode',
        `${usage} requests polygon mode '${this.polygon}'; only 'fill' can be rasterized.`,
      );
    }

    const { shaders, buffers, bindGroups, device } = this.state;
    const bindGroupLayouts = this.bindGroups.map(
      (handle) => bindGroups.require(handle, usage).layout,
    );
    const vertexLayouts = [
      ...this.vertexBuffers.map((handle) =>
        requireLayout(buffers.require(handle, usage), 'vertex', usage),
      ),
      ...this.instanceBuffers.map((handle) =>
        requireLayout(buffers.require(handle, usage), 'instance', usage),
      ),
    ];
    const indexFormat = this.index
      ? requireIndexFormat(buffers.require(this.index, usage))
      : undefined;

    const fragment = this.fragment;
    const vertexModule = shaders.require(vertex.shader, usage).module;
    const fragmentState: GPUFragmentState | undefined = fragment
      ? {
          module: shaders.require(fragment.shader, usage).module,
          entryPoint: fragment.entryPoint,
          targets:
            this.colorTargets.length > 0
              ? [...this.colorTargets]
              : [{ format: this.state.surfaceFormat }],
        }
      : undefined;
    const resource = device.createRenderPipeline({
      label: this.label,
      layout: device.createPipelineLayout({ label: this.label, bindGroupLayouts }),
      vertex: {
        module: vertexModule,
        entryPoint: vertex.entryPoint,
        buffers: vertexLayouts,
      },
      fragment: fragmentState,
      primitive: {
        topology,
        frontFace,
        cullMode: this.cull,
        unclippedDepth: this.unclipped,
        stripIndexFormat: isStripTopology(topology) ? indexFormat : undefined,
      },
      depthStencil: this.depth ? depthStencilState(this.depth) : undefined,
      multisample: this.multisampleState,
    });

    return this.state.renderPipelines.add(
      Object.freeze({
        label: this.label,
        resource,
        topology,
        vertexBuffers: Object.freeze([...this.vertexBuffers]),
        instanceBuffers: Object.freeze([...this.instanceBuffers]),
        indexBuffer: this.index,
        bindGroups: Object.freeze([...this.bindGroups]),
      }),
    );
  }
}

function missingField(usage: string, field: string): RenderContextConstructionError {
  return new RenderContextConstructionError('missing-field', `${usage} is missing ${field}.`);
}

function requireLayout(
  buffer: ElementBuffer,
  role: 'vertex' | 'instance',
  usage: string,
): GPUVertexBufferLayout {
  const layout = role === 'vertex' ? buffer.vertexLayout : buffer.instanceLayout;
  if (!layout) {
    throw new RenderContextConstructionError(
      'missing-vertex-layout',
      `${describeLabel('buffer', buffer.label)} is attached to ${usage} as ${role} data but carries no ${role} layout; build it with ${role}() and an element type with attributes.`,
    );
  }
  return layout;
}

function depthStencilState(options: DepthStencilOptions): GPUDepthStencilState {
  return {
    format: options.format,
    depthWriteEnabled: options.depthWriteEnabled ?? true,
    depthCompare: options.depthCompare ?? 'less',
    stencilFront: options.stencilFront,
    stencilBack: options.stencilBack,
    stencilReadMask: options.stencilReadMask,
    stencilWriteMask: options.stencilWriteMask,
    depthBias: options.depthBias ?? 0,
    depthBiasSlopeScale: options.depthBiasSlopeScale ?? 0,
    depthBiasClamp: options.depthBiasClamp ?? 0,
  };
}

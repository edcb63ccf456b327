import { BuilderSeal, type ResourceState } from './context-state.js';
import { describeLabel } from './errors.js';
import type { Handle } from './handle.js';
import type { RenderPipelineHandle } from './render-pipeline.js';
import { PRESENTATION_TARGET, type TextureHandle, isPresentationTarget } from './texture.js';

export type RenderPassHandle = Handle<RenderPass>;

export interface ColorAttachment {
  readonly texture: TextureHandle;
  /** Clear colour; the previous contents are kept when omitted. */
  readonly clear: GPUColor | undefined;
  readonly store: boolean;
}

export interface AspectOperations<TClear> {
  /** The previous contents are kept when omitted. */
  readonly clear?: TClear;
  readonly store: boolean;
}

export interface DepthStencilAttachment {
  readonly texture: TextureHandle;
  readonly depth: AspectOperations<number> | undefined;
  readonly stencil: AspectOperations<number> | undefined;
}

/**
 * Output attachments plus the pipelines drawn into them, in order.
 */
export class RenderPass {
  private order: readonly RenderPipelineHandle[];

  constructor(
    readonly label: string | undefined,
    readonly colorAttachments: readonly ColorAttachment[],
    readonly depthStencilAttachment: DepthStencilAttachment | undefined,
    pipelines: readonly RenderPipelineHandle[],
  ) {
    this.order = pipelines;
  }

  get pipelines(): readonly RenderPipelineHandle[] {
    return this.order;
  }

  /** Replaces the pipeline list wholesale. */
  reorder(pipelines: readonly RenderPipelineHandle[]): void {
    this.order = Object.freeze([...pipelines]);
  }
}

export class RenderPassBuilder {
  private readonly colorAttachments: ColorAttachment[] = [];
  private depthStencil: DepthStencilAttachment | undefined;
  private readonly pipelines: RenderPipelineHandle[] = [];
  private readonly seal = new BuilderSeal('Render pass builder');

  constructor(
    private readonly state: ResourceState,
    private readonly label?: string,
  ) {}

  /**
   * Pass {@link PRESENTATION_TARGET} to draw into the acquired surface texture.
   */
  addColorAttachment(
    texture: TextureHandle,
    options: { readonly clear?: GPUColor; readonly store?: boolean } = {},
  ): this {
    this.colorAttachments.push({ texture, clear: options.clear, store: options.store ?? true });
    return this;
  }

  addDepthStencilAttachment(
    texture: TextureHandle,
    options: {
      readonly depth?: AspectOperations<number>;
      readonly stencil?: AspectOperations<number>;
    } = {},
  ): this {
    this.depthStencil = { texture, depth: options.depth, stencil: options.stencil };
    return this;
  }

  addPipeline(pipeline: RenderPipelineHandle): this {
    this.pipelines.push(pipeline);
    return this;
  }

  /**
   * Registers the pass and appends it to the frame's pass order. With no
   * color attachment the pass draws over the presentation target, keeping
   * its contents.
   */
  build(): RenderPassHandle {
    this.seal.seal();
    const usage = describeLabel('render pass', this.label);
    for (const attachment of this.colorAttachments) {
      if (!isPresentationTarget(attachment.texture)) {
        this.state.textures.require(attachment.texture, usage);
      }
    }
    if (this.depthStencil) {
      this.state.textures.require(this.depthStencil.texture, usage);
    }
    for (const pipeline of this.pipelines) {
      this.state.renderPipelines.require(pipeline, usage);
    }

    const colorAttachments: readonly ColorAttachment[] =
      this.colorAttachments.length > 0
        ? [...this.colorAttachments]
        : [{ texture: PRESENTATION_TARGET, clear: undefined, store: true }];
    const pass = new RenderPass(
      this.label,
      Object.freeze(colorAttachments),
      this.depthStencil,
      Object.freeze([...this.pipelines]),
    );
    const handle = this.state.renderPasses.add(pass);
    this.state.passOrder.push({ kind: 'render', handle });
    return handle;
  }
}

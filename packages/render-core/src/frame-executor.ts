import type { ElementBuffer } from './buffer.js';
import type { ComputePass } from './compute-pass.js';
import type { ResourceState } from './context-state.js';
import { RenderContextConstructionError, SurfaceError, describeLabel } from './errors.js';
import type { RenderPass } from './render-pass.js';
import { type RenderPipeline, requireIndexFormat } from './render-pipeline.js';
import type { PresentationSurface } from './surface.js';
import { telemetry } from './telemetry.js';
import { isPresentationTarget } from './texture.js';

export type FrameResult =
  | { readonly status: 'presented' }
  | { readonly status: 'reconfigured'; readonly reason: 'lost' | 'out-of-memory' }
  | { readonly status: 'skipped'; readonly reason: 'timeout' }
  | { readonly status: 'fatal'; readonly error: SurfaceError };

export interface FrameTarget {
  readonly surface: PresentationSurface;
  /** Called for a lost or out-of-memory surface before the frame is dropped. */
  reconfigure(): void;
}

interface PlannedDraw {
  readonly pipeline: GPURenderPipeline;
  readonly bindGroups: readonly GPUBindGroup[];
  readonly vertexBuffers: readonly GPUBuffer[];
  readonly index: { readonly buffer: GPUBuffer; readonly format: GPUIndexFormat } | undefined;
  readonly count: number;
  readonly instanceCount: number;
}

interface PlannedColorAttachment {
  /** `undefined` stands for the surface view acquired this frame. */
  readonly view: GPUTextureView | undefined;
  readonly clear: GPUColor | undefined;
  readonly store: boolean;
}

interface PlannedDispatch {
  readonly pipeline: GPUComputePipeline;
  readonly bindGroups: readonly GPUBindGroup[];
  readonly workgroups: readonly [number, number, number];
}

type PlannedPass =
  | {
      readonly kind: 'render';
      readonly label: string | undefined;
      readonly colorAttachments: readonly PlannedColorAttachment[];
      readonly depthStencilAttachment: GPURenderPassDepthStencilAttachment | undefined;
      readonly draws: readonly PlannedDraw[];
    }
  | {
      readonly kind: 'compute';
      readonly label: string | undefined;
      readonly dispatches: readonly PlannedDispatch[];
    };

/**
 * Renders one frame: acquire the surface texture, record every scheduled pass
 * into one encoder, submit and present. Nothing is allocated here.
 *
 * Acquisition failures come back as a classified {@link FrameResult}. Every
 * handle and draw is resolved before recording starts, so construction misuse
 * throws without a command being recorded.
 */
export function executeFrame(state: ResourceState, target: FrameTarget): FrameResult {
  let surfaceTexture: GPUTexture;
  try {
    surfaceTexture = target.surface.acquireTexture();
  } catch (error) {
    if (!(error instanceof SurfaceError)) {
      throw error;
    }
    return classifySurfaceError(error, target);
  }

  const plan = planFrame(state);
  const surfaceView = surfaceTexture.createView();
  const encoder = state.device.createCommandEncoder({ label: state.config.label });
  for (const pass of plan) {
    if (pass.kind === 'render') {
      recordRenderPass(encoder, pass, surfaceView);
    } else {
      recordComputePass(encoder, pass);
    }
  }

  state.device.queue.submit([encoder.finish()]);
  target.surface.present();
  telemetry.recordTick();
  return { status: 'presented' };
}

function classifySurfaceError(error: SurfaceError, target: FrameTarget): FrameResult {
  switch (error.reason) {
    case 'lost':
    case 'out-of-memory':
      target.reconfigure();
      telemetry.recordWarning('SurfaceReconfigured', { reason: error.reason });
      return { status: 'reconfigured', reason: error.reason };
    case 'timeout':
      telemetry.recordWarning('FrameSkipped', { reason: error.reason });
      return { status: 'skipped', reason: error.reason };
    case 'outdated':
      telemetry.recordError('SurfaceOutdated', { message: error.message });
      return { status: 'fatal', error };
  }
}

/**
 * Resolves every scheduled pass against the registries.
 */
function planFrame(state: ResourceState): readonly PlannedPass[] {
  return state.passOrder.map((scheduled): PlannedPass => {
    if (scheduled.kind === 'render') {
      return planRenderPass(state, state.renderPasses.require(scheduled.handle, 'frame execution'));
    }
    return planComputePass(
      state,
      state.computePasses.require(scheduled.handle, 'frame execution'),
    );
  });
}

function planRenderPass(state: ResourceState, pass: RenderPass): PlannedPass {
  const usage = describeLabel('render pass', pass.label);
  return {
    kind: 'render',
    label: pass.label,
    colorAttachments: pass.colorAttachments.map((attachment) => ({
      view: isPresentationTarget(attachment.texture)
        ? undefined
        : state.textures.require(attachment.texture, usage).view,
      clear: attachment.clear,
      store: attachment.store,
    })),
    depthStencilAttachment: planDepthStencil(state, pass, usage),
    draws: pass.pipelines.map((handle) =>
      planDraw(state, state.renderPipelines.require(handle, usage)),
    ),
  };
}

function planDepthStencil(
  state: ResourceState,
  pass: RenderPass,
  usage: string,
): GPURenderPassDepthStencilAttachment | undefined {
  const attachment = pass.depthStencilAttachment;
  if (!attachment) {
    return undefined;
  }
  const descriptor: GPURenderPassDepthStencilAttachment = {
    view: state.textures.require(attachment.texture, usage).view,
  };
  if (attachment.depth) {
    descriptor.depthLoadOp = attachment.depth.clear === undefined ? 'load' : 'clear';
    descriptor.depthClearValue = attachment.depth.clear;
    descriptor.depthStoreOp = attachment.depth.store ? 'store' : 'discard';
  }
  if (attachment.stencil) {
    descriptor.stencilLoadOp = attachment.stencil.clear === undefined ? 'load' : 'clear';
    descriptor.stencilClearValue = attachment.stencil.clear;
    descriptor.stencilStoreOp = attachment.stencil.store ? 'store' : 'discard';
  }
  return descriptor;
}

function planDraw(state: ResourceState, pipeline: RenderPipeline): PlannedDraw {
  const usage = describeLabel('render pipeline', pipeline.label);
  const bindGroups = pipeline.bindGroups.map(
    (handle) => state.bindGroups.require(handle, usage).resource,
  );
  const vertexBuffers = pipeline.vertexBuffers.map((handle) =>
    state.buffers.require(handle, usage),
  );
  const instanceBuffers = pipeline.instanceBuffers.map((handle) =>
    state.buffers.require(handle, usage),
  );
  const slots = [...vertexBuffers, ...instanceBuffers].map((buffer) => buffer.resource);
  const instanceCount = sharedLength(instanceBuffers, 'instance', usage) ?? 1;

  if (pipeline.indexBuffer) {
    const indexBuffer = state.buffers.require(pipeline.indexBuffer, usage);
    const format = requireIndexFormat(indexBuffer);
    sharedLength(vertexBuffers, 'vertex', usage);
    return {
      pipeline: pipeline.resource,
      bindGroups,
      vertexBuffers: slots,
      index: { buffer: indexBuffer.resource, format },
      count: indexBuffer.length,
      instanceCount,
    };
  }

  return {
    pipeline: pipeline.resource,
    bindGroups,
    vertexBuffers: slots,
    index: undefined,
    count:
      vertexBuffers.length === 0 ? 1 : Math.min(...vertexBuffers.map((buffer) => buffer.length)),
    instanceCount,
  };
}

/**
 * The element count every buffer in `buffers` shares, or `undefined` when
 * there are none.
 */
function sharedLength(
  buffers: readonly ElementBuffer[],
  role: 'vertex' | 'instance',
  usage: string,
): number | undefined {
  const [first, ...rest] = buffers;
  if (!first) {
    return undefined;
  }
  if (rest.some((buffer) => buffer.length !== first.length)) {
    throw new RenderContextConstructionError(
      'element-count-mismatch',
      `${usage} draws ${role} buffers of differing lengths: ${buffers
        .map((buffer) => `${describeLabel('buffer', buffer.label)} has ${buffer.length}`)
        .join(', ')}.`,
    );
  }
  return first.length;
}

function planComputePass(state: ResourceState, pass: ComputePass): PlannedPass {
  const usage = describeLabel('compute pass', pass.label);
  return {
    kind: 'compute',
    label: pass.label,
    dispatches: pass.pipelines.map((handle) => {
      const pipeline = state.computePipelines.require(handle, usage);
      return {
        pipeline: pipeline.resource,
        bindGroups: pipeline.bindGroups.map(
          (bindGroup) => state.bindGroups.require(bindGroup, usage).resource,
        ),
        workgroups: pipeline.workgroups,
      };
    }),
  };
}

function recordRenderPass(
  encoder: GPUCommandEncoder,
  pass: Extract<PlannedPass, { kind: 'render' }>,
  surfaceView: GPUTextureView,
): void {
  const renderPass = encoder.beginRenderPass({
    label: pass.label,
    colorAttachments: pass.colorAttachments.map(
      (attachment): GPURenderPassColorAttachment => ({
        view: attachment.view ?? surfaceView,
        loadOp: attachment.clear === undefined ? 'load' : 'clear',
        clearValue: attachment.clear,
        storeOp: attachment.store ? 'store' : 'discard',
      }),
    ),
    depthStencilAttachment: pass.depthStencilAttachment,
  });

  for (const draw of pass.draws) {
    renderPass.setPipeline(draw.pipeline);
    draw.bindGroups.forEach((group, slot) => renderPass.setBindGroup(slot, group));
    draw.vertexBuffers.forEach((buffer, slot) => renderPass.setVertexBuffer(slot, buffer));
    if (draw.index) {
      renderPass.setIndexBuffer(draw.index.buffer, draw.index.format);
      renderPass.drawIndexed(draw.count, draw.instanceCount);
    } else {
      renderPass.draw(draw.count, draw.instanceCount);
    }
  }
  renderPass.end();
}

function recordComputePass(
  encoder: GPUCommandEncoder,
  pass: Extract<PlannedPass, { kind: 'compute' }>,
): void {
  const computePass = encoder.beginComputePass({ label: pass.label });
  for (const dispatch of pass.dispatches) {
    computePass.setPipeline(dispatch.pipeline);
    dispatch.bindGroups.forEach((group, slot) => computePass.setBindGroup(slot, group));
    const [x, y, z] = dispatch.workgroups;
    computePass.dispatchWorkgroups(x, y, z);
  }
  computePass.end();
}

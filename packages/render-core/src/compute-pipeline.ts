import { z } from 'zod';

import type { BindGroupHandle } from './bind-group.js';
import { BuilderSeal, type ResourceState } from './context-state.js';
import { RenderContextConstructionError, describeLabel } from './errors.js';
import type { Handle } from './handle.js';
import type { ShaderStageReference } from './render-pipeline.js';
import type { ShaderHandle } from './shader.js';

export type ComputePipelineHandle = Handle<ComputePipeline>;

export type WorkgroupCount = readonly [x: number, y: number, z: number];

export interface ComputePipeline {
  readonly label: string | undefined;
  readonly resource: GPUComputePipeline;
  readonly workgroups: WorkgroupCount;
  readonly bindGroups: readonly BindGroupHandle[];
}

const workgroupAxis = z.number().int().nonnegative();
const workgroupCountSchema = z.tuple([workgroupAxis, workgroupAxis, workgroupAxis]);

export class ComputePipelineBuilder {
  private stage: ShaderStageReference | undefined;
  private dispatch: WorkgroupCount | undefined;
  private readonly bindGroups: BindGroupHandle[] = [];
  private readonly seal = new BuilderSeal('Compute pipeline builder');

  constructor(
    private readonly state: ResourceState,
    private readonly label?: string,
  ) {}

  shader(shader: ShaderHandle, entryPoint?: string): this {
    this.stage = { shader, entryPoint };
    return this;
  }

  /** Fixed dispatch size used every frame. */
  workgroups(x: number, y = 1, z = 1): this {
    this.dispatch = [x, y, z];
    return this;
  }

  addBindGroup(bindGroup: BindGroupHandle): this {
    this.bindGroups.push(bindGroup);
    return this;
  }

  build(): ComputePipelineHandle {
    this.seal.seal();
    const usage = describeLabel('compute pipeline', this.label);
    const stage = this.stage;
    if (!stage) {
      throw new RenderContextConstructionError('missing-field', `${usage} is missing a shader.`);
    }
    if (!this.dispatch) {
      throw new RenderContextConstructionError(
        'missing-field',
        `${usage} is missing a workgroup count.`,
      );
    }
    const parsed = workgroupCountSchema.safeParse(this.dispatch);
    if (!parsed.success) {
      throw new RenderContextConstructionError(
        'invalid-dispatch',
        `${usage} has workgroup count [${this.dispatch.join(', ')}]; each axis must be a non-negative integer.`,
      );
    }

    const { device, shaders, bindGroups } = this.state;
    const bindGroupLayouts = this.bindGroups.map(
      (handle) => bindGroups.require(handle, usage).layout,
    );
    const module = shaders.require(stage.shader, usage).module;
    const resource = device.createComputePipeline({
      label: this.label,
      layout: device.createPipelineLayout({ label: this.label, bindGroupLayouts }),
      compute: {
        module,
        entryPoint: stage.entryPoint,
      },
    });

    return this.state.computePipelines.add(
      Object.freeze({
        label: this.label,
        resource,
        workgroups: Object.freeze(parsed.data),
        bindGroups: Object.freeze([...this.bindGroups]),
      }),
    );
  }
}

import type { ComputePipelineHandle } from './compute-pipeline.js';
import { BuilderSeal, type ResourceState } from './context-state.js';
import { describeLabel } from './errors.js';
import type { Handle } from './handle.js';

export type ComputePassHandle = Handle<ComputePass>;

export class ComputePass {
  private order: readonly ComputePipelineHandle[];

  constructor(
    readonly label: string | undefined,
    pipelines: readonly ComputePipelineHandle[],
  ) {
    this.order = pipelines;
  }

  get pipelines(): readonly ComputePipelineHandle[] {
    return this.order;
  }

  reorder(pipelines: readonly ComputePipelineHandle[]): void {
    this.order = Object.freeze([...pipelines]);
  }
}

export class ComputePassBuilder {
  private readonly pipelines: ComputePipelineHandle[] = [];
  private readonly seal = new BuilderSeal('Compute pass builder');

  constructor(
    private readonly state: ResourceState,
    private readonly label?: string,
  ) {}

  addPipeline(pipeline: ComputePipelineHandle): this {
    this.pipelines.push(pipeline);
    return this;
  }

  build(): ComputePassHandle {
    this.seal.seal();
    const usage = describeLabel('compute pass', this.label);
    for (const pipeline of this.pipelines) {
      this.state.computePipelines.require(pipeline, usage);
    }
    const handle = this.state.computePasses.add(
      new ComputePass(this.label, Object.freeze([...this.pipelines])),
    );
    this.state.passOrder.push({ kind: 'compute', handle });
    return handle;
  }
}

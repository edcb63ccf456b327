export type { RenderContextOptions } from './render-context.js';
export { RenderContext, createRenderContext } from './render-context.js';

export type { FrameResult, FrameTarget } from './frame-executor.js';
export { executeFrame } from './frame-executor.js';

export type { RenderDevice, ResourceState, ScheduledPass } from './context-state.js';

export type {
  RenderContextConfig,
  RenderContextConfigInput,
  SurfaceSize,
} from './config.js';
export {
  DEFAULT_RENDER_CONTEXT_CONFIG,
  clampSurfaceSize,
  resolveRenderContextConfig,
} from './config.js';

export type {
  PresentationSurface,
  SurfaceCapabilities,
  SurfaceConfiguration,
} from './surface.js';
export { createSurfaceConfiguration, selectSurfaceFormat } from './surface.js';

export type { Handle } from './handle.js';
export { Registry, handlesEqual } from './handle.js';

export type {
  ElementArray,
  ElementType,
  ElementTypeDefinition,
  VertexAttributeLayout,
} from './element-type.js';
export {
  bgra8unorm,
  defineElementType,
  depth24plus,
  depth32float,
  elements,
  f32,
  i32,
  mat4x4f,
  r32float,
  rgba16float,
  rgba32float,
  rgba8unorm,
  u16,
  u32,
  vec2f,
  vec3f,
  vec4f,
  vertexLayout,
} from './element-type.js';

export type { BufferDescriptor, BufferHandle } from './buffer.js';
export { BufferBuilder, ElementBuffer, indexFormatFor } from './buffer.js';

export type {
  ResolvedExtent,
  TextureDescriptor,
  TextureExtent,
  TextureHandle,
  TextureSizePolicy,
} from './texture.js';
export {
  PRESENTATION_TARGET,
  Texture,
  TextureBuilder,
  isPresentationTarget,
  resolveExtent,
} from './texture.js';

export type { Sampler, SamplerHandle } from './sampler.js';
export { SamplerBuilder } from './sampler.js';

export type { Shader, ShaderCompiler, ShaderHandle } from './shader.js';
export { compileShader, createDeviceShaderCompiler } from './shader.js';

export type {
  BindGroupHandle,
  BindingResourceKind,
  BindingTarget,
  SampledTextureOptions,
  StorageBufferOptions,
  StorageTextureOptions,
} from './bind-group.js';
export { BindGroup, BindGroupBuilder } from './bind-group.js';

export type {
  DepthStencilOptions,
  PolygonMode,
  RenderPipeline,
  RenderPipelineHandle,
  ShaderStageReference,
} from './render-pipeline.js';
export { RenderPipelineBuilder, requireIndexFormat } from './render-pipeline.js';

export type {
  ComputePipeline,
  ComputePipelineHandle,
  WorkgroupCount,
} from './compute-pipeline.js';
export { ComputePipelineBuilder } from './compute-pipeline.js';

export type {
  AspectOperations,
  ColorAttachment,
  DepthStencilAttachment,
  RenderPassHandle,
} from './render-pass.js';
export { RenderPass, RenderPassBuilder } from './render-pass.js';

export type { ComputePassHandle } from './compute-pass.js';
export { ComputePass, ComputePassBuilder } from './compute-pass.js';

export type { ReallocatedResources } from './dependency-cascade.js';
export { recreateDependents } from './dependency-cascade.js';

export type { ConfigIssue, ConstructionErrorCode, SurfaceErrorReason } from './errors.js';
export {
  ElementTypeMismatchError,
  RenderContextConfigError,
  RenderContextConstructionError,
  ShaderCompilationError,
  SurfaceError,
} from './errors.js';

export { BufferUsage, ShaderStage, TextureUsage } from './gpu-flags.js';

export type {
  RenderCounterGroups,
  RenderErrorEvents,
  RenderProgressEvents,
  RenderWarningEvents,
  TelemetryFacade,
} from './telemetry.js';
export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
} from './telemetry.js';

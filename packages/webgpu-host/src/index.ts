export type { CanvasRenderContext, CanvasRenderContextOptions } from './bootstrap.js';
export { createCanvasRenderContext } from './bootstrap.js';

export type { CanvasSurfaceOptions } from './canvas-surface.js';
export { createCanvasSurface, getCanvasPixelSize } from './canvas-surface.js';

export type { GpuDeviceBundle, GpuDeviceRequestOptions } from './device.js';
export { getNavigatorGpu, requestGpuDevice } from './device.js';

export { watchDeviceLoss } from './device-loss.js';

export { WebGpuDeviceLostError, WebGpuNotSupportedError } from './errors.js';

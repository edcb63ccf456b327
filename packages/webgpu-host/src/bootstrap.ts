import {
  type RenderContext,
  type RenderContextOptions,
  createRenderContext,
} from '@kiln/render-core';

import { createCanvasSurface, getCanvasPixelSize } from './canvas-surface.js';
import { type GpuDeviceRequestOptions, requestGpuDevice } from './device.js';
import { watchDeviceLoss } from './device-loss.js';
import { WebGpuNotSupportedError, type WebGpuDeviceLostError } from './errors.js';

export type CanvasRenderContextOptions = GpuDeviceRequestOptions &
  Omit<RenderContextOptions, 'size'> & {
    /** @defaultValue `globalThis.devicePixelRatio`, else 1 */
    readonly devicePixelRatio?: number;
    readonly onDeviceLost?: (error: WebGpuDeviceLostError) => void;
  };

export interface CanvasRenderContext {
  readonly context: RenderContext;
  readonly device: GPUDevice;
  readonly adapter: GPUAdapter;
  /** Resizes the context to the canvas's current client size. */
  resizeToCanvas(devicePixelRatio?: number): void;
  /** Stops device-loss reporting. */
  dispose(): void;
}

/**
 * Acquires a device, wraps `canvas` as the presentation surface and creates a
 * render context sized to the canvas. The browser's preferred canvas format
 * is offered after any preferred formats.
 */
export async function createCanvasRenderContext(
  canvas: HTMLCanvasElement,
  options: CanvasRenderContextOptions = {},
): Promise<CanvasRenderContext> {
  const {
    powerPreference,
    requiredFeatures,
    deviceDescriptor,
    devicePixelRatio,
    onDeviceLost,
    ...contextOptions
  } = options;
  const { gpu, adapter, device } = await requestGpuDevice({
    powerPreference,
    requiredFeatures,
    deviceDescriptor,
  });

  const canvasContext = canvas.getContext('webgpu');
  if (!canvasContext) {
    throw new WebGpuNotSupportedError('Failed to acquire WebGPU canvas context.');
  }

  const preferred = contextOptions.preferredFormats ?? [];
  const canvasFormat = gpu.getPreferredCanvasFormat();
  const surface = createCanvasSurface(canvasContext, {
    device,
    formats: preferred.includes(canvasFormat) ? preferred : [...preferred, canvasFormat],
  });

  const pixelRatio = () => devicePixelRatio ?? globalThis.devicePixelRatio ?? 1;
  const context = createRenderContext(device, surface, {
    ...contextOptions,
    size: getCanvasPixelSize(canvas, pixelRatio()),
  });
  const stopWatching = watchDeviceLoss(device, (error) => onDeviceLost?.(error));

  return {
    context,
    device,
    adapter,
    resizeToCanvas(ratio = pixelRatio()) {
      context.resize(getCanvasPixelSize(canvas, ratio));
    },
    dispose() {
      stopWatching();
    },
  };
}

import {
  type PresentationSurface,
  type SurfaceConfiguration,
  type SurfaceSize,
  SurfaceError,
  type SurfaceErrorReason,
} from '@kiln/render-core';

import { WebGpuNotSupportedError } from './errors.js';

export interface CanvasSurfaceOptions {
  readonly device: GPUDevice;
  /** Formats offered for selection, in order. */
  readonly formats: readonly GPUTextureFormat[];
}

// Exceptions `getCurrentTexture` raises, by DOMException name.
const ACQUIRE_FAILURES: ReadonlyMap<string, SurfaceErrorReason> = new Map<string, SurfaceErrorReason>([
  ['InvalidStateError', 'lost'],
  ['OperationError', 'out-of-memory'],
]);

function errorName(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined;
}

/**
 * Adapts a WebGPU canvas context to the render context's presentation
 * surface. Configuring also sizes the canvas backing store; presenting is
 * left to the browser, which presents when the current task ends.
 */
export function createCanvasSurface(
  context: GPUCanvasContext,
  options: CanvasSurfaceOptions,
): PresentationSurface {
  const formats = Object.freeze([...options.formats]);

  return {
    getCapabilities() {
      return { formats };
    },

    configure(configuration: SurfaceConfiguration) {
      const canvas = context.canvas;
      if (canvas.width !== configuration.width) {
        canvas.width = configuration.width;
      }
      if (canvas.height !== configuration.height) {
        canvas.height = configuration.height;
      }
      try {
        context.configure({
          device: options.device,
          format: configuration.format,
          usage: configuration.usage,
          alphaMode: configuration.alphaMode,
        });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new WebGpuNotSupportedError(
          `Failed to configure WebGPU canvas context (format: ${configuration.format})${
            message ? `: ${message}` : ''
          }`,
        );
      }
    },

    acquireTexture() {
      try {
        return context.getCurrentTexture();
      } catch (error: unknown) {
        const name = errorName(error);
        const reason = name === undefined ? undefined : ACQUIRE_FAILURES.get(name);
        if (reason === undefined) {
          throw error;
        }
        const detail = error instanceof Error ? error.message : '';
        throw new SurfaceError(reason, `Failed to acquire canvas texture${detail ? `: ${detail}` : ''}`);
      }
    },

    present() {},
  };
}

/**
 * Backing-store size of a canvas at `devicePixelRatio`, each side at least 1.
 */
export function getCanvasPixelSize(
  canvas: Pick<HTMLCanvasElement, 'clientWidth' | 'clientHeight'>,
  devicePixelRatio: number,
): SurfaceSize {
  const width = Math.max(1, Math.floor(canvas.clientWidth * devicePixelRatio));
  const height = Math.max(1, Math.floor(canvas.clientHeight * devicePixelRatio));
  return { width, height };
}

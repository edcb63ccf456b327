import type { SurfaceSize } from './config.js';
import { RenderContextConstructionError } from './errors.js';

export interface SurfaceCapabilities {
  readonly formats: readonly GPUTextureFormat[];
}

export interface SurfaceConfiguration {
  readonly format: GPUTextureFormat;
  readonly width: number;
  readonly height: number;
  readonly usage: number;
  readonly alphaMode: GPUCanvasAlphaMode;
}

/**
 * The presentation target the render context draws into once per frame.
 *
 * `acquireTexture` throws a `SurfaceError` when the current target cannot be
 * obtained; any other exception is treated as a bug and propagates.
 */
export interface PresentationSurface {
  getCapabilities(): SurfaceCapabilities;
  configure(configuration: SurfaceConfiguration): void;
  acquireTexture(): GPUTexture;
  present(): void;
}

function isSrgbFormat(format: GPUTextureFormat): boolean {
  return format.endsWith('-srgb');
}

/**
 * Picks the first preferred format the surface supports, else its first sRGB
 * format, else whatever it lists first.
 */
export function selectSurfaceFormat(
  capabilities: SurfaceCapabilities,
  preferredFormats: readonly GPUTextureFormat[],
): GPUTextureFormat {
  const supported = capabilities.formats;
  const fallback = supported[0];
  if (fallback === undefined) {
    throw new RenderContextConstructionError(
      'unsupported-surface',
      'Presentation surface reported no supported texture formats.',
    );
  }

  for (const preferred of preferredFormats) {
    if (supported.includes(preferred)) {
      return preferred;
    }
  }

  return supported.find(isSrgbFormat) ?? fallback;
}

export function createSurfaceConfiguration(options: {
  format: GPUTextureFormat;
  size: SurfaceSize;
  usage: number;
  alphaMode: GPUCanvasAlphaMode;
}): SurfaceConfiguration {
  return Object.freeze({
    format: options.format,
    width: options.size.width,
    height: options.size.height,
    usage: options.usage,
    alphaMode: options.alphaMode,
  });
}

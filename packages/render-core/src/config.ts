import { z } from 'zod';

import { RenderContextConfigError } from './errors.js';
import { TextureUsage } from './gpu-flags.js';

export interface SurfaceSize {
  readonly width: number;
  readonly height: number;
}

export interface RenderContextConfig {
  readonly label: string | undefined;
  /**
   * Initial presentation surface size in physical pixels. Each side is
   * floored and clamped to at least 1.
   */
  readonly size: SurfaceSize;
  /**
   * Formats to try, in order, before falling back to the first sRGB format
   * the surface reports.
   *
   * @defaultValue `[]`
   */
  readonly preferredFormats: readonly GPUTextureFormat[];
  /** @defaultValue `'opaque'` */
  readonly alphaMode: GPUCanvasAlphaMode;
  /** @defaultValue `TextureUsage.RENDER_ATTACHMENT` */
  readonly surfaceUsage: number;
  /**
   * Alignment, in bytes, every element bound as a uniform or storage buffer
   * must be a multiple of.
   *
   * @defaultValue `8`
   */
  readonly mapAlignment: number;
}

export type RenderContextConfigInput = Readonly<{
  readonly label?: string;
  readonly size: SurfaceSize;
  readonly preferredFormats?: readonly GPUTextureFormat[];
  readonly alphaMode?: GPUCanvasAlphaMode;
  readonly surfaceUsage?: number;
  readonly mapAlignment?: number;
}>;

export const DEFAULT_RENDER_CONTEXT_CONFIG: Omit<RenderContextConfig, 'label' | 'size'> =
  Object.freeze({
    preferredFormats: Object.freeze([]),
    alphaMode: 'opaque',
    surfaceUsage: TextureUsage.RENDER_ATTACHMENT,
    mapAlignment: 8,
  });

function isPowerOfTwo(value: number): boolean {
  return value > 0 && (value & (value - 1)) === 0;
}

const pixelExtentSchema = z
  .number()
  .finite({ message: 'Surface dimensions must be finite numbers.' })
  .transform((value) => Math.max(1, Math.floor(value)));

const textureFormatSchema = z.custom<GPUTextureFormat>(
  (value) => typeof value === 'string' && value.length > 0,
  { message: 'Texture formats must be non-empty strings.' },
);

const renderContextConfigSchema = z
  .object({
    label: z.string().trim().min(1).optional(),
    size: z.object({
      width: pixelExtentSchema,
      height: pixelExtentSchema,
    }),
    preferredFormats: z
      .array(textureFormatSchema)
      .default([...DEFAULT_RENDER_CONTEXT_CONFIG.preferredFormats]),
    alphaMode: z
      .enum(['opaque', 'premultiplied'])
      .default(DEFAULT_RENDER_CONTEXT_CONFIG.alphaMode),
    surfaceUsage: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_RENDER_CONTEXT_CONFIG.surfaceUsage),
    mapAlignment: z
      .number()
      .int()
      .refine(isPowerOfTwo, { message: 'mapAlignment must be a power of two.' })
      .default(DEFAULT_RENDER_CONTEXT_CONFIG.mapAlignment),
  })
  .strict();

/**
 * Validates caller-supplied options and fills in defaults.
 *
 * @throws {@link RenderContextConfigError} listing every rejected field.
 */
export function resolveRenderContextConfig(input: unknown): RenderContextConfig {
  const result = renderContextConfigSchema.safeParse(input);
  if (!result.success) {
    throw new RenderContextConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const parsed = result.data;
  return Object.freeze({
    label: parsed.label,
    size: Object.freeze({ width: parsed.size.width, height: parsed.size.height }),
    preferredFormats: Object.freeze([...parsed.preferredFormats]),
    alphaMode: parsed.alphaMode,
    surfaceUsage: parsed.surfaceUsage,
    mapAlignment: parsed.mapAlignment,
  });
}

export function clampSurfaceSize(size: SurfaceSize): SurfaceSize {
  return {
    width: Math.max(1, Math.floor(Number.isFinite(size.width) ? size.width : 1)),
    height: Math.max(1, Math.floor(Number.isFinite(size.height) ? size.height : 1)),
  };
}

import { readFileSync } from 'node:fs';

import type { RenderContext } from './render-context.js';
import type { ShaderHandle } from './shader.js';

/**
 * Node-only helpers, published as `@kiln/render-core/node` so the main entry
 * point stays free of Node built-ins.
 */

export function readShaderSource(path: string): string {
  return readFileSync(path, 'utf8');
}

/** Reads UTF-8 WGSL from `path` and registers it on `context`. */
export function registerShaderFile(
  context: RenderContext,
  path: string,
  label: string = path,
): ShaderHandle {
  return context.registerShader(readShaderSource(path), label);
}

import type { RenderDevice } from './context-state.js';
import { ShaderCompilationError } from './errors.js';
import type { Handle } from './handle.js';

/**
 * Turns WGSL text into a shader module. Throwing signals a compile failure.
 */
export type ShaderCompiler = (source: string, label: string | undefined) => GPUShaderModule;

export interface Shader {
  readonly label: string | undefined;
  readonly source: string;
  readonly module: GPUShaderModule;
}

export type ShaderHandle = Handle<Shader>;

export function createDeviceShaderCompiler(device: Pick<RenderDevice, 'createShaderModule'>): ShaderCompiler {
  return (source, label) => device.createShaderModule({ label, code: source });
}

export function compileShader(
  compiler: ShaderCompiler,
  source: string,
  label: string | undefined,
): Shader {
  let module: GPUShaderModule;
  try {
    module = compiler(source, label);
  } catch (error) {
    throw new ShaderCompilationError(label, error);
  }
  return Object.freeze({ label, source, module });
}

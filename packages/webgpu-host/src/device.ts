import { WebGpuNotSupportedError } from './errors.js';

export interface GpuDeviceRequestOptions {
  readonly powerPreference?: GPUPowerPreference;
  readonly requiredFeatures?: readonly GPUFeatureName[];
  readonly deviceDescriptor?: GPUDeviceDescriptor;
}

export interface GpuDeviceBundle {
  readonly gpu: GPU;
  readonly adapter: GPUAdapter;
  readonly device: GPUDevice;
}

export function getNavigatorGpu(): GPU {
  const maybeNavigator = globalThis.navigator as Navigator | undefined;
  if (!maybeNavigator?.gpu) {
    throw new WebGpuNotSupportedError('WebGPU is not available in this environment.');
  }
  return maybeNavigator.gpu;
}

/**
 * Requests an adapter and a device from `navigator.gpu`, failing with
 * {@link WebGpuNotSupportedError} when either is unavailable or the adapter
 * lacks a required feature.
 */
export async function requestGpuDevice(
  options: GpuDeviceRequestOptions = {},
): Promise<GpuDeviceBundle> {
  const gpu = getNavigatorGpu();

  const adapter = await gpu.requestAdapter({ powerPreference: options.powerPreference });
  if (!adapter) {
    throw new WebGpuNotSupportedError('WebGPU adapter not found.');
  }

  const requiredFeatures = options.requiredFeatures ?? [];
  for (const feature of requiredFeatures) {
    if (!adapter.features.has(feature)) {
      throw new WebGpuNotSupportedError(`Required WebGPU feature not supported: ${feature}`);
    }
  }

  const device = await adapter.requestDevice({
    ...options.deviceDescriptor,
    requiredFeatures: requiredFeatures.length
      ? Array.from(requiredFeatures)
      : options.deviceDescriptor?.requiredFeatures,
  });

  return { gpu, adapter, device };
}

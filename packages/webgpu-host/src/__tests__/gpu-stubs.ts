import { type Mock, vi } from 'vitest';

// Stand-ins for the browser WebGPU entry points: navigator.gpu, an adapter,
// a device exposing only `lost`, and a canvas with a WebGPU context.

const originalNavigatorDescriptor = Object.getOwnPropertyDescriptor(globalThis, 'navigator');

export function setNavigator(value: unknown): void {
  Object.defineProperty(globalThis, 'navigator', {
    value,
    configurable: true,
    enumerable: true,
    writable: true,
  });
}

export function restoreNavigator(): void {
  if (originalNavigatorDescriptor) {
    Object.defineProperty(globalThis, 'navigator', originalNavigatorDescriptor);
  } else {
    delete (globalThis as unknown as { navigator?: unknown }).navigator;
  }
}

export async function flushMicrotasks(maxTurns = 10): Promise<void> {
  for (let i = 0; i < maxTurns; i += 1) {
    await Promise.resolve();
  }
}

export interface DeviceStub {
  readonly device: GPUDevice;
  resolveDeviceLost(info: { message: string; reason: GPUDeviceLostReason }): void;
}

export function createDeviceStub(): DeviceStub {
  let resolveDeviceLost: (info: GPUDeviceLostInfo) => void = () => {};
  const lost = new Promise<GPUDeviceLostInfo>((resolve) => {
    resolveDeviceLost = resolve;
  });
  return {
    device: { lost } as unknown as GPUDevice,
    resolveDeviceLost: (info) => resolveDeviceLost(info as unknown as GPUDeviceLostInfo),
  };
}

export function createGpuStub(options: {
  readonly device: GPUDevice;
  readonly adapterFeatures?: readonly string[];
  readonly adapterMissing?: boolean;
  readonly preferredCanvasFormat?: GPUTextureFormat;
}) {
  const adapter = {
    features: new Set<string>(options.adapterFeatures ?? []),
    requestDevice: vi.fn(async (_descriptor?: GPUDeviceDescriptor) => options.device),
  };
  const gpu = {
    requestAdapter: vi.fn(async (_options?: GPURequestAdapterOptions) =>
      options.adapterMissing ? null : adapter,
    ),
    getPreferredCanvasFormat: vi.fn(() => options.preferredCanvasFormat ?? 'bgra8unorm'),
  };
  return { gpu, adapter };
}

export interface CanvasStub {
  readonly canvas: HTMLCanvasElement;
  /** The canvas object itself, with its sizes writable. */
  readonly state: { width: number; height: number; clientWidth: number; clientHeight: number };
  readonly context: GPUCanvasContext;
  readonly configure: Mock;
  readonly getCurrentTexture: Mock;
}

export function createCanvasStub(size: { clientWidth: number; clientHeight: number }): CanvasStub {
  const canvasState = { width: 300, height: 150, ...size };
  const configure = vi.fn();
  const getCurrentTexture = vi.fn(() => ({ label: 'current' }));
  const context = { canvas: canvasState, configure, getCurrentTexture };
  const canvas = Object.assign(canvasState, {
    getContext: vi.fn((kind: string) => (kind === 'webgpu' ? context : null)),
  });
  return {
    canvas: canvas as unknown as HTMLCanvasElement,
    state: canvasState,
    context: context as unknown as GPUCanvasContext,
    configure,
    getCurrentTexture,
  };
}

import { telemetry } from '@kiln/render-core';

import { WebGpuDeviceLostError } from './errors.js';

/**
 * Reports the loss of `device` once, as a {@link WebGpuDeviceLostError}.
 *
 * @returns a function that stops the report from being delivered.
 */
export function watchDeviceLoss(
  device: Pick<GPUDevice, 'lost'>,
  onLost: (error: WebGpuDeviceLostError) => void,
): () => void {
  let watching = true;

  void device.lost.then((info) => {
    if (!watching) {
      return;
    }
    telemetry.recordError('DeviceLost', { reason: info.reason, message: info.message });
    try {
      onLost(
        new WebGpuDeviceLostError(
          `WebGPU device lost${info.message ? `: ${info.message}` : ''}`,
          info.reason,
        ),
      );
    } catch (error: unknown) {
      telemetry.recordError('DeviceLostHandlerFailed', {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return () => {
    watching = false;
  };
}

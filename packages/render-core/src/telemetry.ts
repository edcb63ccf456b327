/* eslint-disable no-console */

/** Payloads of the error events, keyed by event name. */
export interface RenderErrorEvents {
  readonly SurfaceOutdated: { readonly message: string };
  readonly DeviceLost: { readonly reason: GPUDeviceLostReason; readonly message: string };
  readonly DeviceLostHandlerFailed: { readonly message: string };
}

export interface RenderWarningEvents {
  readonly SurfaceReconfigured: { readonly reason: 'lost' | 'out-of-memory' };
  readonly FrameSkipped: { readonly reason: 'timeout' };
}

/** Structural changes: every reallocation and the bind groups it rebuilt. */
export interface RenderProgressEvents {
  readonly BufferReallocated: {
    readonly label: string | undefined;
    readonly previousCapacity: number;
    readonly capacity: number;
  };
  readonly TextureReallocated: {
    readonly label: string | undefined;
    readonly width: number;
    readonly height: number;
    readonly depthOrArrayLayers: number;
  };
  readonly BindGroupsRecreated: {
    readonly count: number;
    readonly labels: readonly (string | undefined)[];
  };
}

export interface RenderCounterGroups {
  readonly ResizeCascade: {
    readonly texturesReallocated: number;
    readonly bindGroupsRecreated: number;
  };
}

/**
 * Sink for the render context's structured events.
 *
 * Events are coarse: reallocations, dependency cascades, surface
 * reconfiguration and skipped frames. Nothing is recorded per draw call.
 */
export interface TelemetryFacade {
  recordError<E extends keyof RenderErrorEvents>(event: E, data: RenderErrorEvents[E]): void;
  recordWarning<E extends keyof RenderWarningEvents>(event: E, data: RenderWarningEvents[E]): void;
  recordProgress<E extends keyof RenderProgressEvents>(
    event: E,
    data: RenderProgressEvents[E],
  ): void;
  recordCounters<G extends keyof RenderCounterGroups>(
    group: G,
    counters: RenderCounterGroups[G],
  ): void;
  /** Once per presented frame. */
  recordTick(): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[render:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[render:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[render:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[render:counters] ${group}`, counters);
  },
  recordTick() {
    console.debug('[render:frame]');
  },
};

/**
 * Discards every event. Installed until {@link setTelemetry} is called.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordTick() {},
};

/**
 * Logs every event to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@kiln/render-core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(() => activeTelemetry.recordError(event, data));
  },
  recordWarning(event, data) {
    invokeSafely(() => activeTelemetry.recordWarning(event, data));
  },
  recordProgress(event, data) {
    invokeSafely(() => activeTelemetry.recordProgress(event, data));
  },
  recordCounters(group, counters) {
    invokeSafely(() => activeTelemetry.recordCounters(group, counters));
  },
  recordTick() {
    invokeSafely(() => activeTelemetry.recordTick());
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

// A failing sink must never abort a frame or a reallocation cascade.
function invokeSafely(record: () => void): void {
  try {
    record();
  } catch (error) {
    console.error('[render] telemetry invocation failed', error);
  }
}

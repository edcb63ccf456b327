import { afterEach, describe, expect, it, vi } from 'vitest';

import type { TelemetryFacade } from './telemetry.js';
import {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  telemetry,
} from './telemetry.js';

function createRecordingFacade(): TelemetryFacade & { history: string[] } {
  const history: string[] = [];
  return {
    history,
    recordError: (event) => history.push(`error:${event}`),
    recordWarning: (event) => history.push(`warning:${event}`),
    recordProgress: (event) => history.push(`progress:${event}`),
    recordCounters: (group) => history.push(`counters:${group}`),
    recordTick: () => history.push('tick'),
  };
}

describe('telemetry facade', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('delegates every event kind to the installed facade', () => {
    const facade = createRecordingFacade();
    setTelemetry(facade);

    telemetry.recordError('SurfaceOutdated', { message: 'surface outdated' });
    telemetry.recordWarning('FrameSkipped', { reason: 'timeout' });
    telemetry.recordProgress('BufferReallocated', {
      label: 'positions',
      previousCapacity: 32,
      capacity: 40,
    });
    telemetry.recordCounters('ResizeCascade', { texturesReallocated: 1, bindGroupsRecreated: 2 });
    telemetry.recordTick();

    expect(facade.history).toEqual([
      'error:SurfaceOutdated',
      'warning:FrameSkipped',
      'progress:BufferReallocated',
      'counters:ResizeCascade',
      'tick',
    ]);
  });

  it('logs a console error instead of throwing when the facade fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const thrown = new Error('sink offline');
    setTelemetry({
      recordError: vi.fn(),
      recordWarning: vi.fn(),
      recordProgress: vi.fn(() => {
        throw thrown;
      }),
      recordCounters: vi.fn(),
      recordTick: vi.fn(),
    });

    try {
      expect(() =>
        telemetry.recordProgress('BindGroupsRecreated', { count: 1, labels: ['globals'] }),
      ).not.toThrow();
      expect(errorSpy).toHaveBeenCalledWith('[render] telemetry invocation failed', thrown);
    } finally {
      errorSpy.mockRestore();
    }
  });

  it('is silent by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    try {
      telemetry.recordError('SurfaceOutdated', { message: 'surface outdated' });
      telemetry.recordProgress('TextureReallocated', {
        label: undefined,
        width: 1,
        height: 1,
        depthOrArrayLayers: 1,
      });

      expect(errorSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
    } finally {
      errorSpy.mockRestore();
      infoSpy.mockRestore();
    }
  });

  it('createConsoleTelemetry logs with render prefixes', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    try {
      setTelemetry(createConsoleTelemetry());

      telemetry.recordError('DeviceLost', { reason: 'destroyed', message: '' });
      telemetry.recordWarning('FrameSkipped', { reason: 'timeout' });
      telemetry.recordProgress('BindGroupsRecreated', { count: 2, labels: ['globals', undefined] });
      telemetry.recordCounters('ResizeCascade', { texturesReallocated: 1, bindGroupsRecreated: 2 });
      telemetry.recordTick();

      expect(errorSpy).toHaveBeenCalledWith('[render:error] DeviceLost', {
        reason: 'destroyed',
        message: '',
      });
      expect(warnSpy).toHaveBeenCalledWith('[render:warning] FrameSkipped', {
        reason: 'timeout',
      });
      expect(infoSpy).toHaveBeenCalledWith('[render:progress] BindGroupsRecreated', {
        count: 2,
        labels: ['globals', undefined],
      });
      expect(infoSpy).toHaveBeenCalledWith('[render:counters] ResizeCascade', {
        texturesReallocated: 1,
        bindGroupsRecreated: 2,
      });
      expect(debugSpy).toHaveBeenCalledWith('[render:frame]');
    } finally {
      errorSpy.mockRestore();
      warnSpy.mockRestore();
      infoSpy.mockRestore();
      debugSpy.mockRestore();
    }
  });
});

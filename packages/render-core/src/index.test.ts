import { describe, expect, it } from 'vitest';

import * as renderCore from './index.js';
import { createFakeGpu } from './__tests__/fake-gpu.js';

describe('package entry point', () => {
  it('creates a working context from the public surface alone', () => {
    const { device, surface } = createFakeGpu();
    const context = renderCore.createRenderContext(device, surface, {
      size: { width: 2, height: 2 },
    });
    const handle = context
      .bufferBuilder(renderCore.vec2f)
      .vertex()
      .build(1);

    expect(context).toBeInstanceOf(renderCore.RenderContext);
    expect(context.getBuffer(handle)).toBeInstanceOf(renderCore.ElementBuffer);
    expect(renderCore.PRESENTATION_TARGET).toEqual({ kind: 'texture', index: -1 });
  });
});

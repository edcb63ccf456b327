import { describe, expect, it } from 'vitest';

import { captureError, createTestContext } from './__tests__/fake-gpu.js';

describe('samplers', () => {
  it('creates device defaults when nothing is configured', () => {
    const { context, fake } = createTestContext();
    const handle = context.samplerBuilder('default').build();

    expect(fake.samplers).toEqual([
      {
        label: 'default',
        addressModeU: 'clamp-to-edge',
        addressModeV: 'clamp-to-edge',
        addressModeW: 'clamp-to-edge',
        magFilter: 'nearest',
        minFilter: 'nearest',
        mipmapFilter: 'nearest',
        lodMinClamp: 0,
        lodMaxClamp: 32,
        maxAnisotropy: 1,
      },
    ]);
    expect(context.getSampler(handle).label).toBe('default');
  });

  it('fills omitted address axes from the previous one', () => {
    const { context } = createTestContext();
    const handle = context
      .samplerBuilder()
      .addressMode('repeat', 'mirror-repeat')
      .magFilter('linear')
      .minFilter('linear')
      .mipmapFilter('linear')
      .lodClamp(1, 4)
      .compare('less')
      .anisotropyClamp(8)
      .build();

    expect(context.getSampler(handle).descriptor).toMatchObject({
      addressModeU: 'repeat',
      addressModeV: 'mirror-repeat',
      addressModeW: 'mirror-repeat',
      magFilter: 'linear',
      minFilter: 'linear',
      mipmapFilter: 'linear',
      lodMinClamp: 1,
      lodMaxClamp: 4,
      compare: 'less',
      maxAnisotropy: 8,
    });
  });

  it('is single use', () => {
    const { context } = createTestContext();
    const builder = context.samplerBuilder();
    builder.build();

    expect(captureError(() => builder.build())).toMatchObject({ code: 'builder-finalized' });
  });
});

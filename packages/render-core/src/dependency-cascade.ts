import type { BindGroup } from './bind-group.js';
import type { BufferHandle } from './buffer.js';
import type { Registry } from './handle.js';
import { telemetry } from './telemetry.js';
import type { TextureHandle } from './texture.js';

export interface ReallocatedResources {
  readonly buffers?: readonly BufferHandle[];
  readonly textures?: readonly TextureHandle[];
}

/**
 * Recreates, once each, every bind group depending on a reallocated
 * resource. Reallocations are rare, so a linear scan is fine.
 *
 * @returns the number of bind groups recreated.
 */
export function recreateDependents(
  bindGroups: Registry<BindGroup>,
  reallocated: ReallocatedResources,
): number {
  const buffers = reallocated.buffers ?? [];
  const textures = reallocated.textures ?? [];
  if (buffers.length === 0 && textures.length === 0) {
    return 0;
  }

  const recreated: (string | undefined)[] = [];
  for (const group of bindGroups) {
    if (group.dependsOn(buffers, textures)) {
      group.recreate();
      recreated.push(group.label);
    }
  }

  if (recreated.length > 0) {
    telemetry.recordProgress('BindGroupsRecreated', {
      count: recreated.length,
      labels: recreated,
    });
  }
  return recreated.length;
}

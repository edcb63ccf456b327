import { BuilderSeal, type RenderDevice, type ResourceState } from './context-state.js';
import { type ElementArray, type ElementType, elements, vertexLayout } from './element-type.js';
import {
  ElementTypeMismatchError,
  RenderContextConstructionError,
  describeLabel,
} from './errors.js';
import { BufferUsage, COPY_BUFFER_ALIGNMENT, alignTo, hasFlag } from './gpu-flags.js';
import type { Handle } from './handle.js';
import { telemetry } from './telemetry.js';

export type BufferHandle = Handle<ElementBuffer>;

export interface BufferDescriptor {
  readonly label: string | undefined;
  readonly elementType: ElementType<unknown>;
  readonly usage: number;
  readonly vertexLayout: GPUVertexBufferLayout | undefined;
  readonly instanceLayout: GPUVertexBufferLayout | undefined;
}

/**
 * Device memory holding elements of one declared type.
 *
 * Capacity is tracked in bytes; `length` is the number of whole elements it
 * holds. A write larger than the capacity replaces the backing allocation.
 */
export class ElementBuffer {
  readonly label: string | undefined;
  readonly elementType: ElementType<unknown>;
  readonly usage: number;
  readonly vertexLayout: GPUVertexBufferLayout | undefined;
  readonly instanceLayout: GPUVertexBufferLayout | undefined;

  private gpuBuffer: GPUBuffer;
  private byteCapacity: number;

  constructor(
    private readonly device: RenderDevice,
    descriptor: BufferDescriptor,
    gpuBuffer: GPUBuffer,
    byteCapacity: number,
  ) {
    this.label = descriptor.label;
    this.elementType = descriptor.elementType;
    this.usage = descriptor.usage;
    this.vertexLayout = descriptor.vertexLayout;
    this.instanceLayout = descriptor.instanceLayout;
    this.gpuBuffer = gpuBuffer;
    this.byteCapacity = byteCapacity;
  }

  get resource(): GPUBuffer {
    return this.gpuBuffer;
  }

  get capacity(): number {
    return this.byteCapacity;
  }

  get length(): number {
    return Math.floor(this.byteCapacity / this.elementType.byteSize);
  }

  /**
   * Replaces the buffer's contents from offset 0.
   *
   * @returns `true` when the payload outgrew the capacity and the backing
   * allocation was replaced; bind groups referencing the buffer must then be
   * recreated.
   */
  write(data: ElementArray): boolean {
    if (data.type !== this.elementType) {
      throw new ElementTypeMismatchError(
        describeLabel('buffer', this.label),
        this.elementType.name,
        data.type.name,
      );
    }

    if (data.bytes.byteLength <= this.byteCapacity) {
      if (!hasFlag(this.usage, BufferUsage.COPY_DST)) {
        throw new RenderContextConstructionError(
          'buffer-not-writable',
          `Cannot write to ${describeLabel('buffer', this.label)}: it was built without copyDst usage.`,
        );
      }
      this.device.queue.writeBuffer(this.gpuBuffer, 0, padToCopyAlignment(data.bytes));
      return false;
    }

    const previousCapacity = this.byteCapacity;
    this.gpuBuffer.destroy();
    this.gpuBuffer = createInitializedBuffer(this.device, this.label, this.usage, data.bytes);
    this.byteCapacity = data.bytes.byteLength;
    telemetry.recordProgress('BufferReallocated', {
      label: this.label,
      previousCapacity,
      capacity: this.byteCapacity,
    });
    return true;
  }
}

function padToCopyAlignment(bytes: Uint8Array): Uint8Array {
  const aligned = alignTo(bytes.byteLength, COPY_BUFFER_ALIGNMENT);
  if (aligned === bytes.byteLength) {
    return bytes;
  }
  const padded = new Uint8Array(aligned);
  padded.set(bytes);
  return padded;
}

function createInitializedBuffer(
  device: RenderDevice,
  label: string | undefined,
  usage: number,
  bytes: Uint8Array,
): GPUBuffer {
  const gpuBuffer = device.createBuffer({
    label,
    size: alignTo(bytes.byteLength, COPY_BUFFER_ALIGNMENT),
    usage,
    mappedAtCreation: true,
  });
  new Uint8Array(gpuBuffer.getMappedRange()).set(bytes);
  gpuBuffer.unmap();
  return gpuBuffer;
}

export class BufferBuilder<T> {
  private usage = 0;
  private vertexSource: GPUVertexBufferLayout | undefined;
  private instanceSource: GPUVertexBufferLayout | undefined;
  private readonly seal = new BuilderSeal('Buffer builder');

  constructor(
    private readonly state: ResourceState,
    private readonly elementType: ElementType<T>,
    private readonly label?: string,
  ) {}

  mapRead(): this {
    this.usage |= BufferUsage.MAP_READ;
    return this;
  }

  mapWrite(): this {
    this.usage |= BufferUsage.MAP_WRITE;
    return this;
  }

  copySrc(): this {
    this.usage |= BufferUsage.COPY_SRC;
    return this;
  }

  copyDst(): this {
    this.usage |= BufferUsage.COPY_DST;
    return this;
  }

  storage(): this {
    this.usage |= BufferUsage.STORAGE;
    return this;
  }

  uniform(): this {
    this.usage |= BufferUsage.UNIFORM;
    return this;
  }

  indirect(): this {
    this.usage |= BufferUsage.INDIRECT;
    return this;
  }

  /** Marks the buffer as a per-vertex source and captures its layout. */
  vertex(): this {
    this.usage |= BufferUsage.VERTEX;
    this.vertexSource = vertexLayout(this.elementType, 'vertex');
    return this;
  }

  /** Marks the buffer as a per-instance source and captures its layout. */
  instance(): this {
    this.usage |= BufferUsage.VERTEX;
    this.instanceSource = vertexLayout(this.elementType, 'instance');
    return this;
  }

  /** Only 2- and 4-byte element types can index; checked at build. */
  index(): this {
    this.usage |= BufferUsage.INDEX;
    return this;
  }

  /**
   * Allocates room for `count` zero-initialized elements.
   */
  build(count: number): BufferHandle {
    if (!Number.isInteger(count) || count < 0) {
      throw new RenderContextConstructionError(
        'missing-field',
        `Buffer element count must be a non-negative integer, got ${count}.`,
      );
    }
    this.validate();
    const byteCapacity = count * this.elementType.byteSize;
    const gpuBuffer = this.state.device.createBuffer({
      label: this.label,
      size: alignTo(byteCapacity, COPY_BUFFER_ALIGNMENT),
      usage: this.usage,
    });
    return this.register(gpuBuffer, byteCapacity);
  }

  /**
   * Allocates exactly enough room for `data` and uploads it.
   */
  buildInit(data: ElementArray<T> | readonly T[]): BufferHandle {
    const payload = isElementArray(data) ? data : elements(this.elementType, data);
    if (payload.type !== this.elementType) {
      throw new ElementTypeMismatchError(
        describeLabel('buffer', this.label),
        this.elementType.name,
        payload.type.name,
      );
    }
    this.validate();
    const gpuBuffer = createInitializedBuffer(
      this.state.device,
      this.label,
      this.usage,
      payload.bytes,
    );
    return this.register(gpuBuffer, payload.bytes.byteLength);
  }

  private validate(): void {
    this.seal.seal();
    if (hasFlag(this.usage, BufferUsage.INDEX) && indexFormatFor(this.elementType) === undefined) {
      throw new RenderContextConstructionError(
        'invalid-index-format',
        `Index ${describeLabel('buffer', this.label)} has ${this.elementType.byteSize}-byte elements; only 2- or 4-byte indices are supported.`,
      );
    }
  }

  private register(gpuBuffer: GPUBuffer, byteCapacity: number): BufferHandle {
    const buffer = new ElementBuffer(
      this.state.device,
      {
        label: this.label,
        elementType: this.elementType,
        usage: this.usage,
        vertexLayout: this.vertexSource,
        instanceLayout: this.instanceSource,
      },
      gpuBuffer,
      byteCapacity,
    );
    return this.state.buffers.add(buffer);
  }
}

function isElementArray<T>(data: ElementArray<T> | readonly T[]): data is ElementArray<T> {
  return !Array.isArray(data);
}

/**
 * Index format for an element width: 2 bytes is `uint16`, 4 bytes `uint32`.
 */
export function indexFormatFor(elementType: ElementType<unknown>): GPUIndexFormat | undefined {
  switch (elementType.byteSize) {
    case 2:
      return 'uint16';
    case 4:
      return 'uint32';
    default:
      return undefined;
  }
}

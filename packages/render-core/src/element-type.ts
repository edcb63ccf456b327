/**
 * Resolved vertex attribute metadata: where a field sits inside one element
 * and which shader location consumes it.
 */
export interface VertexAttributeLayout {
  readonly format: GPUVertexFormat;
  readonly offset: number;
  readonly shaderLocation: number;
}

/**
 * Runtime identity of the data stored in a buffer or texture.
 *
 * The object itself is the type tag: two element types are the same type only
 * when they are the same object, regardless of name or size.
 */
export interface ElementType<T> {
  readonly name: string;
  /** Bytes per element (per texel for texture formats). */
  readonly byteSize: number;
  /** Present when the type can feed a vertex or instance buffer. */
  readonly attributes?: readonly VertexAttributeLayout[];
  /** Present when the type describes texels of a texture format. */
  readonly textureFormat?: GPUTextureFormat;
  pack(value: T, view: DataView, byteOffset: number): void;
}

/**
 * Type-erased payload tagged with the element type it was packed from.
 */
export interface ElementArray<T = unknown> {
  readonly type: ElementType<T>;
  readonly count: number;
  readonly bytes: Uint8Array;
}

export interface ElementTypeDefinition<T> {
  readonly name: string;
  readonly byteSize: number;
  readonly attributes?: readonly VertexAttributeLayout[];
  readonly textureFormat?: GPUTextureFormat;
  readonly pack: (value: T, view: DataView, byteOffset: number) => void;
}

export function defineElementType<T>(definition: ElementTypeDefinition<T>): ElementType<T> {
  if (!Number.isInteger(definition.byteSize) || definition.byteSize <= 0) {
    throw new Error(
      `Element type '${definition.name}' must have a positive integer byteSize, got ${definition.byteSize}.`,
    );
  }

  for (const attribute of definition.attributes ?? []) {
    if (attribute.offset < 0 || attribute.offset >= definition.byteSize) {
      throw new Error(
        `Element type '${definition.name}' has attribute at location ${attribute.shaderLocation} with offset ${attribute.offset} outside its ${definition.byteSize}-byte stride.`,
      );
    }
  }

  const pack = definition.pack;
  return Object.freeze({
    name: definition.name,
    byteSize: definition.byteSize,
    attributes: definition.attributes ? Object.freeze([...definition.attributes]) : undefined,
    textureFormat: definition.textureFormat,
    pack(value: T, view: DataView, byteOffset: number) {
      pack(value, view, byteOffset);
    },
  });
}

/**
 * Packs `values` into a tightly strided byte payload tagged with `type`.
 */
export function elements<T>(type: ElementType<T>, values: readonly T[]): ElementArray<T> {
  const bytes = new Uint8Array(values.length * type.byteSize);
  const view = new DataView(bytes.buffer);
  for (let index = 0; index < values.length; index += 1) {
    type.pack(values[index], view, index * type.byteSize);
  }
  return { type, count: values.length, bytes };
}

/**
 * Snapshot of the layout a vertex or instance buffer is read with. Returns
 * `undefined` when the type carries no vertex attributes.
 */
export function vertexLayout(
  type: ElementType<unknown>,
  stepMode: GPUVertexStepMode,
): GPUVertexBufferLayout | undefined {
  if (!type.attributes) {
    return undefined;
  }
  return Object.freeze({
    arrayStride: type.byteSize,
    stepMode,
    attributes: type.attributes.map((attribute) => ({ ...attribute })),
  });
}

type Vec2 = readonly [number, number];
type Vec3 = readonly [number, number, number];
type Vec4 = readonly [number, number, number, number];

function packFloats(count: number) {
  return (value: readonly number[], view: DataView, byteOffset: number): void => {
    for (let index = 0; index < count; index += 1) {
      view.setFloat32(byteOffset + index * 4, value[index] ?? 0, true);
    }
  };
}

export const u16 = defineElementType<number>({
  name: 'u16',
  byteSize: 2,
  pack: (value, view, byteOffset) => view.setUint16(byteOffset, value, true),
});

export const u32 = defineElementType<number>({
  name: 'u32',
  byteSize: 4,
  attributes: [{ format: 'uint32', offset: 0, shaderLocation: 0 }],
  pack: (value, view, byteOffset) => view.setUint32(byteOffset, value, true),
});

export const i32 = defineElementType<number>({
  name: 'i32',
  byteSize: 4,
  attributes: [{ format: 'sint32', offset: 0, shaderLocation: 0 }],
  pack: (value, view, byteOffset) => view.setInt32(byteOffset, value, true),
});

export const f32 = defineElementType<number>({
  name: 'f32',
  byteSize: 4,
  attributes: [{ format: 'float32', offset: 0, shaderLocation: 0 }],
  pack: (value, view, byteOffset) => view.setFloat32(byteOffset, value, true),
});

export const vec2f = defineElementType<Vec2>({
  name: 'vec2f',
  byteSize: 8,
  attributes: [{ format: 'float32x2', offset: 0, shaderLocation: 0 }],
  pack: packFloats(2),
});

export const vec3f = defineElementType<Vec3>({
  name: 'vec3f',
  byteSize: 12,
  attributes: [{ format: 'float32x3', offset: 0, shaderLocation: 0 }],
  pack: packFloats(3),
});

export const vec4f = defineElementType<Vec4>({
  name: 'vec4f',
  byteSize: 16,
  attributes: [{ format: 'float32x4', offset: 0, shaderLocation: 0 }],
  pack: packFloats(4),
});

/** Column-major 4x4 matrix, 16 floats. */
export const mat4x4f = defineElementType<readonly number[]>({
  name: 'mat4x4f',
  byteSize: 64,
  pack: packFloats(16),
});

function texel(
  name: string,
  textureFormat: GPUTextureFormat,
  byteSize: number,
  pack: (value: readonly number[], view: DataView, byteOffset: number) => void,
): ElementType<readonly number[]> {
  return defineElementType({ name, byteSize, textureFormat, pack });
}

function packUnorm8(value: readonly number[], view: DataView, byteOffset: number): void {
  for (let channel = 0; channel < 4; channel += 1) {
    const normalized = Math.min(1, Math.max(0, value[channel] ?? 0));
    view.setUint8(byteOffset + channel, Math.round(normalized * 255));
  }
}

function packFloat16(value: readonly number[], view: DataView, byteOffset: number): void {
  for (let channel = 0; channel < 4; channel += 1) {
    view.setUint16(byteOffset + channel * 2, toHalf(value[channel] ?? 0), true);
  }
}

export const rgba8unorm = texel('rgba8unorm', 'rgba8unorm', 4, packUnorm8);
export const bgra8unorm = texel('bgra8unorm', 'bgra8unorm', 4, (value, view, byteOffset) =>
  packUnorm8([value[2] ?? 0, value[1] ?? 0, value[0] ?? 0, value[3] ?? 0], view, byteOffset),
);
export const rgba16float = texel('rgba16float', 'rgba16float', 8, packFloat16);
export const rgba32float = texel('rgba32float', 'rgba32float', 16, packFloats(4));
export const r32float = texel('r32float', 'r32float', 4, packFloats(1));
export const depth32float = texel('depth32float', 'depth32float', 4, packFloats(1));
// depth24plus has no host-visible layout; writes to it are rejected by the device.
export const depth24plus = texel('depth24plus', 'depth24plus', 4, packFloats(1));

const float32Scratch = new Float32Array(1);
const uint32Scratch = new Uint32Array(float32Scratch.buffer);

/** Drops the low `shift` bits, rounding to nearest with ties to even. */
function shiftRoundingEven(value: number, shift: number): number {
  const truncated = value >>> shift;
  const remainder = value & ((1 << shift) - 1);
  const halfway = 1 << (shift - 1);
  if (remainder > halfway || (remainder === halfway && (truncated & 1) === 1)) {
    return truncated + 1;
  }
  return truncated;
}

function toHalf(value: number): number {
  float32Scratch[0] = value;
  const bits = uint32Scratch[0] ?? 0;
  const sign = (bits >>> 16) & 0x8000;
  const exponent = (bits >>> 23) & 0xff;
  const mantissa = bits & 0x7fffff;

  if (exponent === 0xff) {
    return sign | (mantissa === 0 ? 0x7c00 : 0x7e00);
  }
  const halfExponent = exponent - 127 + 15;
  if (halfExponent >= 0x1f) {
    return sign | 0x7c00;
  }
  if (halfExponent <= 0) {
    if (halfExponent < -10) {
      return sign;
    }
    // Subnormal; rounding up may carry into the smallest normal.
    return sign | shiftRoundingEven(mantissa | 0x800000, 14 - halfExponent);
  }
  // A carry out of the mantissa bumps the exponent, up to infinity.
  return sign | ((halfExponent << 10) + shiftRoundingEven(mantissa, 13));
}

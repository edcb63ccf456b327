import { RenderContextConstructionError } from './errors.js';

/**
 * Stable reference into a {@link Registry}. Two handles are equal when their
 * `kind` and `index` match; see {@link handlesEqual}.
 *
 * The type parameter is phantom: it keeps a buffer handle from being passed
 * where a texture handle is expected.
 */
export interface Handle<T> {
  readonly kind: string;
  readonly index: number;
  /** Never set; carries the resource type. */
  readonly __resource?: T;
}

export function handlesEqual<T>(a: Handle<T>, b: Handle<T>): boolean {
  return a.kind === b.kind && a.index === b.index;
}

/**
 * Append-only store. Entries are never removed, so a handle handed out by
 * `add` resolves for the registry's whole lifetime.
 */
export class Registry<T> implements Iterable<T> {
  readonly kind: string;

  private readonly items: T[] = [];

  constructor(kind: string) {
    this.kind = kind;
  }

  get size(): number {
    return this.items.length;
  }

  add(value: T): Handle<T> {
    const handle: Handle<T> = Object.freeze({ kind: this.kind, index: this.items.length });
    this.items.push(value);
    return handle;
  }

  /**
   * Returns `undefined` for a handle minted by a registry of another kind or
   * for an index this registry never issued.
   */
  get(handle: Handle<T>): T | undefined {
    if (handle.kind !== this.kind) {
      return undefined;
    }
    return this.items[handle.index];
  }

  /** Whether `handle` was minted by a registry of this kind. */
  owns(handle: Handle<unknown>): handle is Handle<T> {
    return handle.kind === this.kind;
  }

  has(handle: Handle<T>): boolean {
    return this.get(handle) !== undefined;
  }

  /**
   * Resolves a handle, treating a miss as a contract violation.
   */
  require(handle: Handle<T>, usage: string): T {
    const value = this.get(handle);
    if (value === undefined) {
      throw new RenderContextConstructionError(
        'invalid-handle',
        `Invalid ${this.kind} handle #${handle.index} (kind '${handle.kind}') passed to ${usage}.`,
      );
    }
    return value;
  }

  *entries(): IterableIterator<[Handle<T>, T]> {
    for (let index = 0; index < this.items.length; index += 1) {
      yield [Object.freeze({ kind: this.kind, index }), this.items[index]];
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

export type ConstructionErrorCode =
  | 'missing-field'
  | 'invalid-handle'
  | 'invalid-index-format'
  | 'element-count-mismatch'
  | 'missing-size-policy'
  | 'invalid-size-policy'
  | 'dimension-mismatch'
  | 'missing-vertex-layout'
  | 'misaligned-buffer'
  | 'unsupported-polygon-mode'
  | 'buffer-not-writable'
  | 'duplicate-binding'
  | 'builder-finalized'
  | 'unsupported-surface'
  | 'invalid-dispatch';

/**
 * Programmer misuse of the render context: a builder finalized without a
 * mandatory field, a handle that does not resolve, an impossible draw.
 *
 * These are not recoverable states and should not be retried.
 */
export class RenderContextConstructionError extends Error {
  override name = 'RenderContextConstructionError';

  readonly code: ConstructionErrorCode;

  constructor(code: ConstructionErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class ElementTypeMismatchError extends Error {
  override name = 'ElementTypeMismatchError';

  readonly expected: string;
  readonly received: string;

  constructor(resource: string, expected: string, received: string) {
    super(
      `Attempted to write ${received} data to ${resource}, which was declared with element type ${expected}.`,
    );
    this.expected = expected;
    this.received = received;
  }
}

export class ShaderCompilationError extends Error {
  override name = 'ShaderCompilationError';

  constructor(label: string | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to compile shader${label ? ` '${label}'` : ''}${detail ? `: ${detail}` : ''}`,
      { cause },
    );
  }
}

export type SurfaceErrorReason = 'lost' | 'out-of-memory' | 'timeout' | 'outdated';

/**
 * Raised by a {@link PresentationSurface} when the current target cannot be
 * acquired. `render()` classifies it by `reason`.
 */
export class SurfaceError extends Error {
  override name = 'SurfaceError';

  readonly reason: SurfaceErrorReason;

  constructor(reason: SurfaceErrorReason, message?: string) {
    super(message ?? `Presentation surface error: ${reason}`);
    this.reason = reason;
  }
}

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export class RenderContextConfigError extends Error {
  override name = 'RenderContextConfigError';

  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid render context options: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ')}`,
    );
    this.issues = issues;
  }
}

export function describeLabel(kind: string, label: string | undefined): string {
  return label ? `${kind} '${label}'` : `unlabeled ${kind}`;
}

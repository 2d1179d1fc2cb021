/**
 * Scene error types.
 *
 * Tree operations are total and report "not found" through `undefined`.
 * These errors cover broken data-model invariants and opt-in strict calls.
 */

export enum SceneErrorCode {
  FRAME_SET_INVALID = 'FRAME_SET_INVALID',
  FRAME_SET_UNKNOWN = 'FRAME_SET_UNKNOWN',
  CHILD_CYCLE = 'CHILD_CYCLE',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export type SceneErrorContext = Record<string, unknown>;

export class SceneError extends Error {
  public readonly code: SceneErrorCode;
  public readonly context: SceneErrorContext;
  public override readonly cause?: Error;

  constructor(
    code: SceneErrorCode,
    message: string,
    options: {
      context?: SceneErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'SceneError';
    this.code = code;
    this.context = { ...options.context };
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

/**
 * A frame set failed validation (no frames, bad frame time, non-finite rects).
 */
export class InvalidFrameSetError extends SceneError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], options: { name?: string; cause?: Error } = {}) {
    super(SceneErrorCode.FRAME_SET_INVALID, message, {
      context: { frameSet: options.name, issues },
      cause: options.cause,
    });
    this.name = 'InvalidFrameSetError';
    this.issues = issues;
  }
}

/**
 * A clip name was requested that is not in the node's registry.
 */
export class UnknownFrameSetError extends SceneError {
  public readonly frameSetName: string;

  constructor(frameSetName: string, known: readonly string[]) {
    super(SceneErrorCode.FRAME_SET_UNKNOWN, `Unknown frame set "${frameSetName}"`, {
      context: { frameSet: frameSetName, known: [...known] },
    });
    this.name = 'UnknownFrameSetError';
    this.frameSetName = frameSetName;
  }
}

/**
 * A node was added under itself or under one of its own descendants.
 */
export class ChildCycleError extends SceneError {
  public readonly parentId: string;
  public readonly childId: string;

  constructor(parentId: string, childId: string) {
    super(SceneErrorCode.CHILD_CYCLE, `Node "${childId}" cannot be a child of itself or its descendant "${parentId}"`, {
      context: { parent: parentId, child: childId },
    });
    this.name = 'ChildCycleError';
    this.parentId = parentId;
    this.childId = childId;
  }
}

export class ConfigError extends SceneError {
  public readonly issues: string[];

  constructor(message: string, options: { issues?: string[]; cause?: Error } = {}) {
    const issues = options.issues ?? [];
    super(SceneErrorCode.CONFIG_INVALID, message, {
      context: { issues },
      cause: options.cause,
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isSceneError(value: unknown): value is SceneError {
  return value instanceof SceneError;
}

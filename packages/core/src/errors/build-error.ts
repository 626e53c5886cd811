/**
 * @fileoverview Build error class shared by every crossbuild component
 *
 * The message of a BuildError is exactly the detail text it was created
 * with; nothing is prepended or appended.
 */

import { BuildErrorCode, ErrorCategory, getErrorCategory } from './codes';

/**
 * Structured build failure: a code, its category and the message
 */
export class BuildError extends Error {
  public override readonly name = 'BuildError';
  public readonly code: BuildErrorCode;
  public readonly category: ErrorCategory;
  /** Target identifier the failure belongs to, when there is one */
  public readonly target?: string;
  public readonly timestamp: Date;

  constructor(
    code: BuildErrorCode,
    message: string,
    options: {
      target?: string;
      cause?: unknown;
    } = {}
  ) {
    super(message);

    this.code = code;
    this.category = getErrorCategory(code);
    this.target = options.target;
    this.timestamp = new Date();

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintain prototype chain
    Object.setPrototypeOf(this, BuildError.prototype);
  }

  /**
   * Whether this error belongs to the given category
   */
  isCategory(category: ErrorCategory): boolean {
    return this.category === category;
  }

  /**
   * Copy of this error attributed to a target
   */
  forTarget(target: string): BuildError {
    return new BuildError(this.code, this.message, {
      target,
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON for logging and reports
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      target: this.target,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Type guard for BuildError instances
 */
export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

/**
 * Message of an unknown thrown value. Errors from another realm fail
 * `instanceof Error`, so any object with a string `message` counts.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap an unknown thrown value, keeping BuildErrors as they are
 */
export function toBuildError(
  error: unknown,
  code: BuildErrorCode,
  target?: string
): BuildError {
  if (isBuildError(error)) {
    return error;
  }
  return new BuildError(code, errorMessage(error), { target, cause: error });
}

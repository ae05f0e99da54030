/**
 * Extended Error class that preserves error context and details
 *
 * Usage:
 * ```ts
 * throw new ExtendedError({
 *   message: 'Failed to upload file',
 *   cause: originalError,
 *   details: {
 *     fileName: 'report.docx',
 *     statusCode: 429,
 *   }
 * });
 * ```
 */

export interface ExtendedErrorOptions {
  message: string;
  cause?: Error | unknown;
  details?: Record<string, unknown>;
}

export class ExtendedError extends Error {
  public readonly cause?: Error | unknown;
  public readonly details?: Record<string, unknown>;

  constructor(options: ExtendedErrorOptions) {
    super(options.message);
    this.name = 'ExtendedError';
    this.cause = options.cause;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Type guard to check if an error is an ExtendedError
   */
  static isExtendedError(error: unknown): error is ExtendedError {
    return error instanceof ExtendedError;
  }
}

/**
 * How a failed remote call should be treated by its caller.
 *
 * - transient: network or server hiccup, eligible for another attempt
 * - permanent: the service will never accept this content unchanged
 * - auth: credentials were rejected
 * - creation: a folder could not be created
 */
export type RemoteErrorKind = 'transient' | 'permanent' | 'auth' | 'creation';

export interface RemoteErrorOptions extends ExtendedErrorOptions {
  kind: RemoteErrorKind;
}

export class RemoteError extends ExtendedError {
  public readonly kind: RemoteErrorKind;

  constructor(options: RemoteErrorOptions) {
    super(options);
    this.name = 'RemoteError';
    this.kind = options.kind;
  }
}

export function isRemoteError(
  error: unknown,
  kind?: RemoteErrorKind
): error is RemoteError {
  return error instanceof RemoteError && (!kind || error.kind === kind);
}

/**
 * The local path handed to the uploader does not exist
 */
export class LocalPathNotFoundError extends ExtendedError {
  public readonly path: string;

  constructor(path: string) {
    super({
      message: `Specified path ${path} doesn't exist`,
      details: { path },
    });
    this.name = 'LocalPathNotFoundError';
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

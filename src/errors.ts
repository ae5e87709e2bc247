/**
 * Error taxonomy for sidecar operations
 *
 * Every failure surfaced by the core is one of four kinds. The kind decides
 * the CLI exit code and whether a caller may retry:
 *
 * - user (1): bad version string, unknown migration path. Not retried.
 * - io (2): unreadable or unwritable file. The whole operation may be retried.
 * - validation (3): a valid sidecar was required but not found.
 * - internal (4): hashing or transform fault. Always a bug.
 */

export type ErrorKind = "user" | "io" | "validation" | "internal";

export const EXIT_CODES: Record<ErrorKind, number> = {
  user: 1,
  io: 2,
  validation: 3,
  internal: 4,
};

export interface SidecarKeeperErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details */
  details?: Record<string, unknown>;
}

/**
 * JSON shape printed on stderr by the CLI
 */
export interface SerializedError {
  kind: ErrorKind;
  message: string;
}

/**
 * Base class for all sidecar-keeper errors
 *
 * @example
 * ```typescript
 * throw new IoError(`Failed to read ${file}`, { cause: err, details: { code: "EACCES" } });
 * ```
 */
export abstract class SidecarKeeperError extends Error {
  abstract readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options: SidecarKeeperErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.details = options.details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }

  toJSON(): SerializedError {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * Invalid input from the caller: malformed version, unknown migration pair
 */
export class UserError extends SidecarKeeperError {
  readonly kind = "user";
}

/**
 * A filesystem operation failed
 */
export class IoError extends SidecarKeeperError {
  readonly kind = "io";

  /** Errno code of the wrapped Node error, if any (e.g. "ENOENT") */
  get code(): string | undefined {
    const code = this.details?.code;
    return typeof code === "string" ? code : undefined;
  }

  /**
   * Wrap a Node filesystem error, keeping its errno code in details
   */
  static from(error: unknown, context: string): IoError {
    const code = errnoCode(error);
    const reason = error instanceof Error ? error.message : String(error);
    return new IoError(`${context}: ${reason}`, {
      cause: error,
      details: code ? { code } : undefined,
    });
  }
}

/**
 * A valid sidecar was required but the record is missing or corrupt
 */
export class ValidationError extends SidecarKeeperError {
  readonly kind = "validation";
}

/**
 * Unexpected failure inside the core
 */
export class InternalError extends SidecarKeeperError {
  readonly kind = "internal";
}

/**
 * Extract the errno code from an unknown thrown value
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errnoCode(error) === "ENOENT";
}

/**
 * Normalize anything thrown into a SidecarKeeperError
 * Errors carrying an errno code become IoError, everything else InternalError
 */
export function toSidecarKeeperError(error: unknown): SidecarKeeperError {
  if (error instanceof SidecarKeeperError) {
    return error;
  }
  if (errnoCode(error) !== undefined) {
    return IoError.from(error, "I/O failure");
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
}

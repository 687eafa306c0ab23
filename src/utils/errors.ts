/**
 * Typed errors for the operation core.
 *
 * Codes are namespaced by failure class so callers can branch on the
 * prefix.
 */

export type TransportErrorCode = "TRANSPORT.STATUS" | "TRANSPORT.TIMEOUT" | "TRANSPORT.NETWORK";
export type IntegrityErrorCode = "INTEGRITY.TRUNCATED" | "INTEGRITY.DECOMPRESS" | "INTEGRITY.UNSUPPORTED_ENCODING";
export type PersistenceErrorCode = "PERSISTENCE.READ" | "PERSISTENCE.WRITE" | "PERSISTENCE.CORRUPT";

export type WorkbenchErrorCode =
  | TransportErrorCode
  | IntegrityErrorCode
  | PersistenceErrorCode
  | "FILESYSTEM.WRITE"
  | "CATALOG.UNKNOWN"
  | "REGISTRY.UNKNOWN_ARTIFACT"
  | "REGISTRY.INVALID_RECORD"
  | "BUILD.RUNNING";

export class WorkbenchError extends Error {
  readonly code: WorkbenchErrorCode;

  constructor(code: WorkbenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransportError extends WorkbenchError {
  readonly status: number | null;

  constructor(code: TransportErrorCode, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(code, message, options);
    this.status = status;
  }
}

export class IntegrityError extends WorkbenchError {
  constructor(code: IntegrityErrorCode, message: string) {
    super(code, message);
  }
}

export class PersistenceError extends WorkbenchError {
  readonly path: string;

  constructor(code: PersistenceErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasStringCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}

/**
 * Error code for a worker failure. zlib errors carry "Z_" codes; anything
 * else untyped comes from the filesystem.
 */
export function errorCode(error: unknown): WorkbenchErrorCode {
  if (error instanceof WorkbenchError) {
    return error.code;
  }
  if (hasStringCode(error) && error.code.startsWith("Z_")) {
    return "INTEGRITY.DECOMPRESS";
  }
  return "FILESYSTEM.WRITE";
}

export type SnapshotEngineErrorCode =
  | "MALFORMED_VALUE"
  | "STORAGE_IO"
  | "CORRUPT_ACCEPTED_FILE"
  | "CORRUPT_PENDING_ARTIFACT"
  | "UNKNOWN_PENDING_ARTIFACT"
  | "INVALID_OPTIONS";

export interface SnapshotEngineIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export interface SnapshotEngineErrorContext {
  path?: string;
  identity?: string;
  issues?: SnapshotEngineIssue[];
  cause?: unknown;
}

export class SnapshotEngineError extends Error {
  readonly code: SnapshotEngineErrorCode;
  readonly path?: string;
  readonly identity?: string;
  readonly issues: SnapshotEngineIssue[];

  constructor(message: string, code: SnapshotEngineErrorCode, context: SnapshotEngineErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "SnapshotEngineError";
    this.code = code;
    this.path = context.path;
    this.identity = context.identity;
    this.issues = context.issues ?? [];
  }
}

export function describeUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  try {
    return String(error);
  } catch {
    return "[unstringifiable thrown value]";
  }
}

export function storageError(action: string, path: string, error: unknown, identity?: string): SnapshotEngineError {
  return new SnapshotEngineError(`Failed to ${action} ${path}: ${describeUnknownError(error)}`, "STORAGE_IO", {
    path,
    identity,
    cause: error
  });
}

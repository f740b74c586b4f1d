import { isAbsolute, join, posix, resolve, sep } from "node:path";

import type { SnapshotFormat } from "./canonicalize.ts";
import { SnapshotEngineError } from "./errors.ts";

export const SNAPSHOT_DIRECTORY_NAME = "snapshots";
export const SNAPSHOT_NAME_SEPARATOR = "__";

const SNAPSHOT_EXTENSION_BY_FORMAT: Record<SnapshotFormat, string> = {
  json: "snap",
  csv: "snap",
  text: "snap"
};

const UNSAFE_FILE_NAME_CHARACTERS = /[\\/:*?"<>|%\s]/gu;

export interface TestIdentity {
  /** Workspace-relative path of the test module, e.g. `tests/api/users.test.ts`. */
  modulePath: string;
  testName: string;
}

export interface SnapshotIdentity {
  workspaceRoot: string;
  modulePath: string;
  moduleId: string;
  testName: string;
  explicitName?: string;
  ordinal: number;
  extension: string;
}

export interface CreateSnapshotIdentityOptions {
  workspaceRoot: string;
  test: TestIdentity;
  explicitName?: string;
  ordinal?: number;
  format: SnapshotFormat;
}

function normalizeOptionalNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeModulePath(value: unknown): string {
  const raw = normalizeOptionalNonEmptyString(value);
  if (!raw) {
    throw new SnapshotEngineError("Snapshot test modulePath must be a non-empty string", "INVALID_OPTIONS");
  }

  const normalized = posix.normalize(raw.replace(/\\/g, "/")).replace(/^\.\/+/, "");
  if (
    normalized === "." ||
    normalized.startsWith("/") ||
    normalized === ".." ||
    normalized.startsWith("../") ||
    /^[A-Za-z]:/.test(normalized)
  ) {
    throw new SnapshotEngineError(
      `Snapshot test modulePath must be a normalized workspace-relative path: ${raw}`,
      "INVALID_OPTIONS"
    );
  }

  return normalized;
}

function normalizeOrdinal(value: unknown): number {
  if (value === undefined) {
    return 1;
  }

  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 1) {
    throw new SnapshotEngineError("Snapshot ordinal must be a positive integer", "INVALID_OPTIONS");
  }

  return value;
}

/**
 * Percent-encodes path separators, reserved characters, whitespace and `%`
 * itself as UTF-8 `%XX` bytes, so distinct names stay distinct on disk.
 */
export function sanitizeFileNameComponent(value: string): string {
  const sanitized = value.replace(UNSAFE_FILE_NAME_CHARACTERS, percentEncode);
  return sanitized.length > 0 ? sanitized : "_";
}

const textEncoder = new TextEncoder();

function percentEncode(character: string): string {
  let encoded = "";
  for (const byte of textEncoder.encode(character)) {
    encoded += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return encoded;
}

export function snapshotExtensionForFormat(format: SnapshotFormat): string {
  return SNAPSHOT_EXTENSION_BY_FORMAT[format];
}

export function describeTestIdentity(test: TestIdentity): string {
  return `${test.modulePath}::${test.testName}`;
}

export function createSnapshotIdentity(options: CreateSnapshotIdentityOptions): SnapshotIdentity {
  const workspaceRoot = normalizeOptionalNonEmptyString(options.workspaceRoot);
  if (!workspaceRoot) {
    throw new SnapshotEngineError("Snapshot workspaceRoot must be a non-empty string", "INVALID_OPTIONS");
  }

  const modulePath = normalizeModulePath(options.test.modulePath);
  const testName = normalizeOptionalNonEmptyString(options.test.testName);
  if (!testName) {
    throw new SnapshotEngineError("Snapshot test testName must be a non-empty string", "INVALID_OPTIONS", {
      identity: modulePath
    });
  }

  const fileName = posix.basename(modulePath);
  const extensionIndex = fileName.lastIndexOf(".");
  const moduleId = extensionIndex > 0 ? fileName.slice(0, extensionIndex) : fileName;
  const explicitName = normalizeOptionalNonEmptyString(options.explicitName);

  return {
    workspaceRoot: resolve(workspaceRoot),
    modulePath,
    moduleId,
    testName,
    ...(explicitName !== undefined ? { explicitName } : {}),
    ordinal: explicitName !== undefined ? 1 : normalizeOrdinal(options.ordinal),
    extension: snapshotExtensionForFormat(options.format)
  };
}

export function snapshotIdentityLabel(identity: SnapshotIdentity): string {
  const base = describeTestIdentity({ modulePath: identity.modulePath, testName: identity.testName });
  if (identity.explicitName !== undefined) {
    return `${base} (${identity.explicitName})`;
  }
  return identity.ordinal > 1 ? `${base} #${String(identity.ordinal)}` : base;
}

/**
 * `<moduleId>__<testName>[__<explicitName>][-<ordinal>].<extension>`. The
 * ordinal suffix appears only from the second unnamed assertion on, and never
 * alongside an explicit name.
 */
export function snapshotFileName(identity: SnapshotIdentity): string {
  let stem = `${sanitizeFileNameComponent(identity.moduleId)}${SNAPSHOT_NAME_SEPARATOR}${sanitizeFileNameComponent(identity.testName)}`;
  if (identity.explicitName !== undefined) {
    stem += `${SNAPSHOT_NAME_SEPARATOR}${sanitizeFileNameComponent(identity.explicitName)}`;
  } else if (identity.ordinal > 1) {
    stem += `-${String(identity.ordinal)}`;
  }

  return `${stem}.${identity.extension}`;
}

/** Pure: derives the accepted snapshot path without touching the filesystem. */
export function resolveSnapshotPath(identity: SnapshotIdentity): string {
  const moduleDirectory = posix.dirname(identity.modulePath);
  const directorySegments = moduleDirectory === "." ? [] : moduleDirectory.split("/");
  const resolvedPath = resolve(
    join(identity.workspaceRoot, ...directorySegments, SNAPSHOT_DIRECTORY_NAME, snapshotFileName(identity))
  );

  const rootPrefix = identity.workspaceRoot.endsWith(sep) ? identity.workspaceRoot : `${identity.workspaceRoot}${sep}`;
  if (!isAbsolute(resolvedPath) || !resolvedPath.startsWith(rootPrefix)) {
    throw new SnapshotEngineError(
      `Resolved snapshot path escapes workspaceRoot: ${resolvedPath}`,
      "INVALID_OPTIONS",
      { identity: snapshotIdentityLabel(identity) }
    );
  }

  return resolvedPath;
}

/**
 * Ordinal allocation for unnamed assertions within one test invocation.
 * A fresh counter starts at 1 again, so retried invocations reuse the same
 * snapshot names.
 */
export class SnapshotOrdinalCounter {
  private count = 0;

  next(options: { allowDuplicates?: boolean } = {}): number {
    if (options.allowDuplicates) {
      return Math.max(this.count, 1);
    }

    this.count += 1;
    return this.count;
  }

  current(): number {
    return this.count;
  }
}

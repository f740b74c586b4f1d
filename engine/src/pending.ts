import { readTextFileIfPresent, removeFileIfPresent, writeFileAtomically } from "./atomic-file.ts";
import type { SnapshotFormat } from "./canonicalize.ts";
import type { DiffLineKind, LineDiff, Verdict } from "./compare.ts";
import { SnapshotEngineError } from "./errors.ts";
import type { SnapshotIdentity } from "./locator.ts";
import { createSchemaValidator, describeFirstIssue, mapAjvIssues } from "./schema-validation.ts";
import { writeAcceptedSnapshot } from "./store.ts";

export const PENDING_ARTIFACT_TYPE = "snapkeep.pending_snapshot";
export const PENDING_ARTIFACT_SCHEMA_VERSION = "1.0.0";
export const PENDING_ARTIFACT_SUFFIX = ".pending";
export const DEFAULT_SNAPSHOT_TOOL_VERSION = "@snapkeep/engine@0.1.0";

export interface PendingArtifactIdentityV1 {
  module_path: string;
  module_id: string;
  test_name: string;
  explicit_name: string | null;
  ordinal: number;
  extension: string;
}

export interface PendingArtifactDiffV1 {
  added_count: number;
  removed_count: number;
  hunks: Array<{
    old_start: number;
    old_count: number;
    new_start: number;
    new_count: number;
    lines: Array<{ kind: DiffLineKind; text: string }>;
  }>;
}

export interface PendingArtifactV1 {
  artifact_type: typeof PENDING_ARTIFACT_TYPE;
  schema_version: typeof PENDING_ARTIFACT_SCHEMA_VERSION;
  created_at_utc: string;
  tool_version: string;
  source: string;
  identity: PendingArtifactIdentityV1;
  format: SnapshotFormat;
  description: string | null;
  verdict: "new" | "mismatch";
  old_body: string | null;
  new_body: string;
  diff: PendingArtifactDiffV1 | null;
}

export interface CreatePendingArtifactOptions {
  identity: SnapshotIdentity;
  source: string;
  format: SnapshotFormat;
  description?: string;
  verdict: Exclude<Verdict, { status: "pass" }>;
  oldBody: string | null;
  newBody: string;
  createdAt: string;
  toolVersion?: string;
}

export interface PromotePendingArtifactOptions {
  now?: () => Date;
  toolVersion?: string;
}

const getPendingArtifactValidator = createSchemaValidator<PendingArtifactV1>(
  "../../docs/schemas/pending-artifact-v1.schema.json"
);

export function pendingPathFor(acceptedPath: string): string {
  return `${acceptedPath}${PENDING_ARTIFACT_SUFFIX}`;
}

export function acceptedPathForPending(pendingPath: string): string {
  if (!pendingPath.endsWith(PENDING_ARTIFACT_SUFFIX) || pendingPath.length === PENDING_ARTIFACT_SUFFIX.length) {
    throw new SnapshotEngineError(
      `Pending artifact path must end with ${PENDING_ARTIFACT_SUFFIX}: ${pendingPath}`,
      "INVALID_OPTIONS",
      { path: pendingPath }
    );
  }

  return pendingPath.slice(0, -PENDING_ARTIFACT_SUFFIX.length);
}

export function toPendingArtifactDiff(diff: LineDiff): PendingArtifactDiffV1 {
  return {
    added_count: diff.addedCount,
    removed_count: diff.removedCount,
    hunks: diff.hunks.map((hunk) => ({
      old_start: hunk.oldStart,
      old_count: hunk.oldCount,
      new_start: hunk.newStart,
      new_count: hunk.newCount,
      lines: hunk.lines.map((line) => ({ kind: line.kind, text: line.text }))
    }))
  };
}

export function fromPendingArtifactDiff(diff: PendingArtifactDiffV1): LineDiff {
  return {
    addedCount: diff.added_count,
    removedCount: diff.removed_count,
    hunks: diff.hunks.map((hunk) => ({
      oldStart: hunk.old_start,
      oldCount: hunk.old_count,
      newStart: hunk.new_start,
      newCount: hunk.new_count,
      lines: hunk.lines.map((line) => ({ kind: line.kind, text: line.text }))
    }))
  };
}

export function createPendingArtifact(options: CreatePendingArtifactOptions): PendingArtifactV1 {
  return {
    artifact_type: PENDING_ARTIFACT_TYPE,
    schema_version: PENDING_ARTIFACT_SCHEMA_VERSION,
    created_at_utc: options.createdAt,
    tool_version: options.toolVersion ?? DEFAULT_SNAPSHOT_TOOL_VERSION,
    source: options.source,
    identity: {
      module_path: options.identity.modulePath,
      module_id: options.identity.moduleId,
      test_name: options.identity.testName,
      explicit_name: options.identity.explicitName ?? null,
      ordinal: options.identity.ordinal,
      extension: options.identity.extension
    },
    format: options.format,
    description: options.description ?? null,
    verdict: options.verdict.status,
    old_body: options.oldBody,
    new_body: options.newBody,
    diff: options.verdict.status === "mismatch" ? toPendingArtifactDiff(options.verdict.diff) : null
  };
}

/** Replaces any pending artifact already present for the same accepted path. */
export function writePendingArtifact(acceptedPath: string, artifact: PendingArtifactV1): string {
  const pendingPath = pendingPathFor(acceptedPath);
  writeFileAtomically(pendingPath, `${JSON.stringify(artifact, null, 2)}\n`, artifact.source);
  return pendingPath;
}

export function parsePendingArtifact(content: string, pendingPath: string): PendingArtifactV1 {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SnapshotEngineError(
      `Pending artifact is not valid JSON: ${pendingPath}`,
      "CORRUPT_PENDING_ARTIFACT",
      { path: pendingPath, cause: error }
    );
  }

  const validator = getPendingArtifactValidator();
  if (!validator(parsed)) {
    const issues = mapAjvIssues(validator.errors);
    throw new SnapshotEngineError(
      `Pending artifact failed validation at ${describeFirstIssue(issues)}: ${pendingPath}`,
      "CORRUPT_PENDING_ARTIFACT",
      { path: pendingPath, issues }
    );
  }

  return parsed;
}

export function readPendingArtifact(pendingPath: string): PendingArtifactV1 {
  const content = readTextFileIfPresent(pendingPath);
  if (content === undefined) {
    throw new SnapshotEngineError(`Pending artifact no longer exists: ${pendingPath}`, "UNKNOWN_PENDING_ARTIFACT", {
      path: pendingPath
    });
  }

  return parsePendingArtifact(content, pendingPath);
}

/**
 * Writes the pending artifact's new body as the accepted snapshot, then
 * deletes the pending artifact. Returns the accepted path.
 */
export function promotePendingArtifact(pendingPath: string, options: PromotePendingArtifactOptions = {}): string {
  const acceptedPath = acceptedPathForPending(pendingPath);
  const artifact = readPendingArtifact(pendingPath);
  const updatedAt = (options.now ?? (() => new Date()))().toISOString();

  writeAcceptedSnapshot(
    acceptedPath,
    {
      metadata: {
        source: artifact.source,
        format: artifact.format,
        updatedAt,
        toolVersion: options.toolVersion ?? artifact.tool_version,
        ...(artifact.description !== null ? { description: artifact.description } : {})
      },
      body: artifact.new_body
    },
    artifact.source
  );
  removeFileIfPresent(pendingPath, artifact.source);

  return acceptedPath;
}

export function removePendingArtifact(pendingPath: string): void {
  if (!removeFileIfPresent(pendingPath)) {
    throw new SnapshotEngineError(`Pending artifact no longer exists: ${pendingPath}`, "UNKNOWN_PENDING_ARTIFACT", {
      path: pendingPath
    });
  }
}

/** Removes a leftover pending artifact beside `acceptedPath`; returns whether one existed. */
export function clearStalePendingArtifact(acceptedPath: string, identity?: string): boolean {
  return removeFileIfPresent(pendingPathFor(acceptedPath), identity);
}

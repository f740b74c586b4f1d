import assert from "node:assert/strict";
import { readdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import test from "node:test";

import {
  DEFAULT_SNAPSHOT_TOOL_VERSION,
  PENDING_ARTIFACT_SCHEMA_VERSION,
  PENDING_ARTIFACT_TYPE,
  SnapshotEngineError,
  acceptedPathForPending,
  compareSnapshot,
  createPendingArtifact,
  createSnapshotIdentity,
  diffLines,
  fromPendingArtifactDiff,
  pendingPathFor,
  promotePendingArtifact,
  readAcceptedSnapshot,
  readPendingArtifact,
  removePendingArtifact,
  resolveSnapshotPath,
  toPendingArtifactDiff,
  writePendingArtifact,
  type PendingArtifactV1
} from "../src/index.ts";
import { FIXED_NOW, createTempWorkspace, fixedNow } from "./helpers/workspace.ts";

function createMismatchArtifact(root: string): { acceptedPath: string; artifact: PendingArtifactV1 } {
  const identity = createSnapshotIdentity({
    workspaceRoot: root,
    test: { modulePath: "tests/config.test.ts", testName: "renders config" },
    format: "json"
  });
  const oldBody = '{\n  "a": 1\n}';
  const newBody = '{\n  "a": 2\n}';
  const verdict = compareSnapshot(newBody, { metadata: { source: "s" }, body: oldBody });
  assert.equal(verdict.status, "mismatch");
  if (verdict.status !== "mismatch") {
    throw new Error("expected a mismatch verdict");
  }

  return {
    acceptedPath: resolveSnapshotPath(identity),
    artifact: createPendingArtifact({
      identity,
      source: "tests/config.test.ts::renders config",
      format: "json",
      verdict,
      oldBody,
      newBody,
      createdAt: FIXED_NOW.toISOString()
    })
  };
}

test("createPendingArtifact builds a versioned envelope", () => {
  const workspace = createTempWorkspace();

  try {
    const { artifact } = createMismatchArtifact(workspace.root);

    assert.equal(artifact.artifact_type, PENDING_ARTIFACT_TYPE);
    assert.equal(artifact.schema_version, PENDING_ARTIFACT_SCHEMA_VERSION);
    assert.equal(artifact.tool_version, DEFAULT_SNAPSHOT_TOOL_VERSION);
    assert.equal(artifact.created_at_utc, "2026-03-01T12:00:00.000Z");
    assert.deepEqual(artifact.identity, {
      module_path: "tests/config.test.ts",
      module_id: "config.test",
      test_name: "renders config",
      explicit_name: null,
      ordinal: 1,
      extension: "snap"
    });
    assert.equal(artifact.verdict, "mismatch");
    assert.equal(artifact.description, null);
    assert.deepEqual(artifact.diff?.hunks[0]?.lines, [
      { kind: "context", text: "{" },
      { kind: "removed", text: '  "a": 1' },
      { kind: "added", text: '  "a": 2' },
      { kind: "context", text: "}" }
    ]);
  } finally {
    workspace.cleanup();
  }
});

test("writePendingArtifact stores the envelope beside the accepted path and replaces earlier runs", () => {
  const workspace = createTempWorkspace();

  try {
    const { acceptedPath, artifact } = createMismatchArtifact(workspace.root);

    const pendingPath = writePendingArtifact(acceptedPath, artifact);
    assert.equal(pendingPath, `${acceptedPath}.pending`);
    assert.equal(readFileSync(pendingPath, "utf8"), `${JSON.stringify(artifact, null, 2)}\n`);
    assert.deepEqual(readPendingArtifact(pendingPath), artifact);

    writePendingArtifact(acceptedPath, { ...artifact, new_body: '{\n  "a": 3\n}' });

    assert.equal(readPendingArtifact(pendingPath).new_body, '{\n  "a": 3\n}');
    assert.deepEqual(readdirSync(dirname(pendingPath)), ["config.test__renders%20config.snap.pending"]);
  } finally {
    workspace.cleanup();
  }
});

test("readPendingArtifact distinguishes missing and corrupt artifacts", () => {
  const workspace = createTempWorkspace();

  try {
    const missingPath = join(workspace.root, "gone.snap.pending");
    assert.throws(
      () => readPendingArtifact(missingPath),
      (error: unknown) =>
        error instanceof SnapshotEngineError && error.code === "UNKNOWN_PENDING_ARTIFACT" && error.path === missingPath
    );

    const brokenPath = join(workspace.root, "broken.snap.pending");
    writeFileSync(brokenPath, "{ not json", "utf8");
    assert.throws(
      () => readPendingArtifact(brokenPath),
      (error: unknown) => error instanceof SnapshotEngineError && error.code === "CORRUPT_PENDING_ARTIFACT"
    );

    const { artifact } = createMismatchArtifact(workspace.root);
    const { new_body: _dropped, ...withoutNewBody } = artifact;
    const invalidPath = join(workspace.root, "invalid.snap.pending");
    writeFileSync(invalidPath, JSON.stringify(withoutNewBody), "utf8");
    assert.throws(
      () => readPendingArtifact(invalidPath),
      (error: unknown) =>
        error instanceof SnapshotEngineError &&
        error.code === "CORRUPT_PENDING_ARTIFACT" &&
        error.issues.some((issue) => issue.keyword === "required")
    );
  } finally {
    workspace.cleanup();
  }
});

test("promotePendingArtifact writes the new body and removes the pending artifact", () => {
  const workspace = createTempWorkspace();

  try {
    const { acceptedPath, artifact } = createMismatchArtifact(workspace.root);
    const pendingPath = writePendingArtifact(acceptedPath, { ...artifact, description: "config rendering" });

    assert.equal(promotePendingArtifact(pendingPath, { now: fixedNow }), acceptedPath);

    assert.deepEqual(readAcceptedSnapshot(acceptedPath), {
      metadata: {
        source: "tests/config.test.ts::renders config",
        format: "json",
        updatedAt: "2026-03-01T12:00:00.000Z",
        toolVersion: DEFAULT_SNAPSHOT_TOOL_VERSION,
        description: "config rendering"
      },
      body: '{\n  "a": 2\n}'
    });
    assert.deepEqual(readdirSync(dirname(acceptedPath)), ["config.test__renders%20config.snap"]);
  } finally {
    workspace.cleanup();
  }
});

test("removePendingArtifact rejects handles that no longer exist", () => {
  const workspace = createTempWorkspace();

  try {
    const { acceptedPath, artifact } = createMismatchArtifact(workspace.root);
    const pendingPath = writePendingArtifact(acceptedPath, artifact);

    removePendingArtifact(pendingPath);

    assert.throws(
      () => removePendingArtifact(pendingPath),
      (error: unknown) => error instanceof SnapshotEngineError && error.code === "UNKNOWN_PENDING_ARTIFACT"
    );
  } finally {
    workspace.cleanup();
  }
});

test("pending paths map back to accepted paths", () => {
  assert.equal(acceptedPathForPending(pendingPathFor("/w/snapshots/a.snap")), "/w/snapshots/a.snap");
  assert.throws(
    () => acceptedPathForPending("/w/snapshots/a.snap"),
    (error: unknown) => error instanceof SnapshotEngineError && error.code === "INVALID_OPTIONS"
  );
});

test("stored diffs convert back to line diffs without loss", () => {
  const diff = diffLines("a\nb\nc", "a\nB\nc\nd");

  assert.deepEqual(fromPendingArtifactDiff(toPendingArtifactDiff(diff)), diff);
});

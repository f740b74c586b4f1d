import assert from "node:assert/strict";
import { existsSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import test from "node:test";

import {
  SnapshotAssertionError,
  SnapshotEngine,
  SnapshotEngineError,
  formatLineDiff,
  promotePendingArtifact,
  readAcceptedSnapshot,
  readPendingArtifact,
  redaction,
  snapshotValue,
  toSnapshotValue,
  type SnapshotEngineConfig
} from "../src/index.ts";
import { createRecordingLogger, createTempWorkspace, fixedNow } from "./helpers/workspace.ts";

const CONFIG_TEST = { modulePath: "tests/config.test.ts", testName: "renders config" };

function createEngine(root: string, overrides: Partial<SnapshotEngineConfig> = {}): SnapshotEngine {
  return new SnapshotEngine({ workspaceRoot: root, now: fixedNow, ...overrides });
}

test("a first assertion is New, fails, and leaves only a pending artifact", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root);
    const result = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ hello: "world" }));

    assert.deepEqual(result.verdict, { status: "new" });
    assert.equal(result.failed, true);
    assert.equal(result.acceptedPath, join(workspace.root, "tests", "snapshots", "config.test__renders%20config.snap"));
    assert.equal(result.pendingPath, `${result.acceptedPath}.pending`);
    assert.equal(existsSync(result.acceptedPath), false);

    const artifact = readPendingArtifact(`${result.acceptedPath}.pending`);
    assert.equal(artifact.new_body, '{\n  "hello": "world"\n}');
    assert.equal(artifact.old_body, null);
    assert.equal(artifact.diff, null);
    assert.equal(artifact.source, "tests/config.test.ts::renders config");
    assert.equal(artifact.created_at_utc, "2026-03-01T12:00:00.000Z");
  } finally {
    workspace.cleanup();
  }
});

test("an accepted snapshot passes for the same data in a different key order", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root);
    const first = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ b: 1, a: 2 }));
    assert.ok(first.pendingPath);
    promotePendingArtifact(first.pendingPath, { now: fixedNow });

    const second = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 2, b: 1 }));

    assert.deepEqual(second.verdict, { status: "pass" });
    assert.equal(second.failed, false);
    assert.equal(second.pendingPath, null);
    assert.deepEqual(readdirSync(dirname(second.acceptedPath)), ["config.test__renders%20config.snap"]);
  } finally {
    workspace.cleanup();
  }
});

test("a mismatch reports the diff and never touches the accepted file", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root);
    const first = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 }));
    assert.ok(first.pendingPath);
    promotePendingArtifact(first.pendingPath, { now: fixedNow });
    const acceptedBefore = readFileSync(first.acceptedPath, "utf8");

    const result = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 2 }));

    assert.equal(result.verdict.status, "mismatch");
    assert.equal(result.failed, true);
    if (result.verdict.status === "mismatch") {
      assert.deepEqual(result.verdict.diff.hunks[0]?.lines, [
        { kind: "context", text: "{" },
        { kind: "removed", text: '  "a": 1' },
        { kind: "added", text: '  "a": 2' },
        { kind: "context", text: "}" }
      ]);
    }
    assert.equal(readFileSync(first.acceptedPath, "utf8"), acceptedBefore);

    const artifact = readPendingArtifact(`${result.acceptedPath}.pending`);
    assert.equal(artifact.old_body, '{\n  "a": 1\n}');
    assert.equal(artifact.new_body, '{\n  "a": 2\n}');
  } finally {
    workspace.cleanup();
  }
});

test("redactions make volatile fields compare equal across runs", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root, { policy: { autoAccept: true } });
    const redactions = [{ selector: ".id", action: redaction.replace("[id]") }];

    const first = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ id: "run-1", name: "x" }), {
      redactions
    });
    assert.equal(first.promoted, true);
    assert.equal(readAcceptedSnapshot(first.acceptedPath)?.body, '{\n  "id": "[id]",\n  "name": "x"\n}');

    const second = createEngine(workspace.root)
      .beginTest(CONFIG_TEST)
      .assertSnapshot(toSnapshotValue({ id: "run-2", name: "x" }), { redactions });
    assert.deepEqual(second.verdict, { status: "pass" });
  } finally {
    workspace.cleanup();
  }
});

test("unnamed assertions get ordinals that restart with each invocation", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root);
    const invocation = engine.beginTest(CONFIG_TEST);

    const first = invocation.assertSnapshot(snapshotValue.text("one"), { format: "text" });
    const named = invocation.assertSnapshot(snapshotValue.text("named"), { format: "text", name: "summary" });
    const second = invocation.assertSnapshot(snapshotValue.text("two"), { format: "text" });
    const duplicate = invocation.assertSnapshot(snapshotValue.text("two"), { format: "text", allowDuplicates: true });

    assert.equal(basename(first.acceptedPath), "config.test__renders%20config.snap");
    assert.equal(basename(named.acceptedPath), "config.test__renders%20config__summary.snap");
    assert.equal(basename(second.acceptedPath), "config.test__renders%20config-2.snap");
    assert.equal(duplicate.acceptedPath, second.acceptedPath);

    const retried = engine.beginTest(CONFIG_TEST).assertSnapshot(snapshotValue.text("one"), { format: "text" });
    assert.equal(retried.acceptedPath, first.acceptedPath);
  } finally {
    workspace.cleanup();
  }
});

test("warn mode tolerates mismatches and logs them", () => {
  const workspace = createTempWorkspace();

  try {
    const { logger, entries } = createRecordingLogger();
    const seed = createEngine(workspace.root, { policy: { autoAccept: true } });
    seed.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 }));

    const engine = createEngine(workspace.root, { policy: { onMismatch: "warn" }, logger });
    const result = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 2 }));

    assert.equal(result.verdict.status, "mismatch");
    assert.equal(result.failed, false);
    assert.equal(result.pendingPath, null);
    assert.equal(existsSync(`${result.acceptedPath}.pending`), false);
    assert.deepEqual(
      entries.filter((entry) => entry.level === "warn").map((entry) => entry.message),
      ["Snapshot mismatch tolerated by policy"]
    );
  } finally {
    workspace.cleanup();
  }
});

test("pendingPersistence never still fails but writes nothing", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root, { policy: { pendingPersistence: "never" } });
    const result = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 }));

    assert.equal(result.failed, true);
    assert.equal(result.pendingPath, null);
    assert.equal(existsSync(join(workspace.root, "tests", "snapshots")), false);
  } finally {
    workspace.cleanup();
  }
});

test("auto-accept promotes directly and clears a stale pending artifact", () => {
  const workspace = createTempWorkspace();

  try {
    const failing = createEngine(workspace.root).beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 }));
    assert.ok(failing.pendingPath);

    const { logger, entries } = createRecordingLogger();
    const engine = createEngine(workspace.root, {
      policy: { autoAccept: true },
      logger,
      toolVersion: "snapkeep-test@0.0.0"
    });
    const result = engine
      .beginTest(CONFIG_TEST)
      .assertSnapshot(toSnapshotValue({ a: 1 }), { description: "rendered configuration" });

    assert.equal(result.promoted, true);
    assert.equal(result.failed, false);
    assert.equal(existsSync(failing.pendingPath), false);
    assert.deepEqual(readAcceptedSnapshot(result.acceptedPath), {
      metadata: {
        source: "tests/config.test.ts::renders config",
        format: "json",
        updatedAt: "2026-03-01T12:00:00.000Z",
        toolVersion: "snapkeep-test@0.0.0",
        description: "rendered configuration"
      },
      body: '{\n  "a": 1\n}'
    });
    assert.ok(entries.some((entry) => entry.level === "info" && entry.message === "Auto-accepted snapshot"));
  } finally {
    workspace.cleanup();
  }
});

test("a passing assertion removes a pending artifact left by an earlier run", () => {
  const workspace = createTempWorkspace();

  try {
    createEngine(workspace.root, { policy: { autoAccept: true } })
      .beginTest(CONFIG_TEST)
      .assertSnapshot(toSnapshotValue({ a: 1 }));

    const engine = createEngine(workspace.root);
    const mismatch = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 2 }));
    assert.ok(mismatch.pendingPath);
    assert.equal(existsSync(mismatch.pendingPath), true);

    const pass = engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 }));

    assert.deepEqual(pass.verdict, { status: "pass" });
    assert.equal(existsSync(mismatch.pendingPath), false);
  } finally {
    workspace.cleanup();
  }
});

test("a mismatch that is not persisted removes the pending artifact of an earlier run", () => {
  for (const policy of [{ onMismatch: "warn" as const }, { pendingPersistence: "never" as const }]) {
    const workspace = createTempWorkspace();

    try {
      createEngine(workspace.root, { policy: { autoAccept: true } })
        .beginTest(CONFIG_TEST)
        .assertSnapshot(toSnapshotValue({ a: 1 }));

      const earlier = createEngine(workspace.root).beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 2 }));
      assert.ok(earlier.pendingPath);
      assert.equal(readPendingArtifact(earlier.pendingPath).new_body, '{\n  "a": 2\n}');

      const { logger, entries } = createRecordingLogger();
      const result = createEngine(workspace.root, { policy, logger })
        .beginTest(CONFIG_TEST)
        .assertSnapshot(toSnapshotValue({ a: 3 }));

      assert.equal(result.verdict.status, "mismatch");
      assert.equal(result.pendingPath, null);
      assert.equal(existsSync(earlier.pendingPath), false);
      assert.ok(entries.some((entry) => entry.level === "debug" && entry.message === "Cleared stale pending artifact"));
      assert.equal(readAcceptedSnapshot(result.acceptedPath)?.body, '{\n  "a": 1\n}');
    } finally {
      workspace.cleanup();
    }
  }
});

test("expectSnapshot throws a SnapshotAssertionError carrying the rendered diff", () => {
  const workspace = createTempWorkspace();

  try {
    createEngine(workspace.root, { policy: { autoAccept: true } })
      .beginTest(CONFIG_TEST)
      .assertSnapshot(toSnapshotValue({ a: 1 }));

    const invocation = createEngine(workspace.root).beginTest(CONFIG_TEST);

    assert.throws(
      () => invocation.expectSnapshot(toSnapshotValue({ a: 2 })),
      (error: unknown) =>
        error instanceof SnapshotAssertionError &&
        error.verdict.status === "mismatch" &&
        error.identity === "tests/config.test.ts::renders config" &&
        error.renderedDiff === formatLineDiff(error.verdict.diff) &&
        error.renderedDiff === '@@ -1,3 +1,3 @@\n {\n-  "a": 1\n+  "a": 2\n }'
    );

    const passing = createEngine(workspace.root).beginTest(CONFIG_TEST).expectSnapshot(toSnapshotValue({ a: 1 }));
    assert.deepEqual(passing.verdict, { status: "pass" });
  } finally {
    workspace.cleanup();
  }
});

test("malformed values and corrupt accepted files surface as errors", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root);

    assert.throws(
      () => engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ ratio: Number.POSITIVE_INFINITY })),
      (error: unknown) => error instanceof SnapshotEngineError && error.code === "MALFORMED_VALUE"
    );
    assert.equal(existsSync(join(workspace.root, "tests", "snapshots")), false);

    const seeded = createEngine(workspace.root, { policy: { autoAccept: true } })
      .beginTest(CONFIG_TEST)
      .assertSnapshot(toSnapshotValue({ a: 1 }));
    writeFileSync(seeded.acceptedPath, "truncated", "utf8");

    assert.throws(
      () => engine.beginTest(CONFIG_TEST).assertSnapshot(toSnapshotValue({ a: 1 })),
      (error: unknown) =>
        error instanceof SnapshotEngineError &&
        error.code === "CORRUPT_ACCEPTED_FILE" &&
        error.path === seeded.acceptedPath
    );
  } finally {
    workspace.cleanup();
  }
});

test("the engine rejects blank snapshot names and workspace roots", () => {
  const workspace = createTempWorkspace();

  try {
    assert.throws(
      () => createEngine(workspace.root).beginTest(CONFIG_TEST).assertSnapshot(snapshotValue.null(), { name: " " }),
      (error: unknown) => error instanceof SnapshotEngineError && error.code === "INVALID_OPTIONS"
    );
    assert.throws(
      () => new SnapshotEngine({ workspaceRoot: "" }),
      (error: unknown) => error instanceof SnapshotEngineError && error.code === "INVALID_OPTIONS"
    );
  } finally {
    workspace.cleanup();
  }
});

test("csv snapshots store canonical delimited text", () => {
  const workspace = createTempWorkspace();

  try {
    const engine = createEngine(workspace.root, { policy: { autoAccept: true } });
    const result = engine
      .beginTest({ modulePath: "tests/report.test.ts", testName: "exports rows" })
      .assertSnapshot(toSnapshotValue([{ name: "Ada", city: "London, UK" }]), { format: "csv" });

    assert.equal(result.canonicalText, 'name,city\nAda,"London, UK"');
    assert.equal(
      readFileSync(result.acceptedPath, "utf8"),
      [
        "# schema_version: 1",
        "# source: tests/report.test.ts::exports rows",
        "# format: csv",
        "# updated_at: 2026-03-01T12:00:00.000Z",
        "# tool_version: @snapkeep/engine@0.1.0",
        "",
        "name,city",
        'Ada,"London, UK"',
        ""
      ].join("\n")
    );
  } finally {
    workspace.cleanup();
  }
});

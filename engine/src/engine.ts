import { canonicalize, isSnapshotFormat, type DelimitedRecordOptions, type SnapshotFormat } from "./canonicalize.ts";
import { compareSnapshot, formatLineDiff, type Verdict } from "./compare.ts";
import { SnapshotEngineError } from "./errors.ts";
import {
  createSnapshotIdentity,
  describeTestIdentity,
  resolveSnapshotPath,
  snapshotIdentityLabel,
  SnapshotOrdinalCounter,
  type SnapshotIdentity,
  type TestIdentity
} from "./locator.ts";
import { createLogger, type SnapshotLogger } from "./logger.ts";
import {
  clearStalePendingArtifact,
  createPendingArtifact,
  DEFAULT_SNAPSHOT_TOOL_VERSION,
  writePendingArtifact
} from "./pending.ts";
import { normalizeSnapshotPolicy, resolveVerdictDisposition, type SnapshotPolicy } from "./policy.ts";
import { describeRedactionRule, redact, type RedactionRule } from "./redact.ts";
import { readAcceptedSnapshot, writeAcceptedSnapshot } from "./store.ts";
import type { SnapshotValue } from "./value.ts";

export interface SnapshotEngineConfig {
  workspaceRoot: string;
  policy?: Partial<SnapshotPolicy>;
  logger?: boolean | SnapshotLogger;
  now?: () => Date;
  toolVersion?: string;
}

export interface SnapshotAssertionOptions {
  /** Explicit snapshot name; suppresses the ordinal. */
  name?: string;
  format?: SnapshotFormat;
  redactions?: readonly RedactionRule[];
  description?: string;
  /** Reuse the current ordinal instead of advancing it. */
  allowDuplicates?: boolean;
  delimited?: DelimitedRecordOptions;
}

export interface SnapshotAssertionResult {
  verdict: Verdict;
  /** The policy escalated the verdict to a failure. */
  failed: boolean;
  identity: SnapshotIdentity;
  acceptedPath: string;
  /** Set when this assertion wrote a pending artifact. */
  pendingPath: string | null;
  promoted: boolean;
  canonicalText: string;
}

export class SnapshotAssertionError extends Error {
  readonly verdict: Exclude<Verdict, { status: "pass" }>;
  readonly identity: string;
  readonly acceptedPath: string;
  readonly pendingPath: string | null;
  readonly renderedDiff: string | null;

  constructor(result: SnapshotAssertionResult, verdict: Exclude<Verdict, { status: "pass" }>) {
    const identity = snapshotIdentityLabel(result.identity);
    const renderedDiff = verdict.status === "mismatch" ? formatLineDiff(verdict.diff) : null;
    const summary =
      verdict.status === "new"
        ? `Snapshot ${identity} has no accepted snapshot at ${result.acceptedPath}`
        : `Snapshot ${identity} does not match ${result.acceptedPath}`;
    const pendingHint = result.pendingPath ? `\nReview the pending artifact at ${result.pendingPath}` : "";

    super(`${summary}${pendingHint}${renderedDiff ? `\n${renderedDiff}` : ""}`);
    this.name = "SnapshotAssertionError";
    this.verdict = verdict;
    this.identity = identity;
    this.acceptedPath = result.acceptedPath;
    this.pendingPath = result.pendingPath;
    this.renderedDiff = renderedDiff;
  }
}

function resolveTimestamp(now: () => Date): string {
  const value = now();
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new SnapshotEngineError("Snapshot engine now() must return a valid Date", "INVALID_OPTIONS");
  }

  return value.toISOString();
}

function normalizeAssertionOptions(options: SnapshotAssertionOptions): SnapshotAssertionOptions & {
  format: SnapshotFormat;
} {
  const format = options.format ?? "json";
  if (!isSnapshotFormat(format)) {
    throw new SnapshotEngineError(`Unknown snapshot format ${JSON.stringify(format)}`, "INVALID_OPTIONS");
  }

  if (options.name !== undefined && (typeof options.name !== "string" || options.name.trim().length === 0)) {
    throw new SnapshotEngineError("Snapshot name must be a non-empty string", "INVALID_OPTIONS");
  }

  return { ...options, format };
}

/**
 * Entry point for snapshot assertions. Holds the workspace root, policy and
 * injected clock; per-test state lives on {@link SnapshotTestInvocation}.
 */
export class SnapshotEngine {
  readonly workspaceRoot: string;
  readonly policy: Readonly<SnapshotPolicy>;
  readonly logger: SnapshotLogger;
  readonly toolVersion: string;
  private readonly now: () => Date;

  constructor(config: SnapshotEngineConfig) {
    if (typeof config.workspaceRoot !== "string" || config.workspaceRoot.trim().length === 0) {
      throw new SnapshotEngineError("Snapshot engine workspaceRoot must be a non-empty string", "INVALID_OPTIONS");
    }

    this.workspaceRoot = config.workspaceRoot;
    this.policy = Object.freeze(normalizeSnapshotPolicy(config.policy));
    this.logger = createLogger(config.logger);
    this.toolVersion = config.toolVersion ?? DEFAULT_SNAPSHOT_TOOL_VERSION;
    this.now = config.now ?? (() => new Date());
  }

  /** Starts one execution of a test. A retried test gets a new invocation. */
  beginTest(test: TestIdentity): SnapshotTestInvocation {
    return new SnapshotTestInvocation(this, test);
  }

  assertSnapshot(
    test: TestIdentity,
    value: SnapshotValue,
    ordinal: number,
    options: SnapshotAssertionOptions = {}
  ): SnapshotAssertionResult {
    const normalized = normalizeAssertionOptions(options);
    const identity = createSnapshotIdentity({
      workspaceRoot: this.workspaceRoot,
      test,
      explicitName: normalized.name,
      ordinal,
      format: normalized.format
    });
    const label = snapshotIdentityLabel(identity);
    const acceptedPath = resolveSnapshotPath(identity);

    const rules = normalized.redactions ?? [];
    if (rules.length > 0) {
      this.logger.debug("Applying redactions", { identity: label, rules: rules.map(describeRedactionRule) });
    }
    const canonicalText = canonicalize(redact(value, rules), normalized.format, {
      delimited: normalized.delimited
    });

    const stored = readAcceptedSnapshot(acceptedPath, label);
    const verdict = compareSnapshot(canonicalText, stored);
    const disposition = resolveVerdictDisposition(verdict, this.policy);
    this.logger.debug("Snapshot verdict", { identity: label, status: verdict.status, path: acceptedPath });

    const result: SnapshotAssertionResult = {
      verdict,
      failed: disposition.failed,
      identity,
      acceptedPath,
      pendingPath: null,
      promoted: false,
      canonicalText
    };

    if (verdict.status === "pass") {
      if (clearStalePendingArtifact(acceptedPath, label)) {
        this.logger.debug("Cleared stale pending artifact", { identity: label, path: acceptedPath });
      }
      return result;
    }

    const source = describeTestIdentity(test);
    if (disposition.promote) {
      writeAcceptedSnapshot(
        acceptedPath,
        {
          metadata: {
            source,
            format: normalized.format,
            updatedAt: resolveTimestamp(this.now),
            toolVersion: this.toolVersion,
            ...(normalized.description !== undefined ? { description: normalized.description } : {})
          },
          body: canonicalText
        },
        label
      );
      clearStalePendingArtifact(acceptedPath, label);
      this.logger.info("Auto-accepted snapshot", { identity: label, status: verdict.status, path: acceptedPath });
      return { ...result, promoted: true };
    }

    if (disposition.persistPending) {
      const artifact = createPendingArtifact({
        identity,
        source,
        format: normalized.format,
        description: normalized.description,
        verdict,
        oldBody: stored?.body ?? null,
        newBody: canonicalText,
        createdAt: resolveTimestamp(this.now),
        toolVersion: this.toolVersion
      });
      result.pendingPath = writePendingArtifact(acceptedPath, artifact);
      this.logger.info("Wrote pending snapshot", { identity: label, status: verdict.status, path: result.pendingPath });
    } else if (clearStalePendingArtifact(acceptedPath, label)) {
      this.logger.debug("Cleared stale pending artifact", { identity: label, path: acceptedPath });
    }

    if (!disposition.failed) {
      this.logger.warn("Snapshot mismatch tolerated by policy", { identity: label, path: acceptedPath });
    }

    return result;
  }
}

/**
 * One execution of one test. Unnamed assertions are numbered in call order:
 * the first keeps the plain name, later ones get `-2`, `-3`, ...
 */
export class SnapshotTestInvocation {
  readonly test: TestIdentity;
  private readonly engine: SnapshotEngine;
  private readonly ordinals = new SnapshotOrdinalCounter();

  constructor(engine: SnapshotEngine, test: TestIdentity) {
    this.engine = engine;
    this.test = test;
  }

  assertSnapshot(value: SnapshotValue, options: SnapshotAssertionOptions = {}): SnapshotAssertionResult {
    const ordinal =
      options.name === undefined ? this.ordinals.next({ allowDuplicates: options.allowDuplicates }) : 1;
    return this.engine.assertSnapshot(this.test, value, ordinal, options);
  }

  /** Like {@link assertSnapshot}, but throws when the policy escalates the verdict. */
  expectSnapshot(value: SnapshotValue, options: SnapshotAssertionOptions = {}): SnapshotAssertionResult {
    const result = this.assertSnapshot(value, options);
    if (result.failed && result.verdict.status !== "pass") {
      throw new SnapshotAssertionError(result, result.verdict);
    }

    return result;
  }
}

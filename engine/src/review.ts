import { lstatSync, readdirSync, type Stats } from "node:fs";
import { join, relative, resolve, sep } from "node:path";

import { SnapshotEngineError, storageError } from "./errors.ts";
import { createLogger, type SnapshotLogger } from "./logger.ts";
import {
  acceptedPathForPending,
  PENDING_ARTIFACT_SUFFIX,
  promotePendingArtifact,
  readPendingArtifact,
  removePendingArtifact,
  type PendingArtifactV1
} from "./pending.ts";
import { emitReviewJournalEntry, REVIEW_JOURNAL_SCHEMA_VERSION, type ReviewDecision } from "./review-journal.ts";

const IGNORED_DIRECTORY_NAMES = new Set([".git", "node_modules"]);

export interface PendingArtifactHandle {
  pendingPath: string;
  acceptedPath: string;
}

export type ReviewSessionState = "enumerated" | "reviewing" | "done";

export interface ReviewSummary {
  accepted: number;
  rejected: number;
  skipped: number;
}

export interface ReviewDecisionRecord {
  handle: PendingArtifactHandle;
  decision: ReviewDecision;
  decidedAt: string;
  source: string;
}

export interface ReviewSessionOptions {
  root: string;
  logger?: boolean | SnapshotLogger;
  now?: () => Date;
  toolVersion?: string;
  /** Append every decision to this JSONL file. */
  journalPath?: string;
}

function compareStableStrings(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

function readSortedEntries(directory: string): string[] {
  try {
    return readdirSync(directory).sort(compareStableStrings);
  } catch (error) {
    throw storageError("list", directory, error);
  }
}

function statIfPresent(path: string): Stats | undefined {
  try {
    return lstatSync(path);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw storageError("stat", path, error);
  }
}

function* walkPendingArtifacts(directory: string): Generator<PendingArtifactHandle> {
  for (const entry of readSortedEntries(directory)) {
    const path = join(directory, entry);
    const stats = statIfPresent(path);
    if (!stats || stats.isSymbolicLink()) {
      continue;
    }

    if (stats.isDirectory()) {
      if (!IGNORED_DIRECTORY_NAMES.has(entry)) {
        yield* walkPendingArtifacts(path);
      }
      continue;
    }

    if (stats.isFile() && entry.endsWith(PENDING_ARTIFACT_SUFFIX) && entry !== PENDING_ARTIFACT_SUFFIX) {
      yield { pendingPath: path, acceptedPath: acceptedPathForPending(path) };
    }
  }
}

/**
 * Lazily yields pending artifacts under `root` in sorted path order. A root
 * that does not exist yields nothing; a root that is itself a pending
 * artifact yields just that artifact.
 */
export function* enumeratePendingArtifacts(root: string): Generator<PendingArtifactHandle> {
  const resolvedRoot = resolve(root);
  const stats = statIfPresent(resolvedRoot);
  if (!stats || stats.isSymbolicLink()) {
    return;
  }

  if (stats.isFile()) {
    if (resolvedRoot.endsWith(PENDING_ARTIFACT_SUFFIX)) {
      yield { pendingPath: resolvedRoot, acceptedPath: acceptedPathForPending(resolvedRoot) };
    }
    return;
  }

  if (stats.isDirectory()) {
    yield* walkPendingArtifacts(resolvedRoot);
  }
}

export function describePendingHandle(handle: PendingArtifactHandle, root: string): string {
  const relativePath = relative(resolve(root), handle.pendingPath);
  return relativePath.length > 0 && !relativePath.startsWith("..") ? relativePath.split(sep).join("/") : handle.pendingPath;
}

/**
 * Walks the pending artifacts under a root one at a time. Each decision is
 * applied immediately; stopping early leaves the remaining artifacts
 * untouched.
 */
export class ReviewSession {
  readonly root: string;
  private readonly logger: SnapshotLogger;
  private readonly now: () => Date;
  private readonly toolVersion?: string;
  private readonly journalPath?: string;
  private readonly iterator: Iterator<PendingArtifactHandle>;
  private currentHandle: PendingArtifactHandle | null = null;
  private sessionState: ReviewSessionState = "enumerated";
  private readonly counts: ReviewSummary = { accepted: 0, rejected: 0, skipped: 0 };

  constructor(options: ReviewSessionOptions) {
    if (typeof options.root !== "string" || options.root.trim().length === 0) {
      throw new SnapshotEngineError("Review root must be a non-empty string", "INVALID_OPTIONS");
    }

    this.root = resolve(options.root);
    this.logger = createLogger(options.logger);
    this.now = options.now ?? (() => new Date());
    this.toolVersion = options.toolVersion;
    this.journalPath = options.journalPath;
    this.iterator = enumeratePendingArtifacts(this.root);
  }

  get state(): ReviewSessionState {
    return this.sessionState;
  }

  get current(): PendingArtifactHandle | null {
    return this.currentHandle;
  }

  /** Advances to the next pending artifact, or to `done` when none remain. */
  next(): PendingArtifactHandle | null {
    if (this.sessionState === "reviewing") {
      throw new SnapshotEngineError("Decide on the current pending artifact before advancing", "INVALID_OPTIONS", {
        path: this.currentHandle?.pendingPath
      });
    }

    if (this.sessionState === "done") {
      return null;
    }

    const step = this.iterator.next();
    if (step.done) {
      this.sessionState = "done";
      this.currentHandle = null;
      this.logger.info("Review session finished", { root: this.root, ...this.counts });
      return null;
    }

    this.currentHandle = step.value;
    this.sessionState = "reviewing";
    return step.value;
  }

  /** A failed read releases the artifact so the session can advance past it. */
  inspect(): PendingArtifactV1 {
    const handle = this.requireCurrent();
    try {
      return readPendingArtifact(handle.pendingPath);
    } catch (error) {
      this.release(handle, error);
      throw error;
    }
  }

  decide(decision: ReviewDecision): ReviewDecisionRecord {
    const handle = this.requireCurrent();
    let record: ReviewDecisionRecord;
    try {
      record = decidePendingArtifact(handle, decision, {
        now: this.now,
        toolVersion: this.toolVersion,
        journalPath: this.journalPath
      });
    } catch (error) {
      this.release(handle, error);
      throw error;
    }

    if (decision === "accept") this.counts.accepted += 1;
    if (decision === "reject") this.counts.rejected += 1;
    if (decision === "skip") this.counts.skipped += 1;

    this.logger.info("Review decision", {
      decision,
      path: describePendingHandle(handle, this.root),
      source: record.source
    });

    this.currentHandle = null;
    this.sessionState = "enumerated";
    return record;
  }

  summary(): ReviewSummary {
    return { ...this.counts };
  }

  private release(handle: PendingArtifactHandle, error: unknown): void {
    this.logger.warn("Released pending artifact after a failed review step", {
      path: describePendingHandle(handle, this.root),
      code: error instanceof SnapshotEngineError ? error.code : undefined
    });
    this.currentHandle = null;
    this.sessionState = "enumerated";
  }

  private requireCurrent(): PendingArtifactHandle {
    if (this.sessionState !== "reviewing" || !this.currentHandle) {
      throw new SnapshotEngineError("No pending artifact is under review", "INVALID_OPTIONS");
    }

    return this.currentHandle;
  }
}

export interface DecidePendingArtifactOptions {
  now?: () => Date;
  toolVersion?: string;
  journalPath?: string;
}

/**
 * Applies one decision. The artifact is read first, so a handle whose file
 * was removed out of band fails with `UNKNOWN_PENDING_ARTIFACT` for every
 * decision, including `skip`.
 */
export function decidePendingArtifact(
  handle: PendingArtifactHandle,
  decision: ReviewDecision,
  options: DecidePendingArtifactOptions = {}
): ReviewDecisionRecord {
  const now = options.now ?? (() => new Date());
  const artifact = readPendingArtifact(handle.pendingPath);

  switch (decision) {
    case "accept":
      promotePendingArtifact(handle.pendingPath, { now, toolVersion: options.toolVersion });
      break;
    case "reject":
      removePendingArtifact(handle.pendingPath);
      break;
    case "skip":
      break;
  }

  const record: ReviewDecisionRecord = {
    handle,
    decision,
    decidedAt: now().toISOString(),
    source: artifact.source
  };

  emitReviewJournalEntry(
    {
      schema_version: REVIEW_JOURNAL_SCHEMA_VERSION,
      decided_at: record.decidedAt,
      decision,
      pending_path: handle.pendingPath,
      accepted_path: handle.acceptedPath,
      source: record.source
    },
    { outputPath: options.journalPath }
  );

  return record;
}

export type ReviewDecider = (artifact: PendingArtifactV1, handle: PendingArtifactHandle) => ReviewDecision;

/** Drives a full session with a scripted decider and returns the counts. */
export function runReviewSession(options: ReviewSessionOptions, decider: ReviewDecider): ReviewSummary {
  const session = new ReviewSession(options);
  for (let handle = session.next(); handle !== null; handle = session.next()) {
    session.decide(decider(session.inspect(), handle));
  }

  return session.summary();
}

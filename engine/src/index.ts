export {
  CANONICAL_FLOAT_DECIMAL_PLACES,
  CANONICAL_INDENT,
  DEFAULT_DELIMITER,
  SNAPSHOT_FORMATS,
  canonicalize,
  formatCanonicalFloat,
  isSnapshotFormat,
  quoteDelimitedField,
  type CanonicalizeOptions,
  type DelimitedRecordOptions,
  type SnapshotFormat
} from "./canonicalize.ts";
export {
  DEFAULT_DIFF_CONTEXT_LINES,
  DEFAULT_MAX_DIFF_CELLS,
  compareSnapshot,
  diffLines,
  formatLineDiff,
  type DiffHunk,
  type DiffLine,
  type DiffLineKind,
  type LineDiff,
  type Verdict,
  type VerdictStatus
} from "./compare.ts";
export { parseDelimitedRecords, type ParseDelimitedRecordsOptions } from "./delimited.ts";
export {
  SnapshotAssertionError,
  SnapshotEngine,
  SnapshotTestInvocation,
  type SnapshotAssertionOptions,
  type SnapshotAssertionResult,
  type SnapshotEngineConfig
} from "./engine.ts";
export {
  SnapshotEngineError,
  type SnapshotEngineErrorCode,
  type SnapshotEngineIssue
} from "./errors.ts";
export {
  SNAPSHOT_DIRECTORY_NAME,
  SnapshotOrdinalCounter,
  createSnapshotIdentity,
  describeTestIdentity,
  resolveSnapshotPath,
  sanitizeFileNameComponent,
  snapshotExtensionForFormat,
  snapshotFileName,
  snapshotIdentityLabel,
  type SnapshotIdentity,
  type TestIdentity
} from "./locator.ts";
export {
  consoleLogger,
  createLogger,
  silentLogger,
  type SnapshotLogLevel,
  type SnapshotLogger
} from "./logger.ts";
export {
  DEFAULT_SNAPSHOT_TOOL_VERSION,
  PENDING_ARTIFACT_SCHEMA_VERSION,
  PENDING_ARTIFACT_SUFFIX,
  PENDING_ARTIFACT_TYPE,
  acceptedPathForPending,
  clearStalePendingArtifact,
  createPendingArtifact,
  fromPendingArtifactDiff,
  pendingPathFor,
  promotePendingArtifact,
  readPendingArtifact,
  removePendingArtifact,
  toPendingArtifactDiff,
  writePendingArtifact,
  type CreatePendingArtifactOptions,
  type PendingArtifactDiffV1,
  type PendingArtifactV1
} from "./pending.ts";
export {
  DEFAULT_SNAPSHOT_POLICY,
  PolicyValidationError,
  loadSnapshotPolicy,
  loadSnapshotPolicyFile,
  normalizeSnapshotPolicy,
  resolvePolicyFromEnvironment,
  resolveVerdictDisposition,
  type MismatchMode,
  type PendingPersistenceMode,
  type SnapshotEnvironment,
  type SnapshotPolicy,
  type SnapshotPolicyDocumentV1,
  type VerdictDisposition
} from "./policy.ts";
export {
  MAX_ROUND_PRECISION,
  describeRedactionRule,
  redact,
  redaction,
  type RedactionAction,
  type RedactionRule,
  type RedactionSelector
} from "./redact.ts";
export {
  ReviewSession,
  decidePendingArtifact,
  enumeratePendingArtifacts,
  runReviewSession,
  type PendingArtifactHandle,
  type ReviewDecider,
  type ReviewDecisionRecord,
  type ReviewSessionOptions,
  type ReviewSessionState,
  type ReviewSummary
} from "./review.ts";
export {
  REVIEW_JOURNAL_SCHEMA_VERSION,
  type ReviewDecision,
  type ReviewJournalEntryV1
} from "./review-journal.ts";
export {
  ACCEPTED_SNAPSHOT_SCHEMA_VERSION,
  parseAcceptedSnapshot,
  readAcceptedSnapshot,
  serializeAcceptedSnapshot,
  writeAcceptedSnapshot,
  type AcceptedSnapshot,
  type AcceptedSnapshotMetadata
} from "./store.ts";
export {
  describeValuePath,
  snapshotValue,
  toSnapshotValue,
  type SnapshotValue,
  type SnapshotValueKind
} from "./value.ts";

import { readFileSync } from "node:fs";

import type { Verdict } from "./compare.ts";
import { storageError, type SnapshotEngineIssue } from "./errors.ts";
import { createSchemaValidator, describeFirstIssue, isRecord, mapAjvIssues } from "./schema-validation.ts";

export const SNAPSHOT_POLICY_SCHEMA_VERSION = "1.0.0";
export const MISMATCH_MODES = ["fail", "warn"] as const;
export const PENDING_PERSISTENCE_MODES = ["always", "on-failure-only", "never"] as const;

export type MismatchMode = (typeof MISMATCH_MODES)[number];
export type PendingPersistenceMode = (typeof PENDING_PERSISTENCE_MODES)[number];

export interface SnapshotPolicy {
  onMismatch: MismatchMode;
  pendingPersistence: PendingPersistenceMode;
  autoAccept: boolean;
}

/** On-disk policy document. */
export interface SnapshotPolicyDocumentV1 {
  schema_version: typeof SNAPSHOT_POLICY_SCHEMA_VERSION;
  on_mismatch?: MismatchMode;
  pending_persistence?: PendingPersistenceMode;
  auto_accept?: boolean;
}

export const DEFAULT_SNAPSHOT_POLICY: Readonly<SnapshotPolicy> = Object.freeze({
  onMismatch: "fail",
  pendingPersistence: "on-failure-only",
  autoAccept: false
});

export type PolicyValidationCode = "INVALID_INPUT" | "SCHEMA_VALIDATION_FAILED" | "UNKNOWN_ENVIRONMENT_VALUE";

export class PolicyValidationError extends Error {
  readonly code: PolicyValidationCode;
  readonly issues: SnapshotEngineIssue[];

  constructor(params: { code: PolicyValidationCode; message: string; issues?: SnapshotEngineIssue[] }) {
    super(params.message);
    this.name = "PolicyValidationError";
    this.code = params.code;
    this.issues = params.issues ?? [];
  }
}

export interface VerdictDisposition {
  /** The verdict is escalated to a caller-visible failure. */
  failed: boolean;
  persistPending: boolean;
  promote: boolean;
}

export type SnapshotEnvironment = Readonly<Record<string, string | undefined>>;

const getPolicyDocumentValidator = createSchemaValidator<SnapshotPolicyDocumentV1>(
  "../../docs/schemas/snapshot-policy-v1.schema.json"
);

const MISMATCH_MODE_SET = new Set<string>(MISMATCH_MODES);
const PENDING_PERSISTENCE_MODE_SET = new Set<string>(PENDING_PERSISTENCE_MODES);

function isMismatchMode(value: unknown): value is MismatchMode {
  return typeof value === "string" && MISMATCH_MODE_SET.has(value);
}

function isPendingPersistenceMode(value: unknown): value is PendingPersistenceMode {
  return typeof value === "string" && PENDING_PERSISTENCE_MODE_SET.has(value);
}

function invalidField(field: string, message: string): PolicyValidationError {
  return new PolicyValidationError({
    code: "INVALID_INPUT",
    message: `Snapshot policy ${field} ${message}`,
    issues: [{ instancePath: `/${field}`, keyword: "type", message }]
  });
}

function readOptionalField<T>(
  input: Record<string, unknown>,
  field: string,
  guard: (value: unknown) => value is T,
  expectation: string
): T | undefined {
  const value = input[field];
  if (value === undefined) {
    return undefined;
  }
  if (!guard(value)) {
    throw invalidField(field, expectation);
  }
  return value;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

/**
 * Validates an in-code policy override and fills the remaining fields from
 * `base`.
 */
export function normalizeSnapshotPolicy(
  input: unknown,
  base: Readonly<SnapshotPolicy> = DEFAULT_SNAPSHOT_POLICY
): SnapshotPolicy {
  if (input === undefined) {
    return { ...base };
  }

  if (!isRecord(input)) {
    throw new PolicyValidationError({ code: "INVALID_INPUT", message: "Snapshot policy must be an object" });
  }

  const onMismatch = readOptionalField(input, "onMismatch", isMismatchMode, `must be one of ${MISMATCH_MODES.join(", ")}`);
  const pendingPersistence = readOptionalField(
    input,
    "pendingPersistence",
    isPendingPersistenceMode,
    `must be one of ${PENDING_PERSISTENCE_MODES.join(", ")}`
  );
  const autoAccept = readOptionalField(input, "autoAccept", isBoolean, "must be a boolean");

  return {
    onMismatch: onMismatch ?? base.onMismatch,
    pendingPersistence: pendingPersistence ?? base.pendingPersistence,
    autoAccept: autoAccept ?? base.autoAccept
  };
}

export function loadSnapshotPolicy(input: unknown): SnapshotPolicy {
  if (!isRecord(input)) {
    throw new PolicyValidationError({ code: "INVALID_INPUT", message: "Snapshot policy document must be an object" });
  }

  const validator = getPolicyDocumentValidator();
  if (!validator(input)) {
    const issues = mapAjvIssues(validator.errors);
    throw new PolicyValidationError({
      code: "SCHEMA_VALIDATION_FAILED",
      message: `Snapshot policy validation failed at ${describeFirstIssue(issues)}`,
      issues
    });
  }

  return {
    onMismatch: input.on_mismatch ?? DEFAULT_SNAPSHOT_POLICY.onMismatch,
    pendingPersistence: input.pending_persistence ?? DEFAULT_SNAPSHOT_POLICY.pendingPersistence,
    autoAccept: input.auto_accept ?? DEFAULT_SNAPSHOT_POLICY.autoAccept
  };
}

export function loadSnapshotPolicyFile(path: string): SnapshotPolicy {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (error) {
    throw storageError("read", path, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new PolicyValidationError({
      code: "INVALID_INPUT",
      message: `Snapshot policy file is not valid JSON: ${path} (${error instanceof Error ? error.message : String(error)})`
    });
  }

  return loadSnapshotPolicy(parsed);
}

function isTruthyFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  return normalized.length > 0 && normalized !== "0" && normalized !== "false" && normalized !== "no";
}

function unknownEnvironmentValue(name: string, value: string, expected: string): PolicyValidationError {
  return new PolicyValidationError({
    code: "UNKNOWN_ENVIRONMENT_VALUE",
    message: `${name} must be one of ${expected}; received ${JSON.stringify(value)}`,
    issues: [{ instancePath: `/${name}`, keyword: "enum", message: `must be one of ${expected}` }]
  });
}

/**
 * Adapter helper for test-runner integrations. `SNAPKEEP_UPDATE` picks the
 * update mode (`always`, `new`, `no`, `auto`); `SNAPKEEP_FORCE_PASS` turns
 * failures into warnings. Under `auto`, a truthy `CI` means `no`.
 */
export function resolvePolicyFromEnvironment(
  env: SnapshotEnvironment,
  base: Readonly<SnapshotPolicy> = DEFAULT_SNAPSHOT_POLICY
): SnapshotPolicy {
  const policy: SnapshotPolicy = { ...base };
  const rawUpdate = env.SNAPKEEP_UPDATE;
  const update = rawUpdate === undefined || rawUpdate.trim().length === 0 ? "auto" : rawUpdate.trim().toLowerCase();

  switch (update) {
    case "always":
      policy.autoAccept = true;
      break;
    case "new":
      policy.pendingPersistence = "always";
      break;
    case "no":
      policy.pendingPersistence = "never";
      break;
    case "auto":
      if (isTruthyFlag(env.CI)) {
        policy.pendingPersistence = "never";
      }
      break;
    default:
      throw unknownEnvironmentValue("SNAPKEEP_UPDATE", rawUpdate ?? "", "always, new, no, auto");
  }

  const forcePass = env.SNAPKEEP_FORCE_PASS;
  if (forcePass !== undefined && forcePass.trim().length > 0) {
    const normalized = forcePass.trim().toLowerCase();
    if (!["1", "0", "true", "false", "yes", "no"].includes(normalized)) {
      throw unknownEnvironmentValue("SNAPKEEP_FORCE_PASS", forcePass, "1, 0, true, false, yes, no");
    }
    if (isTruthyFlag(normalized)) {
      policy.onMismatch = "warn";
    }
  }

  return policy;
}

/**
 * New is a failure regardless of `onMismatch`, since there is nothing to
 * compare against; only auto-accept clears it.
 */
export function resolveVerdictDisposition(verdict: Verdict, policy: Readonly<SnapshotPolicy>): VerdictDisposition {
  if (verdict.status === "pass") {
    return { failed: false, persistPending: false, promote: false };
  }

  if (policy.autoAccept) {
    return { failed: false, persistPending: false, promote: true };
  }

  const failed = verdict.status === "new" || policy.onMismatch === "fail";
  const persistPending =
    policy.pendingPersistence === "always" || (policy.pendingPersistence === "on-failure-only" && failed);

  return { failed, persistPending, promote: false };
}

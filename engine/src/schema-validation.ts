import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";

import type { SnapshotEngineIssue } from "./errors.ts";

type Ajv2020Constructor = new (options: { allErrors: boolean }) => {
  compile<T>(schema: object): ValidateFunction<T>;
};

let ajvInstance: InstanceType<Ajv2020Constructor> | null = null;

function resolveAjv2020Constructor(moduleValue: unknown): Ajv2020Constructor {
  const candidate = moduleValue as
    | Ajv2020Constructor
    | { default?: Ajv2020Constructor; Ajv2020?: Ajv2020Constructor };

  if (typeof candidate === "function") {
    return candidate;
  }
  if (candidate.default && typeof candidate.default === "function") {
    return candidate.default;
  }
  if (candidate.Ajv2020 && typeof candidate.Ajv2020 === "function") {
    return candidate.Ajv2020;
  }

  throw new Error("Unable to resolve Ajv2020 constructor");
}

function getAjv(): InstanceType<Ajv2020Constructor> {
  if (ajvInstance) {
    return ajvInstance;
  }

  const nodeRequire = createRequire(import.meta.url);
  const Ajv2020 = resolveAjv2020Constructor(nodeRequire("ajv/dist/2020.js"));
  ajvInstance = new Ajv2020({ allErrors: true });
  return ajvInstance;
}

function loadSchema(relativePathFromSource: string): object {
  const fileContents = readFileSync(new URL(relativePathFromSource, import.meta.url), "utf8");
  const parsed: unknown = JSON.parse(fileContents);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Schema ${relativePathFromSource} must contain a JSON object`);
  }

  return parsed;
}

/** Compiles the schema on first use and reuses the validator afterwards. */
export function createSchemaValidator<T>(relativePathFromSource: string): () => ValidateFunction<T> {
  let validator: ValidateFunction<T> | null = null;
  return () => {
    if (!validator) {
      validator = getAjv().compile<T>(loadSchema(relativePathFromSource));
    }
    return validator;
  };
}

export function mapAjvIssues(errors: ErrorObject[] | null | undefined): SnapshotEngineIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

export function describeFirstIssue(issues: readonly SnapshotEngineIssue[]): string {
  const firstIssue = issues[0];
  const issuePath = firstIssue?.instancePath || "/";
  const issueMessage = firstIssue?.message ?? "validation failed";
  return `${issuePath}: ${issueMessage}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

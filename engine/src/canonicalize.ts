import { SnapshotEngineError } from "./errors.ts";
import { describeValuePath, type SnapshotValue, type ValuePathSegment } from "./value.ts";

export const SNAPSHOT_FORMATS = ["json", "csv", "text"] as const;
export type SnapshotFormat = (typeof SNAPSHOT_FORMATS)[number];

/** Fixed indentation unit of structured-text output. Not configurable. */
export const CANONICAL_INDENT = "  ";
/** Floats render with at most this many fractional digits, trailing zeros trimmed. */
export const CANONICAL_FLOAT_DECIMAL_PLACES = 12;
export const DEFAULT_DELIMITER = ",";

export interface DelimitedRecordOptions {
  delimiter?: string;
  /** Explicit column schema; defaults to the first record's keys. */
  columns?: string[];
}

export interface CanonicalizeOptions {
  delimited?: DelimitedRecordOptions;
}

const SNAPSHOT_FORMAT_SET = new Set<string>(SNAPSHOT_FORMATS);

export function isSnapshotFormat(value: unknown): value is SnapshotFormat {
  return typeof value === "string" && SNAPSHOT_FORMAT_SET.has(value);
}

function compareStableStrings(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

function malformed(message: string, path: readonly ValuePathSegment[]): SnapshotEngineError {
  return new SnapshotEngineError(`${message} at ${describeValuePath(path)}`, "MALFORMED_VALUE");
}

/**
 * Renders a float with {@link CANONICAL_FLOAT_DECIMAL_PLACES} fractional
 * digits, trailing zeros removed but at least one kept (`1.0`), and negative
 * zero folded to `0.0`. Magnitudes of 1e21 and above use exponent notation.
 */
export function formatCanonicalFloat(value: number, path: readonly ValuePathSegment[] = []): string {
  if (!Number.isFinite(value)) {
    throw malformed(`Non-finite float ${String(value)} has no canonical form`, path);
  }

  if (Math.abs(value) >= 1e21) {
    return String(value);
  }

  let rendered = value.toFixed(CANONICAL_FLOAT_DECIMAL_PLACES).replace(/0+$/, "");
  if (rendered.endsWith(".")) {
    rendered += "0";
  }

  return rendered === "-0.0" ? "0.0" : rendered;
}

function formatScalar(value: SnapshotValue, path: readonly ValuePathSegment[]): string | undefined {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "integer":
      return value.value.toString();
    case "float":
      return formatCanonicalFloat(value.value, path);
    default:
      return undefined;
  }
}

function requireTextKeys(
  value: Extract<SnapshotValue, { kind: "mapping" }>,
  path: readonly ValuePathSegment[],
  format: SnapshotFormat
): Array<{ key: string; value: SnapshotValue }> {
  const seen = new Set<string>();
  return value.entries.map((entry) => {
    if (entry.key.kind !== "text") {
      throw malformed(`${format} snapshots require text mapping keys, found a ${entry.key.kind} key`, path);
    }
    if (seen.has(entry.key.value)) {
      throw malformed(`Duplicate mapping key ${JSON.stringify(entry.key.value)}`, path);
    }
    seen.add(entry.key.value);
    return { key: entry.key.value, value: entry.value };
  });
}

function renderStructuredText(value: SnapshotValue, depth: number, path: ValuePathSegment[]): string {
  const scalar = formatScalar(value, path);
  if (scalar !== undefined) {
    return scalar;
  }

  const outer = CANONICAL_INDENT.repeat(depth);
  const inner = CANONICAL_INDENT.repeat(depth + 1);

  switch (value.kind) {
    case "text":
      return JSON.stringify(value.value);
    case "sequence": {
      if (value.items.length === 0) {
        return "[]";
      }
      const items = value.items.map(
        (item, index) => `${inner}${renderStructuredText(item, depth + 1, [...path, index])}`
      );
      return `[\n${items.join(",\n")}\n${outer}]`;
    }
    case "mapping": {
      if (value.entries.length === 0) {
        return "{}";
      }
      const entries = requireTextKeys(value, path, "json")
        .sort((left, right) => compareStableStrings(left.key, right.key))
        .map(
          (entry) =>
            `${inner}${JSON.stringify(entry.key)}: ${renderStructuredText(entry.value, depth + 1, [...path, entry.key])}`
        );
      return `{\n${entries.join(",\n")}\n${outer}}`;
    }
    default:
      throw malformed(`Unsupported value kind ${value.kind}`, path);
  }
}

function normalizeDelimiter(value: unknown): string {
  if (value === undefined) {
    return DEFAULT_DELIMITER;
  }

  if (typeof value !== "string" || value.length !== 1 || value === "\"" || value === "\n" || value === "\r") {
    throw new SnapshotEngineError(
      "Delimited-record delimiter must be a single character other than a quote or line break",
      "INVALID_OPTIONS"
    );
  }

  return value;
}

function normalizeColumns(value: unknown): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!Array.isArray(value) || value.length === 0 || value.some((column) => typeof column !== "string")) {
    throw new SnapshotEngineError(
      "Delimited-record columns must be a non-empty array of strings",
      "INVALID_OPTIONS"
    );
  }

  const columns = value.map((column) => String(column));
  if (new Set(columns).size !== columns.length) {
    throw new SnapshotEngineError("Delimited-record columns must be unique", "INVALID_OPTIONS");
  }

  return columns;
}

export function quoteDelimitedField(field: string, delimiter: string): string {
  if (field.includes(delimiter) || field.includes("\"") || field.includes("\n") || field.includes("\r")) {
    return `"${field.replace(/"/g, "\"\"")}"`;
  }

  return field;
}

function renderDelimitedCell(value: SnapshotValue, delimiter: string, path: ValuePathSegment[]): string {
  switch (value.kind) {
    case "null":
      return "";
    case "text":
      return quoteDelimitedField(value.value, delimiter);
    case "sequence":
    case "mapping":
      throw malformed("Delimited-record cells must be scalar values", path);
    default:
      return formatScalar(value, path) ?? "";
  }
}

function renderDelimitedRecords(value: SnapshotValue, options: DelimitedRecordOptions): string {
  const delimiter = normalizeDelimiter(options.delimiter);
  const explicitColumns = normalizeColumns(options.columns);

  if (value.kind !== "sequence") {
    throw malformed("Delimited-record snapshots require a sequence of records", []);
  }

  const renderRow = (cells: string[]): string => cells.join(delimiter);
  const firstRecord = value.items[0];

  if (firstRecord === undefined) {
    return explicitColumns ? renderRow(explicitColumns.map((column) => quoteDelimitedField(column, delimiter))) : "";
  }

  if (firstRecord.kind === "sequence") {
    const rows = value.items.map((row, rowIndex) => {
      if (row.kind !== "sequence") {
        throw malformed("Delimited-record rows must all be sequences", [rowIndex]);
      }
      return renderRow(
        row.items.map((cell, cellIndex) => renderDelimitedCell(cell, delimiter, [rowIndex, cellIndex]))
      );
    });
    if (explicitColumns) {
      rows.unshift(renderRow(explicitColumns.map((column) => quoteDelimitedField(column, delimiter))));
    }
    return rows.join("\n");
  }

  if (firstRecord.kind !== "mapping") {
    throw malformed("Delimited-record snapshots require records that are mappings or sequences", [0]);
  }

  const columns = explicitColumns ?? requireTextKeys(firstRecord, [0], "csv").map((entry) => entry.key);
  const columnSet = new Set(columns);
  const lines = [renderRow(columns.map((column) => quoteDelimitedField(column, delimiter)))];

  value.items.forEach((record, recordIndex) => {
    if (record.kind !== "mapping") {
      throw malformed("Delimited-record rows must all be mappings", [recordIndex]);
    }

    const cells = new Map<string, SnapshotValue>();
    for (const entry of requireTextKeys(record, [recordIndex], "csv")) {
      if (!columnSet.has(entry.key)) {
        throw malformed(`Record has column ${JSON.stringify(entry.key)} that is not in the header`, [recordIndex]);
      }
      cells.set(entry.key, entry.value);
    }

    lines.push(
      renderRow(
        columns.map((column) => {
          const cell = cells.get(column);
          return cell === undefined ? "" : renderDelimitedCell(cell, delimiter, [recordIndex, column]);
        })
      )
    );
  });

  return lines.join("\n");
}

/**
 * Renders a value into its canonical text for the given format. Pure and
 * deterministic: mapping keys are sorted, sequences keep their order.
 */
export function canonicalize(
  value: SnapshotValue,
  format: SnapshotFormat,
  options: CanonicalizeOptions = {}
): string {
  switch (format) {
    case "json":
      return renderStructuredText(value, 0, []);
    case "csv":
      return renderDelimitedRecords(value, options.delimited ?? {});
    case "text":
      if (value.kind !== "text") {
        throw malformed(`Text snapshots require a text value, found ${value.kind}`, []);
      }
      return value.value;
  }
}

import { DEFAULT_DELIMITER } from "./canonicalize.ts";
import { SnapshotEngineError } from "./errors.ts";
import type { MappingEntry, SnapshotValue } from "./value.ts";

export interface ParseDelimitedRecordsOptions {
  delimiter?: string;
  /** When false every row, including the first, becomes a sequence of cells. */
  header?: boolean;
  /** Map `true`/`false`, integers, decimals and empty cells to typed values. */
  inferScalars?: boolean;
}

const INTEGER_CELL_PATTERN = /^-?(0|[1-9][0-9]*)$/;
const DECIMAL_CELL_PATTERN = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

function splitRows(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let fieldStarted = false;
  let line = 1;
  let quoteLine = 1;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index] ?? "";

    if (quoted) {
      if (char === "\"") {
        if (text[index + 1] === "\"") {
          field += "\"";
          index += 1;
        } else {
          quoted = false;
        }
      } else {
        if (char === "\n") {
          line += 1;
        }
        field += char;
      }
      continue;
    }

    if (char === "\"" && !fieldStarted) {
      quoted = true;
      fieldStarted = true;
      quoteLine = line;
      continue;
    }

    if (char === delimiter) {
      row.push(field);
      field = "";
      fieldStarted = false;
      continue;
    }

    if (char === "\r" && text[index + 1] === "\n") {
      continue;
    }

    if (char === "\n") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      fieldStarted = false;
      line += 1;
      continue;
    }

    field += char;
    fieldStarted = true;
  }

  if (quoted) {
    throw new SnapshotEngineError(
      `Unterminated quoted field starting on line ${String(quoteLine)}`,
      "MALFORMED_VALUE"
    );
  }

  if (fieldStarted || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

function toCellValue(cell: string, inferScalars: boolean): SnapshotValue {
  if (!inferScalars) {
    return { kind: "text", value: cell };
  }

  if (cell.length === 0) {
    return { kind: "null" };
  }
  if (cell === "true" || cell === "false") {
    return { kind: "bool", value: cell === "true" };
  }
  if (INTEGER_CELL_PATTERN.test(cell)) {
    return { kind: "integer", value: BigInt(cell) };
  }
  if (DECIMAL_CELL_PATTERN.test(cell)) {
    return { kind: "float", value: Number(cell) };
  }

  return { kind: "text", value: cell };
}

/**
 * Parses RFC 4180 delimited text into a sequence of records. With a header
 * row (the default) each record is a mapping keyed by column name.
 */
export function parseDelimitedRecords(text: string, options: ParseDelimitedRecordsOptions = {}): SnapshotValue {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  if (delimiter.length !== 1 || delimiter === "\"" || delimiter === "\n" || delimiter === "\r") {
    throw new SnapshotEngineError(
      "Delimited-record delimiter must be a single character other than a quote or line break",
      "INVALID_OPTIONS"
    );
  }

  const inferScalars = options.inferScalars ?? false;
  const rows = splitRows(text, delimiter);

  if (options.header === false) {
    return {
      kind: "sequence",
      items: rows.map((row) => ({
        kind: "sequence",
        items: row.map((cell) => toCellValue(cell, inferScalars))
      }))
    };
  }

  const [header, ...records] = rows;
  if (header === undefined) {
    return { kind: "sequence", items: [] };
  }

  if (new Set(header).size !== header.length) {
    throw new SnapshotEngineError("Delimited-record header contains duplicate column names", "MALFORMED_VALUE");
  }

  return {
    kind: "sequence",
    items: records.map((record, recordIndex) => {
      if (record.length > header.length) {
        throw new SnapshotEngineError(
          `Delimited record ${String(recordIndex + 1)} has ${String(record.length)} fields but the header has ${String(header.length)}`,
          "MALFORMED_VALUE"
        );
      }

      const entries: MappingEntry[] = record.map((cell, cellIndex) => ({
        key: { kind: "text", value: header[cellIndex] ?? "" },
        value: toCellValue(cell, inferScalars)
      }));
      return { kind: "mapping", entries };
    })
  };
}

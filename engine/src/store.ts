import { writeFileAtomically, readTextFileIfPresent } from "./atomic-file.ts";
import { isSnapshotFormat, type SnapshotFormat } from "./canonicalize.ts";
import { SnapshotEngineError } from "./errors.ts";

export const ACCEPTED_SNAPSHOT_SCHEMA_VERSION = "1";

const HEADER_LINE_PATTERN = /^# ([a-z_]+):(?: (.*))?$/;

export interface AcceptedSnapshotMetadata {
  /** Label of the test that produced the snapshot. */
  source: string;
  format?: SnapshotFormat;
  updatedAt?: string;
  toolVersion?: string;
  description?: string;
}

export interface AcceptedSnapshot {
  metadata: AcceptedSnapshotMetadata;
  body: string;
}

function flattenHeaderValue(value: string): string {
  return value.replace(/\r\n|\r|\n/g, " ");
}

/**
 * Header lines `# key: value`, one blank line, then the body followed by a
 * single newline. The body itself is written verbatim.
 */
export function serializeAcceptedSnapshot(snapshot: AcceptedSnapshot): string {
  const headerEntries: Array<[string, string | undefined]> = [
    ["schema_version", ACCEPTED_SNAPSHOT_SCHEMA_VERSION],
    ["source", snapshot.metadata.source],
    ["format", snapshot.metadata.format],
    ["updated_at", snapshot.metadata.updatedAt],
    ["tool_version", snapshot.metadata.toolVersion],
    ["description", snapshot.metadata.description]
  ];

  const headerLines = headerEntries
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `# ${key}: ${flattenHeaderValue(value)}`);

  return `${headerLines.join("\n")}\n\n${snapshot.body}\n`;
}

export function parseAcceptedSnapshot(content: string, path?: string): AcceptedSnapshot {
  const corrupt = (message: string): SnapshotEngineError =>
    new SnapshotEngineError(path ? `${message}: ${path}` : message, "CORRUPT_ACCEPTED_FILE", { path });

  const header = new Map<string, string>();
  let cursor = 0;

  while (cursor < content.length) {
    const lineEnd = content.indexOf("\n", cursor);
    const rawLine = lineEnd === -1 ? content.slice(cursor) : content.slice(cursor, lineEnd);
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    if (line.length === 0) {
      if (lineEnd === -1) {
        break;
      }
      cursor = lineEnd + 1;

      if (header.size === 0) {
        throw corrupt("Accepted snapshot has no header");
      }

      const source = header.get("source");
      if (source === undefined || source.length === 0) {
        throw corrupt("Accepted snapshot header is missing source");
      }

      const format = header.get("format");
      if (format !== undefined && !isSnapshotFormat(format)) {
        throw corrupt(`Accepted snapshot header names unknown format ${JSON.stringify(format)}`);
      }

      const updatedAt = header.get("updated_at");
      const toolVersion = header.get("tool_version");
      const description = header.get("description");
      const rawBody = content.slice(cursor);

      return {
        metadata: {
          source,
          ...(format !== undefined ? { format } : {}),
          ...(updatedAt !== undefined ? { updatedAt } : {}),
          ...(toolVersion !== undefined ? { toolVersion } : {}),
          ...(description !== undefined ? { description } : {})
        },
        body: rawBody.endsWith("\n") ? rawBody.slice(0, -1) : rawBody
      };
    }

    const match = HEADER_LINE_PATTERN.exec(line);
    if (!match) {
      throw corrupt(
        header.size === 0 ? "Accepted snapshot has no header" : `Malformed accepted snapshot header line ${JSON.stringify(line)}`
      );
    }

    header.set(match[1], match[2] ?? "");
    if (lineEnd === -1) {
      break;
    }
    cursor = lineEnd + 1;
  }

  throw corrupt("Accepted snapshot is missing the blank line between header and body");
}

/** Returns null when no accepted snapshot exists at `path`. */
export function readAcceptedSnapshot(path: string, identity?: string): AcceptedSnapshot | null {
  const content = readTextFileIfPresent(path, identity);
  if (content === undefined) {
    return null;
  }

  return parseAcceptedSnapshot(content, path);
}

export function writeAcceptedSnapshot(path: string, snapshot: AcceptedSnapshot, identity?: string): void {
  writeFileAtomically(path, serializeAcceptedSnapshot(snapshot), identity);
}

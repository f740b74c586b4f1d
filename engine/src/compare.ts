import type { AcceptedSnapshot } from "./store.ts";

export const DEFAULT_DIFF_CONTEXT_LINES = 3;

/**
 * Upper bound on LCS table cells (changed old lines times changed new lines).
 * Larger changed regions are reported as one removal followed by one addition.
 */
export const DEFAULT_MAX_DIFF_CELLS = 4_000_000;

export type DiffLineKind = "context" | "removed" | "added";

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
}

export interface LineDiff {
  hunks: DiffHunk[];
  addedCount: number;
  removedCount: number;
}

export type Verdict =
  | { status: "pass" }
  | { status: "new" }
  | { status: "mismatch"; diff: LineDiff };

export type VerdictStatus = Verdict["status"];

interface DiffOperation extends DiffLine {
  oldBefore: number;
  newBefore: number;
}

function longestCommonSubsequenceTable(oldLines: readonly string[], newLines: readonly string[]): Uint32Array[] {
  const table: Uint32Array[] = [];
  for (let row = 0; row <= oldLines.length; row += 1) {
    table.push(new Uint32Array(newLines.length + 1));
  }

  for (let row = oldLines.length - 1; row >= 0; row -= 1) {
    for (let column = newLines.length - 1; column >= 0; column -= 1) {
      table[row][column] =
        oldLines[row] === newLines[column]
          ? table[row + 1][column + 1] + 1
          : Math.max(table[row + 1][column], table[row][column + 1]);
    }
  }

  return table;
}

function diffOperations(oldLines: readonly string[], newLines: readonly string[], maxCells: number): DiffOperation[] {
  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix += 1;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  const operations: DiffOperation[] = [];
  for (let index = 0; index < prefix; index += 1) {
    operations.push({ kind: "context", text: oldLines[index], oldBefore: index, newBefore: index });
  }

  const oldMiddle = oldLines.slice(prefix, oldLines.length - suffix);
  const newMiddle = newLines.slice(prefix, newLines.length - suffix);
  if (oldMiddle.length * newMiddle.length > maxCells) {
    oldMiddle.forEach((text, index) => {
      operations.push({ kind: "removed", text, oldBefore: prefix + index, newBefore: prefix });
    });
    newMiddle.forEach((text, index) => {
      operations.push({ kind: "added", text, oldBefore: prefix + oldMiddle.length, newBefore: prefix + index });
    });
    appendSuffix(operations, oldLines, newLines, suffix);
    return operations;
  }

  const table = longestCommonSubsequenceTable(oldMiddle, newMiddle);

  let oldIndex = 0;
  let newIndex = 0;
  while (oldIndex < oldMiddle.length || newIndex < newMiddle.length) {
    const oldBefore = prefix + oldIndex;
    const newBefore = prefix + newIndex;

    if (oldIndex < oldMiddle.length && newIndex < newMiddle.length && oldMiddle[oldIndex] === newMiddle[newIndex]) {
      operations.push({ kind: "context", text: oldMiddle[oldIndex], oldBefore, newBefore });
      oldIndex += 1;
      newIndex += 1;
    } else if (
      oldIndex < oldMiddle.length &&
      (newIndex >= newMiddle.length || table[oldIndex + 1][newIndex] >= table[oldIndex][newIndex + 1])
    ) {
      operations.push({ kind: "removed", text: oldMiddle[oldIndex], oldBefore, newBefore });
      oldIndex += 1;
    } else {
      operations.push({ kind: "added", text: newMiddle[newIndex], oldBefore, newBefore });
      newIndex += 1;
    }
  }

  appendSuffix(operations, oldLines, newLines, suffix);
  return operations;
}

function appendSuffix(
  operations: DiffOperation[],
  oldLines: readonly string[],
  newLines: readonly string[],
  suffix: number
): void {
  for (let offset = 0; offset < suffix; offset += 1) {
    operations.push({
      kind: "context",
      text: oldLines[oldLines.length - suffix + offset],
      oldBefore: oldLines.length - suffix + offset,
      newBefore: newLines.length - suffix + offset
    });
  }
}

function buildHunk(operations: readonly DiffOperation[]): DiffHunk {
  const first = operations[0];
  let oldCount = 0;
  let newCount = 0;
  for (const operation of operations) {
    if (operation.kind !== "added") oldCount += 1;
    if (operation.kind !== "removed") newCount += 1;
  }

  return {
    // A side with no lines points at the line before the hunk, as unified diffs do.
    oldStart: oldCount === 0 ? first.oldBefore : first.oldBefore + 1,
    oldCount,
    newStart: newCount === 0 ? first.newBefore : first.newBefore + 1,
    newCount,
    lines: operations.map((operation) => ({ kind: operation.kind, text: operation.text }))
  };
}

/**
 * Line-oriented diff of two bodies split on `\n`. Within a changed region
 * removed lines precede added lines.
 */
export function diffLines(
  oldText: string,
  newText: string,
  contextLines = DEFAULT_DIFF_CONTEXT_LINES,
  maxCells = DEFAULT_MAX_DIFF_CELLS
): LineDiff {
  const operations = diffOperations(oldText.split("\n"), newText.split("\n"), maxCells);
  const changeIndexes: number[] = [];
  let addedCount = 0;
  let removedCount = 0;

  operations.forEach((operation, index) => {
    if (operation.kind === "added") addedCount += 1;
    if (operation.kind === "removed") removedCount += 1;
    if (operation.kind !== "context") changeIndexes.push(index);
  });

  const hunks: DiffHunk[] = [];
  let cursor = 0;
  while (cursor < changeIndexes.length) {
    const start = Math.max(0, changeIndexes[cursor] - contextLines);
    let lastChange = changeIndexes[cursor];
    while (cursor + 1 < changeIndexes.length && changeIndexes[cursor + 1] - lastChange - 1 <= contextLines * 2) {
      cursor += 1;
      lastChange = changeIndexes[cursor];
    }

    const end = Math.min(operations.length - 1, lastChange + contextLines);
    hunks.push(buildHunk(operations.slice(start, end + 1)));
    cursor += 1;
  }

  return { hunks, addedCount, removedCount };
}

const DIFF_LINE_PREFIX: Record<DiffLineKind, string> = {
  context: " ",
  removed: "-",
  added: "+"
};

export function formatLineDiff(diff: LineDiff): string {
  const lines: string[] = [];
  for (const hunk of diff.hunks) {
    lines.push(
      `@@ -${String(hunk.oldStart)},${String(hunk.oldCount)} +${String(hunk.newStart)},${String(hunk.newCount)} @@`
    );
    for (const line of hunk.lines) {
      lines.push(`${DIFF_LINE_PREFIX[line.kind]}${line.text}`);
    }
  }

  return lines.join("\n");
}

export function compareSnapshot(canonicalText: string, stored: AcceptedSnapshot | null): Verdict {
  if (stored === null) {
    return { status: "new" };
  }

  if (stored.body === canonicalText) {
    return { status: "pass" };
  }

  return { status: "mismatch", diff: diffLines(stored.body, canonicalText) };
}

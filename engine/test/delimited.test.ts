import assert from "node:assert/strict";
import test from "node:test";

import { SnapshotEngineError, canonicalize, parseDelimitedRecords, snapshotValue } from "../src/index.ts";

test("parseDelimitedRecords keys records by the header row", () => {
  const parsed = parseDelimitedRecords('name,note\nAda,36\n"Lovelace, A","say ""hi"""\n');

  assert.deepEqual(
    parsed,
    snapshotValue.sequence([
      snapshotValue.mapping([
        ["name", snapshotValue.text("Ada")],
        ["note", snapshotValue.text("36")]
      ]),
      snapshotValue.mapping([
        ["name", snapshotValue.text("Lovelace, A")],
        ["note", snapshotValue.text('say "hi"')]
      ])
    ])
  );
});

test("parseDelimitedRecords keeps embedded newlines and accepts CRLF rows", () => {
  assert.deepEqual(
    parseDelimitedRecords('a\n"x\ny"\n'),
    snapshotValue.sequence([snapshotValue.mapping([["a", snapshotValue.text("x\ny")]])])
  );
  assert.deepEqual(
    parseDelimitedRecords("a,b\r\n1,2\r\n"),
    snapshotValue.sequence([
      snapshotValue.mapping([
        ["a", snapshotValue.text("1")],
        ["b", snapshotValue.text("2")]
      ])
    ])
  );
});

test("parseDelimitedRecords infers scalars on request", () => {
  assert.deepEqual(
    parseDelimitedRecords("id,active,score,note\n1,true,2.5,\n", { inferScalars: true }),
    snapshotValue.sequence([
      snapshotValue.mapping([
        ["id", snapshotValue.integer(1)],
        ["active", snapshotValue.bool(true)],
        ["score", snapshotValue.float(2.5)],
        ["note", snapshotValue.null()]
      ])
    ])
  );
});

test("parseDelimitedRecords without a header yields rows of cells", () => {
  assert.deepEqual(
    parseDelimitedRecords("1,2\n3,4", { header: false }),
    snapshotValue.sequence([
      snapshotValue.sequence([snapshotValue.text("1"), snapshotValue.text("2")]),
      snapshotValue.sequence([snapshotValue.text("3"), snapshotValue.text("4")])
    ])
  );
});

test("parseDelimitedRecords reports unterminated quotes and ragged rows", () => {
  assert.throws(
    () => parseDelimitedRecords('a\n"oops'),
    (error: unknown) =>
      error instanceof SnapshotEngineError &&
      error.code === "MALFORMED_VALUE" &&
      error.message === "Unterminated quoted field starting on line 2"
  );
  assert.throws(
    () => parseDelimitedRecords("a\n1,2"),
    (error: unknown) =>
      error instanceof SnapshotEngineError &&
      error.message === "Delimited record 1 has 2 fields but the header has 1"
  );
});

test("parsed records canonicalize back to normalized delimited text", () => {
  const parsed = parseDelimitedRecords('name,note\r\nAda,"a,b"\r\n');

  assert.equal(canonicalize(parsed, "csv"), 'name,note\nAda,"a,b"');
});

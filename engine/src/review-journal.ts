import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import { storageError } from "./errors.ts";

export const REVIEW_JOURNAL_SCHEMA_VERSION = "1.0.0";

export type ReviewDecision = "accept" | "reject" | "skip";

export interface ReviewJournalEntryV1 {
  schema_version: typeof REVIEW_JOURNAL_SCHEMA_VERSION;
  decided_at: string;
  decision: ReviewDecision;
  pending_path: string;
  accepted_path: string;
  source: string;
}

export interface EmitReviewJournalEntryOptions {
  outputPath?: string;
}

export function emitReviewJournalEntry(
  entry: ReviewJournalEntryV1,
  options: EmitReviewJournalEntryOptions = {}
): void {
  if (!options.outputPath) {
    return;
  }

  try {
    mkdirSync(dirname(options.outputPath), { recursive: true });
    appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
  } catch (error) {
    throw storageError("append review journal entry to", options.outputPath, error);
  }
}

import { existsSync, readFileSync } from "node:fs";
import { decodeEntry } from "./entries.js";
import { TranscriptDecodeError, errorMessage } from "./errors.js";
import { parseJsonObject } from "./json.js";
import { debug, log } from "./logger.js";
import { RelationshipIndex } from "./relationships.js";
import type {
  DecodeFailure,
  TranscriptEntry,
  ValidateMode,
} from "./types.js";

export interface LoadOptions {
  validate?: ValidateMode;
  /** Called for each skipped line under `validate: "warn"`. Defaults to a WARN log line. */
  onDecodeFailure?: (failure: DecodeFailure) => void;
}

export interface LoadedTranscript {
  archived: TranscriptEntry[];
  live: TranscriptEntry[];
  index: RelationshipIndex;
  /** Lines dropped because they were not JSON objects. */
  skipped: number;
}

function logDecodeFailure(failure: DecodeFailure): void {
  log(
    "WARN",
    `Skipping line ${failure.lineNumber} of ${failure.path}: ${errorMessage(failure.error)}`,
  );
}

/**
 * Reads a JSONL transcript in one pass. Every entry at or before the last
 * compaction boundary (by position) is archived; the rest is live. A missing
 * file is an empty transcript.
 */
export function loadTranscriptFile(
  path: string,
  options: LoadOptions = {},
): LoadedTranscript {
  const validate = options.validate ?? "warn";
  const onDecodeFailure = options.onDecodeFailure ?? logDecodeFailure;
  const index = new RelationshipIndex();

  if (!existsSync(path)) {
    debug(`Transcript not found, treating as empty: ${path}`);
    return { archived: [], live: [], index, skipped: 0 };
  }

  const lines = readFileSync(path, "utf8").split("\n");
  const entries: TranscriptEntry[] = [];
  let lastBoundary = -1;
  let skipped = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const lineNumber = i + 1;

    let entry: TranscriptEntry;
    try {
      entry = decodeEntry(parseJsonObject(line), lineNumber);
    } catch (e) {
      if (validate === "strict") {
        throw new TranscriptDecodeError(path, lineNumber, { cause: e });
      }
      skipped++;
      if (validate === "warn") onDecodeFailure({ path, lineNumber, error: e });
      continue;
    }

    entries.push(entry);
    index.add(entry);
    if (entry.kind === "compact_boundary") lastBoundary = entries.length - 1;
  }

  const archived = entries.slice(0, lastBoundary + 1);
  const live = entries.slice(lastBoundary + 1);
  debug(
    `Loaded ${entries.length} entries from ${path} (${archived.length} archived, ${skipped} skipped)`,
  );

  return { archived, live, index, skipped };
}

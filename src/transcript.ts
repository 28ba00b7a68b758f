import {
  encodeEntry,
  getToolResults,
  getToolUses,
  isSystemEntry,
} from "./entries.js";
import { loadTranscriptFile } from "./loader.js";
import type { LoadOptions, LoadedTranscript } from "./loader.js";
import { RelationshipIndex } from "./relationships.js";
import { groupTurns } from "./turns.js";
import type { Turn } from "./turns.js";
import type {
  AssistantTurn,
  CompactionBoundary,
  Entry,
  FileSnapshot,
  SafetyMode,
  SystemEntry,
  ToolResultBlock,
  ToolUseBlock,
  TranscriptEntry,
  UserTurn,
  ValidateMode,
} from "./types.js";

export interface TranscriptOptions extends LoadOptions {
  /** Reserved. Stored and exposed, but no load or query behavior depends on it. */
  safety?: SafetyMode;
  includeArchived?: boolean;
  includeMeta?: boolean;
}

export interface ViewOptions {
  includeArchived?: boolean;
}

export interface UserViewOptions extends ViewOptions {
  includeMeta?: boolean;
}

function emptySnapshot(): LoadedTranscript {
  return { archived: [], live: [], index: new RelationshipIndex(), skipped: 0 };
}

/**
 * Read-only, indexed view of a JSONL transcript.
 *
 * ```ts
 * const transcript = loadTranscript("/path/to/session.jsonl");
 * for (const turn of transcript.turns()) console.log(turn.text);
 * ```
 *
 * `load()` rebuilds everything from the file and swaps the result in at once;
 * there is no incremental update.
 */
export class Transcript implements Iterable<TranscriptEntry> {
  readonly path: string;
  readonly validate: ValidateMode;
  readonly safety: SafetyMode;

  /** Default for views called without `includeArchived`. */
  includeArchived: boolean;
  /** Default for `userTurns` called without `includeMeta`. */
  includeMeta: boolean;

  private readonly onDecodeFailure: LoadOptions["onDecodeFailure"];
  private snapshot: LoadedTranscript = emptySnapshot();
  private loaded = false;

  constructor(path: string, options: TranscriptOptions = {}) {
    this.path = path;
    this.validate = options.validate ?? "warn";
    this.safety = options.safety ?? "warn";
    this.includeArchived = options.includeArchived ?? false;
    this.includeMeta = options.includeMeta ?? false;
    this.onDecodeFailure = options.onDecodeFailure;
  }

  load(): this {
    this.snapshot = loadTranscriptFile(this.path, {
      validate: this.validate,
      onDecodeFailure: this.onDecodeFailure,
    });
    this.loaded = true;
    return this;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /** Live entries: everything after the last compaction boundary. */
  get entries(): readonly TranscriptEntry[] {
    return this.snapshot.live;
  }

  get archived(): readonly TranscriptEntry[] {
    return this.snapshot.archived;
  }

  get allEntries(): TranscriptEntry[] {
    return [...this.snapshot.archived, ...this.snapshot.live];
  }

  get skipped(): number {
    return this.snapshot.skipped;
  }

  get length(): number {
    return this.snapshot.live.length;
  }

  [Symbol.iterator](): Iterator<TranscriptEntry> {
    return this.snapshot.live[Symbol.iterator]();
  }

  // --- Lookups ---

  findById(id: string): Entry | undefined {
    return this.snapshot.index.entry(id);
  }

  findToolUse(toolUseId: string): ToolUseBlock | undefined {
    return this.snapshot.index.toolUse(toolUseId);
  }

  findToolResult(toolUseId: string): ToolResultBlock | undefined {
    return this.snapshot.index.toolResult(toolUseId);
  }

  findSnapshot(messageId: string): FileSnapshot | undefined {
    return this.snapshot.index.snapshot(messageId);
  }

  findToolResultEntry(toolUseId: string): UserTurn | undefined {
    return this.snapshot.index.toolResultEntry(toolUseId);
  }

  entriesForRequest(requestId: string): AssistantTurn[] {
    return this.snapshot.index.requestEntries(requestId);
  }

  resultOf(toolUse: ToolUseBlock): ToolResultBlock | undefined {
    return this.findToolResult(toolUse.id);
  }

  toolUseOf(result: ToolResultBlock): ToolUseBlock | undefined {
    return this.findToolUse(result.toolUseId);
  }

  // --- Relationships ---

  parentOf(entry: Entry): Entry | undefined {
    if (!entry.parentId) return undefined;
    return this.findById(entry.parentId);
  }

  /**
   * Like {@link parentOf}, but a compaction boundary resolves to its logical
   * parent, the last entry before the history was rewritten.
   */
  logicalParentOf(entry: Entry): Entry | undefined {
    if (entry.kind === "compact_boundary" && entry.logicalParentId) {
      return this.findById(entry.logicalParentId);
    }
    return this.parentOf(entry);
  }

  /** Linear scan; build a reverse index from `allEntries` for repeated queries. */
  childrenOf(entry: Entry, includeArchived?: boolean): Entry[] {
    if (!entry.id) return [];
    return this.source(includeArchived).filter(
      (e): e is Entry => e.kind !== "file_snapshot" && e.parentId === entry.id,
    );
  }

  /** Ancestors via logical parents, nearest first. Stops on a repeated id. */
  lineage(entry: Entry): Entry[] {
    const ancestors: Entry[] = [];
    const seen = new Set<string>();
    if (entry.id) seen.add(entry.id);

    let current = this.logicalParentOf(entry);
    while (current) {
      if (current.id) {
        if (seen.has(current.id)) break;
        seen.add(current.id);
      }
      ancestors.push(current);
      current = this.logicalParentOf(current);
    }
    return ancestors;
  }

  // --- Views ---

  private source(includeArchived?: boolean): TranscriptEntry[] {
    const withArchived = includeArchived ?? this.includeArchived;
    return withArchived ? this.allEntries : [...this.snapshot.live];
  }

  private isVisible(entry: UserTurn, includeMeta?: boolean): boolean {
    if (includeMeta ?? this.includeMeta) return true;
    return !entry.isMeta && !entry.isVisibleInTranscriptOnly;
  }

  userTurns(options: UserViewOptions = {}): UserTurn[] {
    return this.source(options.includeArchived).filter(
      (e): e is UserTurn =>
        e.kind === "user" && this.isVisible(e, options.includeMeta),
    );
  }

  assistantTurns(options: ViewOptions = {}): AssistantTurn[] {
    return this.source(options.includeArchived).filter(
      (e): e is AssistantTurn => e.kind === "assistant",
    );
  }

  systemRecords(options: ViewOptions = {}): SystemEntry[] {
    return this.source(options.includeArchived).filter(isSystemEntry);
  }

  toolUses(options: ViewOptions = {}): ToolUseBlock[] {
    return this.assistantTurns(options).flatMap(getToolUses);
  }

  toolResults(options: ViewOptions = {}): ToolResultBlock[] {
    return this.source(options.includeArchived)
      .filter((e): e is UserTurn => e.kind === "user")
      .flatMap(getToolResults);
  }

  errors(options: ViewOptions = {}): ToolResultBlock[] {
    return this.toolResults(options).filter((block) => block.isError === true);
  }

  fileSnapshots(options: ViewOptions = {}): FileSnapshot[] {
    return this.source(options.includeArchived).filter(
      (e): e is FileSnapshot => e.kind === "file_snapshot",
    );
  }

  /** Always searches archived and live entries. */
  compactionBoundaries(): CompactionBoundary[] {
    return this.allEntries.filter(
      (e): e is CompactionBoundary => e.kind === "compact_boundary",
    );
  }

  turns(options: ViewOptions = {}): Turn[] {
    return groupTurns(
      this.source(options.includeArchived),
      this.snapshot.index,
    );
  }

  // --- Serialization ---

  /** Archived and live entries encoded back to JSON Lines, in file order. */
  toJSONL(): string {
    return this.allEntries
      .map((entry) => JSON.stringify(encodeEntry(entry)))
      .join("\n");
  }

  toString(): string {
    const { live, archived } = this.snapshot;
    return `Transcript(${this.path}, entries=${live.length}, archived=${archived.length})`;
  }
}

/** Loads `path` into a queryable transcript. A missing file yields an empty one. */
export function loadTranscript(
  path: string,
  options: TranscriptOptions = {},
): Transcript {
  return new Transcript(path, options).load();
}

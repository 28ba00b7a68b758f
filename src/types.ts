import type { JsonObject, JsonValue } from "./json.js";

// --- Loader options ---

export type ValidateMode = "strict" | "warn" | "none";
export type SafetyMode = "strict" | "warn" | "none";

export interface DecodeFailure {
  path: string;
  lineNumber: number;
  error: unknown;
}

// --- Content block types (discriminated union on `kind`) ---

export interface TextBlock {
  kind: "text";
  text: string;
  extra: JsonObject;
}

export interface ToolUseBlock {
  kind: "tool_use";
  id: string;
  name: string;
  input: JsonObject;
  extra: JsonObject;
}

export interface ToolResultBlock {
  kind: "tool_result";
  toolUseId: string;
  /** Absent when the wire item has no usable `content`. */
  content?: string | JsonValue[];
  isError?: boolean;
  /** Structured tool output copied from the containing entry. Never encoded. */
  toolUseResult?: JsonValue;
  extra: JsonObject;
}

/** Extended thinking. The signature is opaque and must be written back as-is. */
export interface ThinkingBlock {
  kind: "thinking";
  thinking: string;
  signature: string;
  extra: JsonObject;
}

export interface UnknownBlock {
  kind: "unknown";
  originalType: string | undefined;
  raw: JsonObject;
}

export type ContentBlock =
  | TextBlock
  | ToolUseBlock
  | ToolResultBlock
  | ThinkingBlock
  | UnknownBlock;

// --- Transcript entry types (discriminated union on `kind`) ---

export interface EntryFields {
  id?: string;
  parentId?: string | null;
  timestamp?: string;
  sessionId?: string;
  cwd?: string;
  version?: string;
  gitBranch?: string;
  isSidechain?: boolean;
  userType?: string;
  slug?: string;
  isSynthetic?: boolean;
  extra: JsonObject;
  /** 1-based source line. Bookkeeping only. */
  lineNumber?: number;
}

/**
 * `message.content` as decoded: free text or blocks. Absent when the message
 * has no content or carries one of another JSON type, which then stays in
 * `messageExtra` as written.
 */
export type MessageContent = string | ContentBlock[];

export interface UserTurn extends EntryFields {
  kind: "user";
  content?: MessageContent;
  isMeta?: boolean;
  isCompactSummary?: boolean;
  isVisibleInTranscriptOnly?: boolean;
  thinkingMetadata?: JsonObject;
  todos?: JsonValue[];
  toolUseResult?: JsonValue;
  /** Remaining keys of the nested `message` object; absent when there was none. */
  messageExtra?: JsonObject;
}

export interface AssistantTurn extends EntryFields {
  kind: "assistant";
  requestId?: string;
  messageId?: string;
  model?: string;
  stopReason?: string | null;
  usage?: JsonObject;
  content?: MessageContent;
  messageExtra?: JsonObject;
}

interface SystemFields extends EntryFields {
  content?: string;
  level?: string;
}

export interface SystemRecord extends SystemFields {
  kind: "system";
  subtype?: string;
}

export interface CompactionBoundary extends SystemFields {
  kind: "compact_boundary";
  subtype: "compact_boundary";
  logicalParentId?: string | null;
  compactMetadata?: JsonObject;
}

export interface StopSummary extends SystemFields {
  kind: "stop_summary";
  subtype: "stop_hook_summary";
  hookCount?: number;
  hookInfos?: JsonValue[];
  hookErrors?: JsonValue[];
  preventedContinuation?: boolean;
  stopReason?: string;
  hasOutput?: boolean;
  toolUseId?: string;
}

export interface UnknownEntry extends EntryFields {
  kind: "unknown";
  type: string | undefined;
}

/** Conversational entries: everything that carries the common entry fields. */
export type Entry =
  | UserTurn
  | AssistantTurn
  | SystemRecord
  | CompactionBoundary
  | StopSummary
  | UnknownEntry;

export type SystemEntry = SystemRecord | CompactionBoundary | StopSummary;

/** File backup bookkeeping; shares the log but is not a conversational entry. */
export interface FileSnapshot {
  kind: "file_snapshot";
  messageId?: string;
  snapshot?: JsonObject;
  isSnapshotUpdate?: boolean;
  extra: JsonObject;
  lineNumber?: number;
}

export type TranscriptEntry = Entry | FileSnapshot;

// --- Derived types ---

export interface SessionMetadata {
  version?: string;
  slug?: string;
  cwd?: string;
  gitBranch?: string;
}

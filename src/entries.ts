import {
  decodeBlocks,
  encodeBlock,
  isToolResultBlock,
  isToolUseBlock,
  joinText,
  joinThinking,
} from "./blocks.js";
import { FieldReader, setField } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";
import type {
  AssistantTurn,
  CompactionBoundary,
  ContentBlock,
  Entry,
  EntryFields,
  FileSnapshot,
  MessageContent,
  SessionMetadata,
  StopSummary,
  SystemRecord,
  ToolResultBlock,
  ToolUseBlock,
  TranscriptEntry,
  UserTurn,
} from "./types.js";

type CommonFields = Omit<EntryFields, "extra" | "lineNumber">;

// --- Common fields (wire names on the right) ---

function readCommonFields(fields: FieldReader): CommonFields {
  return {
    id: fields.string("uuid"),
    parentId: fields.nullableString("parentUuid"),
    timestamp: fields.string("timestamp"),
    sessionId: fields.string("sessionId"),
    cwd: fields.string("cwd"),
    version: fields.string("version"),
    gitBranch: fields.string("gitBranch"),
    isSidechain: fields.boolean("isSidechain"),
    userType: fields.string("userType"),
    slug: fields.string("slug"),
    isSynthetic: fields.boolean("isSynthetic"),
  };
}

function writeCommonFields(out: JsonObject, entry: EntryFields): void {
  setField(out, "parentUuid", entry.parentId);
  setField(out, "isSidechain", entry.isSidechain);
  setField(out, "userType", entry.userType);
  setField(out, "cwd", entry.cwd);
  setField(out, "sessionId", entry.sessionId);
  setField(out, "version", entry.version);
  setField(out, "gitBranch", entry.gitBranch);
  setField(out, "slug", entry.slug);
  setField(out, "uuid", entry.id);
  setField(out, "timestamp", entry.timestamp);
  setField(out, "isSynthetic", entry.isSynthetic);
}

/** Drops keys whose value is undefined so decoded entries compare cleanly. */
function compact<T extends object>(value: T): T {
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}

// --- Decoding ---

/** Consumes `content` only when it is text or a list. */
function decodeMessageContent(
  body: FieldReader,
  toolUseResult?: JsonValue,
): MessageContent | undefined {
  const text = body.string("content");
  if (text !== undefined) return text;
  const items = body.array("content");
  return items ? decodeBlocks(items, toolUseResult) : undefined;
}

function decodeUser(fields: FieldReader, lineNumber?: number): UserTurn {
  const common = readCommonFields(fields);
  const toolUseResult = fields.value("toolUseResult");
  const message = fields.object("message");

  let content: MessageContent | undefined;
  let messageExtra: JsonObject | undefined;
  if (message) {
    const body = new FieldReader(message);
    content = decodeMessageContent(body, toolUseResult);
    messageExtra = body.rest();
  }

  return compact<UserTurn>({
    kind: "user",
    ...common,
    content,
    isMeta: fields.boolean("isMeta"),
    isCompactSummary: fields.boolean("isCompactSummary"),
    isVisibleInTranscriptOnly: fields.boolean("isVisibleInTranscriptOnly"),
    thinkingMetadata: fields.object("thinkingMetadata"),
    todos: fields.array("todos"),
    toolUseResult,
    messageExtra,
    extra: fields.rest(),
    lineNumber,
  });
}

function decodeAssistant(
  fields: FieldReader,
  lineNumber?: number,
): AssistantTurn {
  const common = readCommonFields(fields);
  const requestId = fields.string("requestId");
  const message = fields.object("message");

  let content: MessageContent | undefined;
  let nested: Pick<
    AssistantTurn,
    "messageId" | "model" | "stopReason" | "usage" | "messageExtra"
  > = {};
  if (message) {
    const body = new FieldReader(message);
    const messageId = body.string("id");
    const model = body.string("model");
    const stopReason = body.nullableString("stop_reason");
    const usage = body.object("usage");
    content = decodeMessageContent(body);
    nested = { messageId, model, stopReason, usage, messageExtra: body.rest() };
  }

  return compact<AssistantTurn>({
    kind: "assistant",
    ...common,
    requestId,
    ...nested,
    content,
    extra: fields.rest(),
    lineNumber,
  });
}

function decodeSystem(
  fields: FieldReader,
  lineNumber?: number,
): SystemRecord | CompactionBoundary | StopSummary {
  const common = readCommonFields(fields);
  const subtype = fields.string("subtype");
  const shared = {
    ...common,
    content: fields.string("content"),
    level: fields.string("level"),
  };

  switch (subtype) {
    case "compact_boundary":
      return compact<CompactionBoundary>({
        kind: "compact_boundary",
        subtype,
        ...shared,
        logicalParentId: fields.nullableString("logicalParentUuid"),
        compactMetadata: fields.object("compactMetadata"),
        extra: fields.rest(),
        lineNumber,
      });
    case "stop_hook_summary":
      return compact<StopSummary>({
        kind: "stop_summary",
        subtype,
        ...shared,
        hookCount: fields.number("hookCount"),
        hookInfos: fields.array("hookInfos"),
        hookErrors: fields.array("hookErrors"),
        preventedContinuation: fields.boolean("preventedContinuation"),
        stopReason: fields.string("stopReason"),
        hasOutput: fields.boolean("hasOutput"),
        toolUseId: fields.string("toolUseID"),
        extra: fields.rest(),
        lineNumber,
      });
    default:
      return compact<SystemRecord>({
        kind: "system",
        subtype,
        ...shared,
        extra: fields.rest(),
        lineNumber,
      });
  }
}

function decodeSnapshot(
  fields: FieldReader,
  lineNumber?: number,
): FileSnapshot {
  return compact<FileSnapshot>({
    kind: "file_snapshot",
    messageId: fields.string("messageId"),
    snapshot: fields.object("snapshot"),
    isSnapshotUpdate: fields.boolean("isSnapshotUpdate"),
    extra: fields.rest(),
    lineNumber,
  });
}

/**
 * Decodes one transcript record. Dispatches on `type`, then on `subtype` for
 * system records. Unknown types decode to an `unknown` entry that keeps every
 * field it could not place.
 */
export function decodeEntry(
  raw: JsonObject,
  lineNumber?: number,
): TranscriptEntry {
  const fields = new FieldReader(raw);
  const type = fields.string("type");

  switch (type) {
    case "user":
      return decodeUser(fields, lineNumber);
    case "assistant":
      return decodeAssistant(fields, lineNumber);
    case "system":
      return decodeSystem(fields, lineNumber);
    case "file-history-snapshot":
      return decodeSnapshot(fields, lineNumber);
    default:
      return compact({
        kind: "unknown" as const,
        type,
        ...readCommonFields(fields),
        extra: fields.rest(),
        lineNumber,
      });
  }
}

// --- Encoding ---

function encodeContent(
  content: MessageContent | undefined,
): JsonValue | undefined {
  if (content === undefined) return undefined;
  return typeof content === "string" ? content : content.map(encodeBlock);
}

function encodeUser(entry: UserTurn, out: JsonObject): void {
  writeCommonFields(out, entry);
  setField(out, "isMeta", entry.isMeta);
  setField(out, "isCompactSummary", entry.isCompactSummary);
  setField(out, "isVisibleInTranscriptOnly", entry.isVisibleInTranscriptOnly);
  setField(out, "thinkingMetadata", entry.thinkingMetadata);
  setField(out, "todos", entry.todos);
  if (entry.messageExtra !== undefined) {
    const message: JsonObject = { ...entry.messageExtra };
    setField(message, "content", encodeContent(entry.content));
    out.message = message;
  }
  setField(out, "toolUseResult", entry.toolUseResult);
}

function encodeAssistant(entry: AssistantTurn, out: JsonObject): void {
  writeCommonFields(out, entry);
  if (entry.messageExtra !== undefined) {
    const message: JsonObject = { ...entry.messageExtra };
    setField(message, "id", entry.messageId);
    setField(message, "model", entry.model);
    setField(message, "content", encodeContent(entry.content));
    setField(message, "stop_reason", entry.stopReason);
    setField(message, "usage", entry.usage);
    out.message = message;
  }
  setField(out, "requestId", entry.requestId);
}

function encodeSystem(
  entry: SystemRecord | CompactionBoundary | StopSummary,
  out: JsonObject,
): void {
  writeCommonFields(out, entry);
  setField(out, "subtype", entry.subtype);
  setField(out, "content", entry.content);
  setField(out, "level", entry.level);
  if (entry.kind === "compact_boundary") {
    setField(out, "logicalParentUuid", entry.logicalParentId);
    setField(out, "compactMetadata", entry.compactMetadata);
  } else if (entry.kind === "stop_summary") {
    setField(out, "hookCount", entry.hookCount);
    setField(out, "hookInfos", entry.hookInfos);
    setField(out, "hookErrors", entry.hookErrors);
    setField(out, "preventedContinuation", entry.preventedContinuation);
    setField(out, "stopReason", entry.stopReason);
    setField(out, "hasOutput", entry.hasOutput);
    setField(out, "toolUseID", entry.toolUseId);
  }
}

/**
 * Encodes an entry back to its wire form: original field names, absent fields
 * omitted, unrecognized fields merged back, `lineNumber` never written.
 */
export function encodeEntry(entry: TranscriptEntry): JsonObject {
  const out: JsonObject = {};
  switch (entry.kind) {
    case "user":
      out.type = "user";
      encodeUser(entry, out);
      break;
    case "assistant":
      out.type = "assistant";
      encodeAssistant(entry, out);
      break;
    case "system":
    case "compact_boundary":
    case "stop_summary":
      out.type = "system";
      encodeSystem(entry, out);
      break;
    case "file_snapshot":
      out.type = "file-history-snapshot";
      setField(out, "messageId", entry.messageId);
      setField(out, "snapshot", entry.snapshot);
      setField(out, "isSnapshotUpdate", entry.isSnapshotUpdate);
      break;
    case "unknown":
      setField(out, "type", entry.type);
      writeCommonFields(out, entry);
      break;
  }
  return { ...out, ...entry.extra };
}

// --- Entry accessors ---

export function isConversational(entry: TranscriptEntry): entry is Entry {
  return entry.kind !== "file_snapshot";
}

export function isSystemEntry(
  entry: TranscriptEntry,
): entry is SystemRecord | CompactionBoundary | StopSummary {
  return (
    entry.kind === "system" ||
    entry.kind === "compact_boundary" ||
    entry.kind === "stop_summary"
  );
}

export function getTimestamp(entry: EntryFields): Date | undefined {
  if (entry.timestamp) return new Date(entry.timestamp);
  return undefined;
}

/** Structured content of a message; empty for free text or no content. */
export function getContentBlocks(
  entry: UserTurn | AssistantTurn,
): ContentBlock[] {
  return Array.isArray(entry.content) ? entry.content : [];
}

export function getUserText(entry: UserTurn): string {
  return typeof entry.content === "string" ? entry.content : "";
}

/** True when the user entry carries structured content rather than typed text. */
export function isToolResultTurn(entry: UserTurn): boolean {
  return Array.isArray(entry.content);
}

export function getToolResults(entry: UserTurn): ToolResultBlock[] {
  return getContentBlocks(entry).filter(isToolResultBlock);
}

export function getAssistantText(entry: AssistantTurn): string {
  if (typeof entry.content === "string") return entry.content;
  return joinText(getContentBlocks(entry));
}

export function getThinking(entry: AssistantTurn): string {
  return joinThinking(getContentBlocks(entry));
}

export function getToolUses(entry: AssistantTurn): ToolUseBlock[] {
  return getContentBlocks(entry).filter(isToolUseBlock);
}

export function hasToolUse(entry: AssistantTurn): boolean {
  return getContentBlocks(entry).some(isToolUseBlock);
}

export function getSessionMetadata(
  entry: EntryFields,
): SessionMetadata | undefined {
  const metadata: SessionMetadata = {};
  if (entry.version) metadata.version = entry.version;
  if (entry.slug) metadata.slug = entry.slug;
  if (entry.cwd) metadata.cwd = entry.cwd;
  if (entry.gitBranch) metadata.gitBranch = entry.gitBranch;
  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

export function getUsage(
  entry: AssistantTurn,
): Record<string, number> | undefined {
  const usage = entry.usage;
  if (!usage) return undefined;

  const inputTokens =
    typeof usage.input_tokens === "number" ? usage.input_tokens : undefined;
  const outputTokens =
    typeof usage.output_tokens === "number" ? usage.output_tokens : undefined;

  const details: Record<string, number> = {};
  if (inputTokens !== undefined) details.input = inputTokens;
  if (outputTokens !== undefined) details.output = outputTokens;
  if (inputTokens !== undefined && outputTokens !== undefined)
    details.total = inputTokens + outputTokens;
  if (typeof usage.cache_read_input_tokens === "number")
    details.cache_read_input_tokens = usage.cache_read_input_tokens;
  if (typeof usage.cache_creation_input_tokens === "number")
    details.cache_creation_input_tokens = usage.cache_creation_input_tokens;

  return Object.keys(details).length > 0 ? details : undefined;
}

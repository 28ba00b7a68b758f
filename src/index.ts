export { Transcript, loadTranscript } from "./transcript.js";
export type {
  TranscriptOptions,
  UserViewOptions,
  ViewOptions,
} from "./transcript.js";
export { Turn, TERMINAL_STOP_REASONS, groupTurns } from "./turns.js";
export { RelationshipIndex } from "./relationships.js";
export { loadTranscriptFile } from "./loader.js";
export type { LoadOptions, LoadedTranscript } from "./loader.js";
export {
  decodeBlock,
  decodeBlocks,
  encodeBlock,
  getToolResultText,
  isTextBlock,
  isThinkingBlock,
  isToolResultBlock,
  isToolUseBlock,
  isUnknownBlock,
} from "./blocks.js";
export {
  decodeEntry,
  encodeEntry,
  getAssistantText,
  getContentBlocks,
  getSessionMetadata,
  getThinking,
  getTimestamp,
  getToolResults,
  getToolUses,
  getUsage,
  getUserText,
  hasToolUse,
  isConversational,
  isSystemEntry,
  isToolResultTurn,
} from "./entries.js";
export { TranscriptDecodeError } from "./errors.js";
export { isJsonObject } from "./json.js";
export type { JsonObject, JsonPrimitive, JsonValue } from "./json.js";
export { hook } from "./hook.js";
export type * from "./types.js";

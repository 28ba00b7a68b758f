import { FieldReader, isJsonObject, setField } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";
import type {
  ContentBlock,
  TextBlock,
  ThinkingBlock,
  ToolResultBlock,
  ToolUseBlock,
  UnknownBlock,
} from "./types.js";

// --- Content block type guards ---

function isBlockOfKind<T extends ContentBlock>(
  block: ContentBlock,
  kind: T["kind"],
): block is T {
  return block.kind === kind;
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return isBlockOfKind<TextBlock>(block, "text");
}

export function isToolUseBlock(block: ContentBlock): block is ToolUseBlock {
  return isBlockOfKind<ToolUseBlock>(block, "tool_use");
}

export function isToolResultBlock(
  block: ContentBlock,
): block is ToolResultBlock {
  return isBlockOfKind<ToolResultBlock>(block, "tool_result");
}

export function isThinkingBlock(block: ContentBlock): block is ThinkingBlock {
  return isBlockOfKind<ThinkingBlock>(block, "thinking");
}

export function isUnknownBlock(block: ContentBlock): block is UnknownBlock {
  return isBlockOfKind<UnknownBlock>(block, "unknown");
}

// --- Decoding ---

function decodeToolResultContent(
  fields: FieldReader,
): string | JsonValue[] | undefined {
  return fields.string("content") ?? fields.array("content");
}

/**
 * Decodes one raw content item. `toolUseResult` is the structured output the
 * containing entry carries beside its content; it is attached to tool results
 * only.
 */
export function decodeBlock(
  raw: JsonObject,
  toolUseResult?: JsonValue,
): ContentBlock {
  const fields = new FieldReader(raw);
  const type = fields.string("type");

  switch (type) {
    case "text":
      return {
        kind: "text",
        text: fields.string("text") ?? "",
        extra: fields.rest(),
      };
    case "tool_use":
      return {
        kind: "tool_use",
        id: fields.string("id") ?? "",
        name: fields.string("name") ?? "",
        input: fields.object("input") ?? {},
        extra: fields.rest(),
      };
    case "tool_result": {
      const block: ToolResultBlock = {
        kind: "tool_result",
        toolUseId: fields.string("tool_use_id") ?? "",
        extra: {},
      };
      const content = decodeToolResultContent(fields);
      if (content !== undefined) block.content = content;
      const isError = fields.boolean("is_error");
      if (isError !== undefined) block.isError = isError;
      if (toolUseResult !== undefined && toolUseResult !== null) {
        block.toolUseResult = toolUseResult;
      }
      block.extra = fields.rest();
      return block;
    }
    case "thinking":
      return {
        kind: "thinking",
        thinking: fields.string("thinking") ?? "",
        signature: fields.string("signature") ?? "",
        extra: fields.rest(),
      };
    default:
      return { kind: "unknown", originalType: type, raw: { ...raw } };
  }
}

export function decodeBlocks(
  items: JsonValue[],
  toolUseResult?: JsonValue,
): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  for (const item of items) {
    if (isJsonObject(item)) blocks.push(decodeBlock(item, toolUseResult));
  }
  return blocks;
}

// --- Encoding ---

export function encodeBlock(block: ContentBlock): JsonObject {
  switch (block.kind) {
    case "text":
      return { type: "text", text: block.text, ...block.extra };
    case "tool_use":
      return {
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: block.input,
        ...block.extra,
      };
    case "tool_result": {
      const out: JsonObject = {
        type: "tool_result",
        tool_use_id: block.toolUseId,
      };
      setField(out, "content", block.content);
      setField(out, "is_error", block.isError);
      return { ...out, ...block.extra };
    }
    case "thinking":
      return {
        type: "thinking",
        thinking: block.thinking,
        signature: block.signature,
        ...block.extra,
      };
    case "unknown":
      return { ...block.raw };
  }
}

// --- Block accessors ---

/** Flattens a tool result's content to text; structured items contribute their `text`. */
export function getToolResultText(block: ToolResultBlock): string {
  if (block.content === undefined) return "";
  if (typeof block.content === "string") return block.content;
  const parts: string[] = [];
  for (const item of block.content) {
    if (typeof item === "string") {
      parts.push(item);
    } else if (isJsonObject(item) && typeof item.text === "string") {
      parts.push(item.text);
    }
  }
  return parts.join("\n");
}

export function joinText(blocks: ContentBlock[]): string {
  return blocks
    .filter(isTextBlock)
    .map((b) => b.text)
    .join("\n");
}

export function joinThinking(blocks: ContentBlock[]): string {
  return blocks
    .filter(isThinkingBlock)
    .map((b) => b.thinking)
    .join("\n");
}

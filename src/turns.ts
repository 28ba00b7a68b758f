import { joinThinking, isToolUseBlock } from "./blocks.js";
import { getAssistantText, getContentBlocks, getUsage } from "./entries.js";
import type { RelationshipIndex } from "./relationships.js";
import type { AssistantTurn, ToolUseBlock, TranscriptEntry } from "./types.js";

export const TERMINAL_STOP_REASONS: ReadonlySet<string> = new Set([
  "end_turn",
  "stop_sequence",
]);

/**
 * One model response: the assistant entries that share a request id, in file
 * order. A response streamed with tool calls is written as several entries.
 */
export class Turn {
  constructor(
    readonly requestId: string,
    readonly entries: readonly AssistantTurn[],
  ) {}

  private get blocks() {
    return this.entries.flatMap(getContentBlocks);
  }

  /** Member texts joined by newline, free-text members included. */
  get text(): string {
    return this.entries
      .map(getAssistantText)
      .filter((text) => text !== "")
      .join("\n");
  }

  get thinking(): string {
    return joinThinking(this.blocks);
  }

  get toolUses(): ToolUseBlock[] {
    return this.blocks.filter(isToolUseBlock);
  }

  get hasToolUse(): boolean {
    return this.blocks.some(isToolUseBlock);
  }

  get isComplete(): boolean {
    return this.entries.some(
      (e) =>
        typeof e.stopReason === "string" &&
        TERMINAL_STOP_REASONS.has(e.stopReason),
    );
  }

  get model(): string | undefined {
    return this.entries.find((e) => e.model)?.model;
  }

  get stopReason(): string | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const reason = this.entries[i].stopReason;
      if (reason) return reason;
    }
    return undefined;
  }

  /** Usage of the last member that reports it; streamed parts repeat running totals. */
  get usage(): Record<string, number> | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const usage = getUsage(this.entries[i]);
      if (usage) return usage;
    }
    return undefined;
  }

  get timestamp(): string | undefined {
    return this.entries[0]?.timestamp;
  }
}

/**
 * Emits one turn per distinct request id in the order ids are first seen in
 * `entries`. Members come from the index, so a turn started in the archived
 * region keeps its archived parts.
 */
export function groupTurns(
  entries: readonly TranscriptEntry[],
  index: RelationshipIndex,
): Turn[] {
  const turns: Turn[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    if (entry.kind !== "assistant" || !entry.requestId) continue;
    if (seen.has(entry.requestId)) continue;
    seen.add(entry.requestId);

    const members = index.requestEntries(entry.requestId);
    if (members.length > 0) turns.push(new Turn(entry.requestId, members));
  }
  return turns;
}

import { isToolResultBlock, isToolUseBlock } from "./blocks.js";
import { getContentBlocks } from "./entries.js";
import type {
  AssistantTurn,
  Entry,
  FileSnapshot,
  ToolResultBlock,
  ToolUseBlock,
  TranscriptEntry,
  UserTurn,
} from "./types.js";

/**
 * Id-keyed lookups over one loaded transcript. Blocks hold only their own ids;
 * every cross-reference goes through these maps. Maps keep insertion order,
 * which is file order because the loader adds entries top to bottom.
 */
export class RelationshipIndex {
  private readonly byId = new Map<string, Entry>();
  private readonly toolUsesById = new Map<string, ToolUseBlock>();
  private readonly toolResultsById = new Map<string, ToolResultBlock>();
  private readonly resultEntriesById = new Map<string, UserTurn>();
  private readonly byRequestId = new Map<string, AssistantTurn[]>();
  private readonly snapshotsByMessageId = new Map<string, FileSnapshot>();

  clear(): void {
    this.byId.clear();
    this.toolUsesById.clear();
    this.toolResultsById.clear();
    this.resultEntriesById.clear();
    this.byRequestId.clear();
    this.snapshotsByMessageId.clear();
  }

  add(entry: TranscriptEntry): void {
    if (entry.kind === "file_snapshot") {
      if (entry.messageId) {
        this.snapshotsByMessageId.set(entry.messageId, entry);
      }
      return;
    }

    if (entry.id) this.byId.set(entry.id, entry);

    if (entry.kind === "assistant") {
      for (const block of getContentBlocks(entry)) {
        if (isToolUseBlock(block)) this.toolUsesById.set(block.id, block);
      }
      if (entry.requestId) {
        const members = this.byRequestId.get(entry.requestId);
        if (members) members.push(entry);
        else this.byRequestId.set(entry.requestId, [entry]);
      }
    } else if (entry.kind === "user") {
      for (const block of getContentBlocks(entry)) {
        if (!isToolResultBlock(block)) continue;
        this.toolResultsById.set(block.toolUseId, block);
        this.resultEntriesById.set(block.toolUseId, entry);
      }
    }
  }

  entry(id: string): Entry | undefined {
    return this.byId.get(id);
  }

  toolUse(id: string): ToolUseBlock | undefined {
    return this.toolUsesById.get(id);
  }

  toolResult(toolUseId: string): ToolResultBlock | undefined {
    return this.toolResultsById.get(toolUseId);
  }

  /** The user entry that carried the result for `toolUseId`. */
  toolResultEntry(toolUseId: string): UserTurn | undefined {
    return this.resultEntriesById.get(toolUseId);
  }

  requestEntries(requestId: string): AssistantTurn[] {
    return [...(this.byRequestId.get(requestId) ?? [])];
  }

  snapshot(messageId: string): FileSnapshot | undefined {
    return this.snapshotsByMessageId.get(messageId);
  }

  toolUses(): ToolUseBlock[] {
    return [...this.toolUsesById.values()];
  }

  toolResults(): ToolResultBlock[] {
    return [...this.toolResultsById.values()];
  }

  get size(): number {
    return this.byId.size;
  }
}

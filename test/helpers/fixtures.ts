// Raw wire records, shaped like the lines a coding agent writes.

type Raw = Record<string, unknown>;

const SESSION = "sess-1";

export function userLine(uuid: string, parentUuid: string | null, text: string, extra: Raw = {}): Raw {
  return {
    parentUuid,
    isSidechain: false,
    userType: "external",
    cwd: "/workspace",
    sessionId: SESSION,
    version: "1.0.0",
    gitBranch: "main",
    type: "user",
    message: { role: "user", content: text },
    uuid,
    timestamp: "2026-01-02T10:00:00.000Z",
    ...extra,
  };
}

export function toolResultLine(
  uuid: string,
  parentUuid: string | null,
  toolUseId: string,
  content: string,
  extra: Raw = {},
): Raw {
  return {
    parentUuid,
    sessionId: SESSION,
    type: "user",
    message: {
      role: "user",
      content: [{ type: "tool_result", tool_use_id: toolUseId, content }],
    },
    uuid,
    timestamp: "2026-01-02T10:00:02.000Z",
    ...extra,
  };
}

export function assistantLine(
  uuid: string,
  parentUuid: string | null,
  requestId: string,
  content: Raw[],
  stopReason: string | null = null,
  extra: Raw = {},
): Raw {
  return {
    parentUuid,
    sessionId: SESSION,
    type: "assistant",
    message: {
      id: `msg_${requestId}`,
      type: "message",
      role: "assistant",
      model: "claude-sonnet-4-5",
      content,
      stop_reason: stopReason,
      stop_sequence: null,
      usage: { input_tokens: 10, output_tokens: 5 },
    },
    requestId,
    uuid,
    timestamp: "2026-01-02T10:00:01.000Z",
    ...extra,
  };
}

export function boundaryLine(
  uuid: string,
  parentUuid: string | null,
  logicalParentUuid: string | null,
): Raw {
  return {
    parentUuid,
    logicalParentUuid,
    sessionId: SESSION,
    type: "system",
    subtype: "compact_boundary",
    content: "Conversation compacted",
    level: "info",
    compactMetadata: { trigger: "auto", preTokens: 1200 },
    uuid,
    timestamp: "2026-01-02T11:00:00.000Z",
  };
}

export function snapshotLine(messageId: string): Raw {
  return {
    type: "file-history-snapshot",
    messageId,
    snapshot: { messageId, trackedFileBackups: {}, timestamp: "2026-01-02T10:00:00.000Z" },
    isSnapshotUpdate: false,
  };
}

export const text = (value: string): Raw => ({ type: "text", text: value });

export const toolUse = (id: string, name: string, input: Raw = {}): Raw => ({
  type: "tool_use",
  id,
  name,
  input,
});

export const thinking = (value: string): Raw => ({
  type: "thinking",
  thinking: value,
  signature: "sig-placeholder",
});

import { propagateAttributes } from "@langfuse/tracing";
import { computeUpdatedState } from "./filesystem.js";
import type { State } from "./filesystem.js";
import { debug } from "./logger.js";
import { createTrace } from "./tracer.js";
import { loadTranscript } from "./transcript.js";
import type { Turn } from "./turns.js";
import type { ValidateMode } from "./types.js";

export interface ProcessOptions {
  validate?: ValidateMode;
}

/**
 * Turns after the first `exported` ones. A trailing turn without a terminal
 * stop reason may still be streaming and is held back; earlier ones are
 * finished because a later request followed them.
 */
export function selectPendingTurns(turns: Turn[], exported: number): Turn[] {
  const pending = turns.slice(exported);
  const last = pending[pending.length - 1];
  if (last && !last.isComplete) pending.pop();
  return pending;
}

export async function processTranscript(
  sessionId: string,
  transcriptFile: string,
  state: State,
  options: ProcessOptions = {},
): Promise<{ turns: number; updatedState: State }> {
  const turnCount = state[sessionId]?.turn_count ?? 0;

  // Archived turns stay in so numbering survives compaction.
  const transcript = loadTranscript(transcriptFile, {
    validate: options.validate,
    includeArchived: true,
  });
  const pending = selectPendingTurns(transcript.turns(), turnCount);
  if (pending.length === 0) return { turns: 0, updatedState: state };

  debug(`Processing ${pending.length} new turns from ${transcript}`);

  await propagateAttributes({ sessionId }, async () => {
    for (let i = 0; i < pending.length; i++) {
      await createTrace(sessionId, turnCount + i + 1, pending[i], transcript);
    }
  });

  const updatedState = computeUpdatedState(
    state,
    sessionId,
    turnCount + pending.length,
  );

  return { turns: pending.length, updatedState };
}

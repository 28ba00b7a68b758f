import {
  startActiveObservation,
  startObservation,
  updateActiveTrace,
} from "@langfuse/tracing";
import type { LangfuseObservation } from "@langfuse/tracing";
import { getToolResultText } from "./blocks.js";
import {
  getAssistantText,
  getSessionMetadata,
  getTimestamp,
  getToolUses,
  getUsage,
  getUserText,
} from "./entries.js";
import { debug } from "./logger.js";
import type { Transcript } from "./transcript.js";
import type { Turn } from "./turns.js";
import type { AssistantTurn, ToolUseBlock, UserTurn } from "./types.js";

const DEFAULT_MODEL = "claude";

interface GenerationContext {
  parentObservation: LangfuseObservation;
  transcript: Transcript;
  entry: AssistantTurn;
  index: number;
  model: string;
  prompt: string;
  genEnd: Date | undefined;
}

/** Nearest typed user message in the turn's lineage, crossing compaction. */
export function findPrompt(
  transcript: Transcript,
  turn: Turn,
): UserTurn | undefined {
  const first = turn.entries[0];
  if (!first) return undefined;
  return transcript
    .lineage(first)
    .find(
      (e): e is UserTurn =>
        e.kind === "user" && typeof e.content === "string" && !e.isMeta,
    );
}

function childObservationOptions(
  parent: LangfuseObservation,
  startTime?: Date,
): {
  parentSpanContext: ReturnType<LangfuseObservation["otelSpan"]["spanContext"]>;
  startTime?: Date;
} {
  return {
    ...(startTime && { startTime }),
    parentSpanContext: parent.otelSpan.spanContext(),
  };
}

function createToolObservations(
  parentObservation: LangfuseObservation,
  transcript: Transcript,
  toolUses: ToolUseBlock[],
  genStart: Date | undefined,
): void {
  for (const toolUse of toolUses) {
    const result = transcript.resultOf(toolUse);
    const resultEntry = transcript.findToolResultEntry(toolUse.id);
    const tool = startObservation(
      `Tool: ${toolUse.name}`,
      {
        input: toolUse.input,
        metadata: {
          tool_name: toolUse.name,
          tool_id: toolUse.id,
          is_error: result?.isError ?? false,
        },
      },
      {
        asType: "tool",
        ...childObservationOptions(parentObservation, genStart),
      },
    );
    const output = result ? getToolResultText(result) : null;
    tool
      .update({ output })
      .end(resultEntry ? getTimestamp(resultEntry) : undefined);
    debug(`Created tool observation for: ${toolUse.name}`);
  }
}

function createGenerationObservation(ctx: GenerationContext): void {
  const { parentObservation, transcript, entry, index, model, prompt, genEnd } =
    ctx;
  const entryModel = entry.model ?? model;
  const toolUses = getToolUses(entry);
  const genStart = getTimestamp(entry);
  const usageDetails = getUsage(entry);

  // Use global startObservation() to work around SDK bug where
  // instance method drops startTime from options
  const generation = startObservation(
    entryModel,
    {
      model: entryModel,
      ...(index === 0 && { input: { role: "user", content: prompt } }),
      output: { role: "assistant", content: getAssistantText(entry) },
      metadata: { tool_count: toolUses.length, stop_reason: entry.stopReason },
      ...(usageDetails && { usageDetails }),
    },
    {
      asType: "generation",
      ...childObservationOptions(parentObservation, genStart),
    },
  );

  createToolObservations(generation, transcript, toolUses, genStart);

  generation.end(genEnd);
}

function computeTraceEnd(transcript: Transcript, turn: Turn): Date | undefined {
  const stamps: Date[] = [];
  for (const entry of turn.entries) {
    const ts = getTimestamp(entry);
    if (ts) stamps.push(ts);
  }
  for (const toolUse of turn.toolUses) {
    const resultEntry = transcript.findToolResultEntry(toolUse.id);
    const ts = resultEntry ? getTimestamp(resultEntry) : undefined;
    if (ts) stamps.push(ts);
  }
  return stamps.reduce<Date | undefined>(
    (latest, ts) => (!latest || ts > latest ? ts : latest),
    undefined,
  );
}

function computeTraceContext(transcript: Transcript, turn: Turn) {
  const promptEntry = findPrompt(transcript, turn);
  const prompt = promptEntry ? getUserText(promptEntry) : "";
  const model = turn.model ?? DEFAULT_MODEL;
  const first = turn.entries[0];
  const traceStart = first ? getTimestamp(first) : undefined;
  const traceEnd = computeTraceEnd(transcript, turn);
  const metadata = promptEntry ? getSessionMetadata(promptEntry) : undefined;

  return { prompt, model, traceStart, traceEnd, metadata };
}

function createGenerations(
  parentObservation: LangfuseObservation,
  transcript: Transcript,
  turn: Turn,
  model: string,
  prompt: string,
): void {
  const entries = turn.entries;
  for (let i = 0; i < entries.length; i++) {
    const nextGenStart =
      i + 1 < entries.length ? getTimestamp(entries[i + 1]) : undefined;

    createGenerationObservation({
      parentObservation,
      transcript,
      entry: entries[i],
      index: i,
      model,
      prompt,
      genEnd: nextGenStart ?? new Date(),
    });
  }
}

export async function createTrace(
  sessionId: string,
  turnNum: number,
  turn: Turn,
  transcript: Transcript,
): Promise<void> {
  const { prompt, model, traceStart, traceEnd, metadata } =
    computeTraceContext(transcript, turn);
  const hasTraceStart = traceStart !== undefined;
  const output = { role: "assistant", content: turn.text };

  await startActiveObservation(
    `Turn ${turnNum}`,
    async (span) => {
      updateActiveTrace({
        name: `Turn ${turnNum}`,
        sessionId,
        input: { role: "user", content: prompt },
        output,
        metadata: {
          source: "claude-code",
          turn_number: turnNum,
          session_id: sessionId,
          request_id: turn.requestId,
          ...metadata,
        },
      });

      // Use global startObservation() to work around SDK bug where
      // instance method drops startTime from options
      const rootSpan = startObservation(
        `Turn ${turnNum}`,
        { input: { role: "user", content: prompt }, output },
        {
          asType: "agent",
          ...childObservationOptions(
            span,
            hasTraceStart ? traceStart : undefined,
          ),
        },
      );

      createGenerations(rootSpan, transcript, turn, model, prompt);

      if (traceEnd) {
        rootSpan.end(traceEnd);
        span.end(traceEnd);
      }
    },
    {
      ...(hasTraceStart && { startTime: traceStart, endOnExit: false }),
    },
  );

  debug(`Created trace for turn ${turnNum}`);
}

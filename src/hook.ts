import { NodeSDK } from "@opentelemetry/sdk-node";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import { errorMessage } from "./errors.js";
import { loadState, saveState } from "./filesystem.js";
import { log, debug, HOOK_WARNING_THRESHOLD_SECONDS } from "./logger.js";
import { processTranscript } from "./processor.js";
import type { ValidateMode } from "./types.js";

interface HookInput {
  session_id: string;
  transcript_path: string;
}

async function readHookInput(): Promise<HookInput | null> {
  const chunks: string[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  }
  const raw = chunks.join("").trim();
  if (!raw) return null;

  try {
    const data: unknown = JSON.parse(raw);
    if (
      typeof data === "object" &&
      data !== null &&
      "session_id" in data &&
      typeof data.session_id === "string" &&
      "transcript_path" in data &&
      typeof data.transcript_path === "string"
    ) {
      return {
        session_id: data.session_id,
        transcript_path: data.transcript_path,
      };
    }
    return null;
  } catch {
    debug("Hook input is not valid JSON");
    return null;
  }
}

export interface HookConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
  validate: ValidateMode;
}

function parseValidateMode(value: string | undefined): ValidateMode {
  const mode = (value ?? "").toLowerCase();
  if (mode === "strict" || mode === "warn" || mode === "none") return mode;
  if (mode) {
    log("WARN", `Unknown TRANSCRIPT_LENS_VALIDATE "${value}", using "warn"`);
  }
  return "warn";
}

export function resolveEnvVars(): HookConfig | null {
  const publicKey =
    process.env.TRANSCRIPT_LENS_PUBLIC_KEY || process.env.LANGFUSE_PUBLIC_KEY;
  const secretKey =
    process.env.TRANSCRIPT_LENS_SECRET_KEY || process.env.LANGFUSE_SECRET_KEY;
  const baseUrl =
    process.env.TRANSCRIPT_LENS_BASE_URL || process.env.LANGFUSE_BASE_URL;

  if (!publicKey || !secretKey) return null;

  return {
    publicKey,
    secretKey,
    baseUrl: baseUrl || undefined,
    validate: parseValidateMode(process.env.TRANSCRIPT_LENS_VALIDATE),
  };
}

function initializeSDK(config: HookConfig): {
  sdk: NodeSDK;
  spanProcessor: LangfuseSpanProcessor;
} {
  const spanProcessor = new LangfuseSpanProcessor({
    exportMode: "immediate",
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({
    spanProcessors: [spanProcessor],
  });

  sdk.start();

  return { sdk, spanProcessor };
}

export async function hook(): Promise<void> {
  const scriptStart = Date.now();
  debug("Hook started");

  if ((process.env.TRACE_TO_LANGFUSE ?? "").toLowerCase() !== "true") {
    debug("Tracing disabled (TRACE_TO_LANGFUSE != true)");
    return;
  }

  const config = resolveEnvVars();
  if (!config) {
    log(
      "ERROR",
      "Langfuse API keys not set (TRANSCRIPT_LENS_PUBLIC_KEY / TRANSCRIPT_LENS_SECRET_KEY)",
    );
    return;
  }

  const { sdk, spanProcessor } = initializeSDK(config);

  const state = loadState();

  const input = await readHookInput();
  if (!input) {
    debug("No hook input received via stdin");
    await sdk.shutdown();
    return;
  }

  const sessionId = input.session_id;
  debug(`Processing session: ${sessionId}`);

  try {
    const { turns, updatedState } = await processTranscript(
      sessionId,
      input.transcript_path,
      state,
      { validate: config.validate },
    );
    saveState(updatedState);

    const duration = (Date.now() - scriptStart) / 1000;
    log("INFO", `Processed ${turns} turns in ${duration.toFixed(1)}s`);

    if (duration > HOOK_WARNING_THRESHOLD_SECONDS) {
      log(
        "WARN",
        `Hook took ${duration.toFixed(1)}s (>3min), consider optimizing`,
      );
    }
  } catch (e: unknown) {
    log("ERROR", `Failed to process transcript: ${errorMessage(e)}`);
  } finally {
    await spanProcessor.forceFlush();
    await sdk.shutdown();
  }
}

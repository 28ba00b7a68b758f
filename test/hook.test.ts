import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, readFileSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  mockForceFlush,
  mockSdkShutdown,
  mockSdkStart,
  mockStartActiveObservation,
  mockStartObservation,
  langfuseOtelMock,
  langfuseTracingMock,
  openTelemetryMock,
} from "./helpers/langfuse-mock.js";
import { assistantLine, text, userLine } from "./helpers/fixtures.js";
import { mockStdin, setupTranscript } from "./helpers/transcript.js";

// Mock homedir before importing modules that use it
const testDir = join(tmpdir(), `transcript-lens-hook-test-${Date.now()}`);

vi.mock("node:os", async (importOriginal) => {
  const original = await importOriginal<typeof import("node:os")>();
  return { ...original, homedir: () => testDir };
});

vi.mock("@langfuse/tracing", () => langfuseTracingMock());
vi.mock("@langfuse/otel", () => langfuseOtelMock());
vi.mock("@opentelemetry/sdk-node", () => openTelemetryMock());

// Isolate tests from host environment variables
const ENV_KEYS = [
  "TRACE_TO_LANGFUSE",
  "TRANSCRIPT_LENS_PUBLIC_KEY",
  "TRANSCRIPT_LENS_SECRET_KEY",
  "TRANSCRIPT_LENS_BASE_URL",
  "TRANSCRIPT_LENS_VALIDATE",
  "LANGFUSE_PUBLIC_KEY",
  "LANGFUSE_SECRET_KEY",
  "LANGFUSE_BASE_URL",
] as const;

const STATE_FILE = join(testDir, ".claude", "state", "transcript-lens_state.json");
const LOG_FILE = join(testDir, ".claude", "state", "transcript-lens_hook.log");

beforeEach(() => {
  vi.clearAllMocks();
  mkdirSync(join(testDir, ".claude", "state"), { recursive: true });
  for (const key of ENV_KEYS) {
    vi.stubEnv(key, "");
  }
});

afterEach(() => {
  vi.unstubAllEnvs();
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true });
  }
});

// Import after mocks
const { hook, resolveEnvVars } = await import("../src/hook.js");
const { NodeSDK } = await import("@opentelemetry/sdk-node");
const { LangfuseSpanProcessor } = await import("@langfuse/otel");

function enableTracing(): void {
  vi.stubEnv("TRACE_TO_LANGFUSE", "true");
  vi.stubEnv("TRANSCRIPT_LENS_PUBLIC_KEY", "pk-test");
  vi.stubEnv("TRANSCRIPT_LENS_SECRET_KEY", "sk-test");
}

function oneTurnSession(): string {
  return setupTranscript(testDir, [
    userLine("u1", null, "hello"),
    assistantLine("a1", "u1", "req_1", [text("hi there")], "end_turn"),
  ]);
}

function readLog(): string {
  return existsSync(LOG_FILE) ? readFileSync(LOG_FILE, "utf8") : "";
}

describe("resolveEnvVars", () => {
  it("returns null when keys are missing", () => {
    expect(resolveEnvVars()).toBeNull();
  });

  it("prefers the prefixed variables", () => {
    vi.stubEnv("TRANSCRIPT_LENS_PUBLIC_KEY", "pk-test");
    vi.stubEnv("TRANSCRIPT_LENS_SECRET_KEY", "sk-test");
    vi.stubEnv("LANGFUSE_PUBLIC_KEY", "pk-other");
    vi.stubEnv("LANGFUSE_SECRET_KEY", "sk-other");

    expect(resolveEnvVars()).toEqual({
      publicKey: "pk-test",
      secretKey: "sk-test",
      baseUrl: undefined,
      validate: "warn",
    });
  });

  it("falls back to the Langfuse variables", () => {
    vi.stubEnv("LANGFUSE_PUBLIC_KEY", "pk-test");
    vi.stubEnv("LANGFUSE_SECRET_KEY", "sk-test");
    vi.stubEnv("LANGFUSE_BASE_URL", "https://langfuse.example.com");

    expect(resolveEnvVars()).toEqual({
      publicKey: "pk-test",
      secretKey: "sk-test",
      baseUrl: "https://langfuse.example.com",
      validate: "warn",
    });
  });

  it("reads the validate mode case-insensitively", () => {
    enableTracing();
    vi.stubEnv("TRANSCRIPT_LENS_VALIDATE", "Strict");
    expect(resolveEnvVars()?.validate).toBe("strict");
  });

  it("warns about an unknown validate mode", () => {
    enableTracing();
    vi.stubEnv("TRANSCRIPT_LENS_VALIDATE", "loose");
    expect(resolveEnvVars()?.validate).toBe("warn");
    expect(readLog()).toContain(
      `[WARN] Unknown TRANSCRIPT_LENS_VALIDATE "loose", using "warn"`,
    );
  });
});

describe("hook", () => {
  it("exits silently when TRACE_TO_LANGFUSE is not set", async () => {
    await hook();
    expect(NodeSDK).not.toHaveBeenCalled();
  });

  it("logs an error when API keys are missing", async () => {
    vi.stubEnv("TRACE_TO_LANGFUSE", "true");
    await hook();
    expect(NodeSDK).not.toHaveBeenCalled();
    expect(readLog()).toContain("[ERROR] Langfuse API keys not set");
  });

  it("passes credentials to LangfuseSpanProcessor", async () => {
    enableTracing();
    vi.stubEnv("TRANSCRIPT_LENS_BASE_URL", "https://langfuse.example.com");
    mockStdin({ session_id: "sess-1", transcript_path: oneTurnSession() });

    await hook();

    expect(LangfuseSpanProcessor).toHaveBeenCalledWith({
      exportMode: "immediate",
      publicKey: "pk-test",
      secretKey: "sk-test",
      baseUrl: "https://langfuse.example.com",
    });
  });

  it("omits baseUrl when not set", async () => {
    enableTracing();
    mockStdin({ session_id: "sess-1", transcript_path: oneTurnSession() });

    await hook();

    expect(LangfuseSpanProcessor).toHaveBeenCalledWith({
      exportMode: "immediate",
      publicKey: "pk-test",
      secretKey: "sk-test",
      baseUrl: undefined,
    });
  });

  it("shuts down without flushing when stdin is empty", async () => {
    enableTracing();
    mockStdin("   ");

    await hook();

    expect(mockSdkShutdown).toHaveBeenCalled();
    expect(mockForceFlush).not.toHaveBeenCalled();
  });

  it("ignores input without a transcript path", async () => {
    enableTracing();
    mockStdin({ session_id: "sess-1" });

    await hook();

    expect(mockStartActiveObservation).not.toHaveBeenCalled();
    expect(mockSdkShutdown).toHaveBeenCalled();
  });

  it("initializes NodeSDK, traces the turn and saves state", async () => {
    enableTracing();
    mockStdin({ session_id: "sess-1", transcript_path: oneTurnSession() });

    await hook();

    expect(NodeSDK).toHaveBeenCalled();
    expect(mockSdkStart).toHaveBeenCalled();
    expect(mockStartActiveObservation).toHaveBeenCalledWith(
      "Turn 1",
      expect.any(Function),
      expect.objectContaining({ endOnExit: false }),
    );
    expect(mockStartObservation).toHaveBeenCalledWith(
      "claude-sonnet-4-5",
      expect.objectContaining({ model: "claude-sonnet-4-5" }),
      expect.objectContaining({ asType: "generation" }),
    );
    expect(mockForceFlush).toHaveBeenCalled();
    expect(mockSdkShutdown).toHaveBeenCalled();

    const state = JSON.parse(readFileSync(STATE_FILE, "utf8"));
    expect(state["sess-1"].turn_count).toBe(1);
    expect(readLog()).toContain("[INFO] Processed 1 turns in ");
  });

  it("does not export the same turn twice", async () => {
    enableTracing();
    const filePath = oneTurnSession();

    mockStdin({ session_id: "sess-1", transcript_path: filePath });
    await hook();
    mockStdin({ session_id: "sess-1", transcript_path: filePath });
    await hook();

    expect(mockStartActiveObservation).toHaveBeenCalledTimes(1);
    expect(readLog()).toContain("[INFO] Processed 0 turns in ");
  });

  it("logs the failure and still flushes when decoding fails under strict", async () => {
    enableTracing();
    vi.stubEnv("TRANSCRIPT_LENS_VALIDATE", "strict");
    const filePath = setupTranscript(testDir, ["{broken"]);
    mockStdin({ session_id: "sess-1", transcript_path: filePath });

    await hook();

    expect(readLog()).toContain(`[ERROR] Failed to process transcript: ${filePath}:1: `);
    expect(existsSync(STATE_FILE)).toBe(false);
    expect(mockForceFlush).toHaveBeenCalled();
    expect(mockSdkShutdown).toHaveBeenCalled();
  });

  it("treats a missing transcript as having no turns", async () => {
    enableTracing();
    mockStdin({
      session_id: "sess-1",
      transcript_path: join(testDir, "nonexistent.jsonl"),
    });

    await hook();

    expect(mockStartActiveObservation).not.toHaveBeenCalled();
    expect(readLog()).toContain("[INFO] Processed 0 turns in ");
  });
});

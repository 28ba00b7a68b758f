import { vi } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Readable } from "node:stream";

export function setupTranscript(
  testDir: string,
  lines: (object | string)[],
): string {
  return setupTranscriptAt(testDir, "abc-session.jsonl", lines);
}

/** Writes one line per item; strings are written verbatim so tests can inject bad lines. */
export function setupTranscriptAt(
  testDir: string,
  fileName: string,
  lines: (object | string)[],
): string {
  const projectDir = join(testDir, ".claude", "projects", "test-project");
  mkdirSync(projectDir, { recursive: true });
  const filePath = join(projectDir, fileName);
  writeFileSync(
    filePath,
    lines
      .map((l) => (typeof l === "string" ? l : JSON.stringify(l)))
      .join("\n"),
  );
  return filePath;
}

export function mockStdin(data: object | string): void {
  const payload = typeof data === "string" ? data : JSON.stringify(data);
  const readable = Readable.from([payload]);
  vi.spyOn(process, "stdin", "get").mockReturnValue(
    readable as unknown as typeof process.stdin,
  );
}

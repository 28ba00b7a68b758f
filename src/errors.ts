/** A transcript line that is not a JSON object, raised under `validate: "strict"`. */
export class TranscriptDecodeError extends Error {
  readonly path: string;
  readonly lineNumber: number;

  constructor(path: string, lineNumber: number, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : "invalid JSON";
    super(`${path}:${lineNumber}: ${reason}`, options);
    this.name = "TranscriptDecodeError";
    this.path = path;
    this.lineNumber = lineNumber;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

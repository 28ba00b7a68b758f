// --- JSON value model shared by the codecs ---

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(line: string): JsonObject {
  const data: unknown = JSON.parse(line);
  if (!isJsonObject(data)) {
    throw new TypeError(`Expected a JSON object, got ${describeJson(data)}`);
  }
  return data;
}

function describeJson(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Reads typed fields out of a raw object while remembering which keys were
 * consumed. A key is only consumed when its value has the expected JSON type,
 * so a mistyped known field ends up in {@link FieldReader.rest} unchanged.
 */
export class FieldReader {
  private readonly consumed = new Set<string>();

  constructor(private readonly raw: JsonObject) {}

  private take(key: string): JsonValue | undefined {
    if (!Object.hasOwn(this.raw, key)) return undefined;
    return this.raw[key];
  }

  string(key: string): string | undefined {
    const value = this.take(key);
    if (typeof value !== "string") return undefined;
    this.consumed.add(key);
    return value;
  }

  nullableString(key: string): string | null | undefined {
    const value = this.take(key);
    if (value !== null && typeof value !== "string") return undefined;
    this.consumed.add(key);
    return value;
  }

  boolean(key: string): boolean | undefined {
    const value = this.take(key);
    if (typeof value !== "boolean") return undefined;
    this.consumed.add(key);
    return value;
  }

  number(key: string): number | undefined {
    const value = this.take(key);
    if (typeof value !== "number") return undefined;
    this.consumed.add(key);
    return value;
  }

  object(key: string): JsonObject | undefined {
    const value = this.take(key);
    if (!isJsonObject(value)) return undefined;
    this.consumed.add(key);
    return value;
  }

  array(key: string): JsonValue[] | undefined {
    const value = this.take(key);
    if (!Array.isArray(value)) return undefined;
    this.consumed.add(key);
    return value;
  }

  value(key: string): JsonValue | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    this.consumed.add(key);
    return value;
  }

  /** Keys that no typed read claimed, in their original order. */
  rest(): JsonObject {
    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(this.raw)) {
      if (!this.consumed.has(key)) extra[key] = value;
    }
    return extra;
  }
}

export function setField(
  out: JsonObject,
  key: string,
  value: JsonValue | undefined,
): void {
  if (value !== undefined) out[key] = value;
}

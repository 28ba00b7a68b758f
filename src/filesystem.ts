import { readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { debug, STATE_FILE } from "./logger.js";

export interface SessionState {
  /** Turns already exported for the session, archived ones included. */
  turn_count: number;
  updated: string;
}

export type State = Record<string, SessionState>;

function isSessionState(value: unknown): value is SessionState {
  return (
    typeof value === "object" &&
    value !== null &&
    "turn_count" in value &&
    typeof value.turn_count === "number" &&
    "updated" in value &&
    typeof value.updated === "string"
  );
}

function isValidState(data: unknown): data is State {
  if (typeof data !== "object" || data === null || Array.isArray(data))
    return false;
  return Object.values(data).every(isSessionState);
}

/**
 * Loads persisted export state. Any failure (missing file, corrupt JSON,
 * invalid shape) yields an empty state and the session is exported from its
 * first turn.
 */
export function loadState(): State {
  try {
    const data: unknown = JSON.parse(readFileSync(STATE_FILE, "utf8"));
    if (!isValidState(data)) {
      debug("State file has invalid shape, resetting to empty state");
      return {};
    }
    return data;
  } catch (e) {
    debug(`Failed to load state: ${e}`);
    return {};
  }
}

export function saveState(state: State): void {
  mkdirSync(dirname(STATE_FILE), { recursive: true });
  writeFileSync(STATE_FILE, JSON.stringify(state, null, 2));
}

export function computeUpdatedState(
  state: State,
  sessionId: string,
  turnCount: number,
  now: Date = new Date(),
): State {
  return {
    ...state,
    [sessionId]: { turn_count: turnCount, updated: now.toISOString() },
  };
}

#!/usr/bin/env node
import { errorMessage } from "./errors.js";
import { hook } from "./hook.js";
import { log } from "./logger.js";

// A failing hook must never block the agent: log and exit cleanly.
hook().catch((e: unknown) => {
  log("ERROR", `Hook crashed: ${errorMessage(e)}`);
});

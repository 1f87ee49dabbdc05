import { isGameError } from "@flipside/core";
import log from "./logger.js";

/** Command boundary: report the failure on stderr and exit 1. */
export function exitWithError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  if (isGameError(err)) {
    log.debug({ error: err.toJSON() }, "command failed");
  } else {
    log.error({ err }, "unexpected failure");
  }
  console.error(`Error: ${message}`);
  process.exit(1);
}

/** Wrap a command action so any error ends at `exitWithError`. */
export function guarded<Args extends unknown[]>(
  action: (...args: Args) => Promise<void>,
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (err: unknown) {
      exitWithError(err);
    }
  };
}

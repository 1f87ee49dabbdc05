import log from "../logger.js";
import type { ConfigData } from "./defaults.js";
import { resolveConfig } from "./resolve.js";

/** Resolve every layer and apply the log level. */
export async function initConfig(): Promise<ConfigData> {
  const config = await resolveConfig();
  log.level(config.logLevel);
  return config;
}

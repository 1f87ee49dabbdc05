import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import log from "../logger.js";
import { CONFIG_KEYS } from "./defaults.js";
import type { ConfigData, ConfigKey } from "./defaults.js";
import { parseConfigValue } from "./validate.js";

/** Values as stored on disk; validated when resolved */
export type RawConfig = Partial<Record<ConfigKey, unknown>>;

/** `FLIPSIDE_HOME` relocates the config directory (used by tests). */
export function getConfigDir(): string {
  return process.env.FLIPSIDE_HOME || join(homedir(), ".flipside");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export async function readConfigFile(): Promise<RawConfig> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      log.warn({ path }, "config file is malformed and was ignored");
      return {};
    }
    throw err;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    log.warn({ path }, "config file is not a JSON object and was ignored");
    return {};
  }

  const data: RawConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    const known = CONFIG_KEYS.find((k) => k === key);
    if (known === undefined) {
      log.warn({ key, source: path }, "unknown config key ignored");
      continue;
    }
    data[known] = value;
  }
  return data;
}

export async function writeConfigFile(data: RawConfig): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

/** Validate `value` for `key`, then store it. Returns the file's new contents. */
export async function updateConfigFile<K extends ConfigKey>(
  key: K,
  value: string,
): Promise<RawConfig> {
  const parsed: ConfigData[K] = parseConfigValue(key, value, "command line");
  const existing = await readConfigFile();
  existing[key] = parsed;
  await writeConfigFile(existing);
  return existing;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

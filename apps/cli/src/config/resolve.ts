import { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
import type { ConfigData, ConfigKey } from "./defaults.js";
import { readConfigFile } from "./configFile.js";
import type { RawConfig } from "./configFile.js";
import { parseConfigValue } from "./validate.js";

export interface ConfigSources {
  file: RawConfig;
  env: Record<string, string | undefined>;
  cli: Partial<Record<ConfigKey, string>>;
}

const cliOverrides: Partial<Record<ConfigKey, string>> = {};

export function setCliOverride(key: ConfigKey, value: string): void {
  cliOverrides[key] = value;
}

/**
 * Layer defaults, then the config file, then the environment, then
 * command-line flags. Every value that wins is validated.
 */
export function mergeConfig(sources: ConfigSources): ConfigData {
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const winner = pickSource(key, sources);
    if (winner !== null) {
      assign(resolved, key, parseConfigValue(key, winner.value, winner.source));
    }
  }

  return resolved;
}

/** Where the effective value of `key` comes from */
export function getSource(key: ConfigKey, sources: ConfigSources): string {
  return pickSource(key, sources)?.source ?? "default";
}

export async function resolveConfig(): Promise<ConfigData> {
  return mergeConfig(await currentSources());
}

export async function currentSources(): Promise<ConfigSources> {
  return {
    file: await readConfigFile(),
    env: process.env,
    cli: { ...cliOverrides },
  };
}

function pickSource(
  key: ConfigKey,
  sources: ConfigSources,
): { value: unknown; source: string } | null {
  const cliVal = sources.cli[key];
  if (isSet(cliVal)) return { value: cliVal, source: "command line" };

  const envVal = sources.env[ENV_MAP[key]];
  if (isSet(envVal)) return { value: envVal, source: `env: ${ENV_MAP[key]}` };

  const fileVal = sources.file[key];
  if (isSet(fileVal)) return { value: fileVal, source: "config file" };

  return null;
}

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function assign<K extends ConfigKey>(target: ConfigData, key: K, value: ConfigData[K]): void {
  target[key] = value;
}

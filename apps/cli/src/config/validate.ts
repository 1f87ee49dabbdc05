import { GameError, GameErrorCode } from "@flipside/core";
import { z } from "zod";
import { CONFIG_KEYS, LOG_LEVELS, MAX_DEPTH } from "./defaults.js";
import type { ConfigData, ConfigKey } from "./defaults.js";

/** Strings from the environment or the command line become numbers; file values pass through */
const integer = z.preprocess(
  (raw) => (typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw),
  z.number().int(),
);

const keyword = z.string().trim().toLowerCase();

const PlayerColorSchema = keyword.pipe(z.enum(["black", "white"]));
const LogLevelSchema = keyword.pipe(z.enum(LOG_LEVELS));

interface ConfigRule<K extends ConfigKey> {
  schema: z.ZodType<ConfigData[K], z.ZodTypeDef, unknown>;
  expected: string;
}

const RULES: { [K in ConfigKey]: ConfigRule<K> } = {
  depth: {
    schema: integer.pipe(z.number().min(1).max(MAX_DEPTH)),
    expected: `an integer from 1 to ${MAX_DEPTH}`,
  },
  color: { schema: PlayerColorSchema, expected: "black or white" },
  delayMs: {
    schema: integer.pipe(z.number().nonnegative()),
    expected: "a non-negative integer",
  },
  logLevel: { schema: LogLevelSchema, expected: `one of ${LOG_LEVELS.join(", ")}` },
};

/**
 * Validate one raw setting (a string from the environment or the command
 * line, or a JSON value from the config file). Throws CONFIGURATION_ERROR
 * naming the key and where the value came from.
 */
export function parseConfigValue<K extends ConfigKey>(
  key: K,
  raw: unknown,
  source: string,
): ConfigData[K] {
  const rule: ConfigRule<K> = RULES[key];
  const result = rule.schema.safeParse(raw);
  if (!result.success) {
    throw new GameError(
      GameErrorCode.CONFIGURATION_ERROR,
      `Invalid ${key} "${String(raw)}" from ${source}: expected ${rule.expected}`,
      { key, value: raw, source, issues: result.error.issues.map((issue) => issue.message) },
    );
  }
  return result.data;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

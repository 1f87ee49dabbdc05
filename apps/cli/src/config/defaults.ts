import type bunyan from "bunyan";

export type PlayerColor = "black" | "white";

export interface ConfigData {
  /** Plies searched by the AI */
  depth: number;
  /** Colour the human plays */
  color: PlayerColor;
  /** Pause before each AI move, in milliseconds */
  delayMs: number;
  logLevel: bunyan.LogLevelString;
}

export type ConfigKey = keyof ConfigData;

export const CONFIG_KEYS: ConfigKey[] = ["depth", "color", "delayMs", "logLevel"];

export const DEFAULTS: ConfigData = {
  depth: 5,
  color: "black",
  delayMs: 1000,
  logLevel: "warn",
};

export const ENV_MAP: Record<ConfigKey, string> = {
  depth: "OTHELLO_DEPTH",
  color: "OTHELLO_COLOR",
  delayMs: "OTHELLO_DELAY_MS",
  logLevel: "LOG_LEVEL",
};

export const MAX_DEPTH = 10;

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const satisfies readonly bunyan.LogLevelString[];

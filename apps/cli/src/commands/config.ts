import type { Command } from "commander";
import { createPrompter } from "../prompter.js";
import {
  CONFIG_KEYS,
  DEFAULTS,
  MAX_DEPTH,
  currentSources,
  getConfigPath,
  getSource,
  isConfigKey,
  mergeConfig,
  parseConfigValue,
  readConfigFile,
  resolveConfig,
  updateConfigFile,
  writeConfigFile,
} from "../config/index.js";
import type { ConfigKey, RawConfig } from "../config/index.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.flipside/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      const configKey = requireKey(key);
      const saved = await updateConfigFile(configKey, value);
      console.log(`Set ${configKey} = ${String(saved[configKey])}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      const configKey = requireKey(key);
      const resolved = await resolveConfig();
      console.log(String(resolved[configKey]));
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const current = mergeConfig({ file: existing, env: {}, cli: {} });
  const prompter = createPrompter();

  console.log("\nOthello CLI Configuration");
  console.log("─────────────────────────\n");

  try {
    const depth = await prompter.ask(`Search depth 1-${MAX_DEPTH} [${current.depth}]: `);
    const color = await prompter.ask(`Your colour (black/white) [${current.color}]: `);
    const delay = await prompter.ask(`AI move delay in ms [${current.delayMs}]: `);

    const data: RawConfig = {
      ...existing,
      depth: answerOr("depth", depth, current.depth),
      color: answerOr("color", color, current.color),
      delayMs: answerOr("delayMs", delay, current.delayMs),
    };

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${String(resolved[key])}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const sources = await currentSources();
  const resolved = mergeConfig(sources);

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const source = getSource(key, sources);
    console.log(`  ${key}: ${String(resolved[key])}  (${source})`);
  }
  console.log(`\nDefaults: depth ${DEFAULTS.depth}, color ${DEFAULTS.color}, delayMs ${DEFAULTS.delayMs}\n`);
}

function answerOr(key: ConfigKey, answer: string | null, fallback: unknown): unknown {
  const trimmed = answer?.trim() ?? "";
  return trimmed === "" ? fallback : parseConfigValue(key, trimmed, "wizard");
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    console.error(
      `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
    );
    process.exit(1);
  }
  return key;
}

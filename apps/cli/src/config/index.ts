export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  LOG_LEVELS,
  MAX_DEPTH,
} from "./defaults.js";
export type { ConfigData, ConfigKey, PlayerColor } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export type { RawConfig } from "./configFile.js";
export { isConfigKey, parseConfigValue } from "./validate.js";
export {
  currentSources,
  getSource,
  mergeConfig,
  resolveConfig,
  setCliOverride,
} from "./resolve.js";
export type { ConfigSources } from "./resolve.js";
export { initConfig } from "./runtime.js";

export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
} from "./defaults";
export type { ConfigData, ConfigKey, RawConfig } from "./defaults";
export { ConfigError, isConfigKey, parseConfigValue, assignConfigValue } from "./parse";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides, sourceOf } from "./resolve";
export type { ConfigSource } from "./resolve";

import { ConfigData, ConfigKey, RawConfig, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";
import { assignConfigValue } from "./parse";

export type ConfigSource = "default" | "config file" | "env" | "cli";

let cliOverrides: RawConfig = {};

export function setCliOverride(key: ConfigKey, value: string): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  cliOverrides = {};
}

function envValue(key: ConfigKey): string | undefined {
  const value = process.env[ENV_MAP[key]];
  return value !== undefined && value !== "" ? value : undefined;
}

/** Which layer supplies `key`: cli over env over config file over default */
export function sourceOf(key: ConfigKey, fileData: RawConfig): ConfigSource {
  if (cliOverrides[key] !== undefined && cliOverrides[key] !== "") return "cli";
  if (envValue(key) !== undefined) return "env";
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}

export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    // Only the highest layer that sets a key is parsed
    const raw = [cliOverrides[key], envValue(key), fileConfig[key]].find(
      (value) => value !== undefined && value !== ""
    );
    if (raw !== undefined) {
      assignConfigValue(resolved, key, raw);
    }
  }

  return resolved;
}

import bunyan from "bunyan";
import { ConfigData, ConfigKey, CONFIG_KEYS } from "./defaults";

export class ConfigError extends Error {
  constructor(
    readonly key: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS: bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const TRUE_WORDS = ["true", "1", "yes", "on"];
const FALSE_WORDS = ["false", "0", "no", "off"];

type Parsers = { [K in ConfigKey]: (raw: string) => ConfigData[K] };

const PARSERS: Parsers = {
  boardWidth: (raw) => parseSize("boardWidth", raw),
  boardHeight: (raw) => parseSize("boardHeight", raw),
  showHints: (raw) => {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.includes(word)) return true;
    if (FALSE_WORDS.includes(word)) return false;
    throw new ConfigError("showHints", `Invalid value for showHints: "${raw}" (expected true or false)`);
  },
  logLevel: (raw) => {
    const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
    if (!level) {
      throw new ConfigError(
        "logLevel",
        `Invalid value for logLevel: "${raw}" (expected one of ${LOG_LEVELS.join(", ")})`
      );
    }
    return level;
  },
};

function parseSize(key: ConfigKey, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(key, `Invalid value for ${key}: "${raw}" (expected a whole number)`);
  }
  return parseInt(trimmed, 10);
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): ConfigData[K] {
  return PARSERS[key](raw);
}

/** Parse `raw` and store it under `key`; throws ConfigError on bad input */
export function assignConfigValue<K extends ConfigKey>(
  target: ConfigData,
  key: K,
  raw: string
): void {
  target[key] = parseConfigValue(key, raw);
}

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { RawConfig, CONFIG_KEYS, ConfigKey } from "./defaults";
import { parseConfigValue } from "./parse";
import log from "../logger";

export function getConfigDir(): string {
  return process.env.FLIPSIDE_CONFIG_DIR || join(homedir(), ".flipside");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readConfigFile(): Promise<RawConfig> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (err instanceof SyntaxError) {
      log.warn({ path }, 'config file is malformed and was ignored; run "flipside config set" to recreate it');
      return {};
    }
    throw err;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const data: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      data[key] = String(value);
    }
  }
  return data;
}

export async function writeConfigFile(data: RawConfig): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

/** Validate `value` for `key`, then persist it */
export async function updateConfigFile(key: ConfigKey, value: string): Promise<RawConfig> {
  parseConfigValue(key, value);
  const existing = await readConfigFile();
  existing[key] = value.trim();
  await writeConfigFile(existing);
  return existing;
}

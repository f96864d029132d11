import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  sourceOf,
  isConfigKey,
  CONFIG_KEYS,
  ConfigKey,
} from "../config";

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

async function report(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.flipside/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action((key: string, value: string) =>
      report(async () => {
        const configKey = requireKey(key);
        await updateConfigFile(configKey, value);
        console.log(`Set ${configKey} = ${value.trim()}`);
      })
    );

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action((key: string) =>
      report(async () => {
        const resolved = await resolveConfig();
        console.log(String(resolved[requireKey(key)]));
      })
    );

  configCmd
    .command("list", { isDefault: true })
    .description("List all config values with sources")
    .action(() => report(printConfigList));
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${String(resolved[key])}  (${sourceOf(key, fileData)})`);
  }
  console.log("");
}

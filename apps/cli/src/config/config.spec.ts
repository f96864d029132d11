import { strict as assert } from "assert";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConfigError,
  DEFAULTS,
  ENV_MAP,
  CONFIG_KEYS,
  parseConfigValue,
  resolveConfig,
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  setCliOverride,
  clearCliOverrides,
  sourceOf,
  getConfigPath,
} from "./index";
import log from "../logger";

const ENV_NAMES = [...Object.values(ENV_MAP), "FLIPSIDE_CONFIG_DIR"];

describe("config", () => {
  const saved: Record<string, string | undefined> = {};
  let dir: string;

  before(() => {
    for (const name of ENV_NAMES) saved[name] = process.env[name];
    log.level("fatal");
  });

  after(() => {
    for (const name of ENV_NAMES) {
      const value = saved[name];
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    log.level("warn");
  });

  beforeEach(() => {
    for (const name of ENV_NAMES) delete process.env[name];
    dir = mkdtempSync(join(tmpdir(), "flipside-config-"));
    process.env.FLIPSIDE_CONFIG_DIR = dir;
    clearCliOverrides();
  });

  afterEach(() => {
    clearCliOverrides();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("parseConfigValue", () => {
    it("parses board sizes as whole numbers", () => {
      assert.equal(parseConfigValue("boardWidth", " 10 "), 10);
      assert.throws(() => parseConfigValue("boardHeight", "ten"), ConfigError);
      assert.throws(() => parseConfigValue("boardHeight", "-4"), /boardHeight/);
    });

    it("parses booleans loosely", () => {
      assert.equal(parseConfigValue("showHints", "off"), false);
      assert.equal(parseConfigValue("showHints", "YES"), true);
      assert.throws(() => parseConfigValue("showHints", "maybe"), /expected true or false/);
    });

    it("accepts bunyan level names", () => {
      assert.equal(parseConfigValue("logLevel", "DEBUG"), "debug");
      assert.throws(() => parseConfigValue("logLevel", "loud"), ConfigError);
    });
  });

  describe("resolveConfig", () => {
    it("falls back to defaults", async () => {
      assert.deepEqual(await resolveConfig(), DEFAULTS);
    });

    it("layers config file, env and cli overrides", async () => {
      await writeConfigFile({ boardWidth: "6", showHints: "false" });
      process.env.BOARD_WIDTH = "10";
      setCliOverride("boardWidth", "12");

      const fileData = await readConfigFile();
      assert.deepEqual(await resolveConfig(), {
        boardWidth: 12,
        boardHeight: 8,
        showHints: false,
        logLevel: "warn",
      });
      assert.equal(sourceOf("boardWidth", fileData), "cli");
      assert.equal(sourceOf("showHints", fileData), "config file");
      assert.equal(sourceOf("logLevel", fileData), "default");

      clearCliOverrides();
      assert.equal((await resolveConfig()).boardWidth, 10);
      assert.equal(sourceOf("boardWidth", fileData), "env");
    });

    it("names the key of a bad value", async () => {
      process.env.LOG_LEVEL = "chatty";
      await assert.rejects(resolveConfig(), (err: unknown) => {
        return err instanceof ConfigError && err.key === "logLevel";
      });
    });

    it("parses only the layer that wins", async () => {
      await writeConfigFile({ boardWidth: "wide", logLevel: "chatty" });
      process.env.BOARD_WIDTH = "10";
      setCliOverride("logLevel", "debug");

      const resolved = await resolveConfig();
      assert.equal(resolved.boardWidth, 10);
      assert.equal(resolved.logLevel, "debug");
    });

    it("still rejects a bad value that nothing overrides", async () => {
      await writeConfigFile({ boardHeight: "tall" });
      await assert.rejects(resolveConfig(), /Invalid value for boardHeight: "tall"/);
    });
  });

  describe("config file", () => {
    it("lives in the configured directory", () => {
      assert.equal(getConfigPath(), join(dir, "config.json"));
    });

    it("reads scalar JSON values as strings and ignores unknown keys", async () => {
      writeFileSync(
        getConfigPath(),
        JSON.stringify({ boardWidth: 6, showHints: false, theme: "dark" })
      );
      assert.deepEqual(await readConfigFile(), { boardWidth: "6", showHints: "false" });
    });

    it("ignores a malformed file", async () => {
      writeFileSync(getConfigPath(), "{ not json");
      assert.deepEqual(await readConfigFile(), {});
    });

    it("validates values before writing them", async () => {
      await updateConfigFile("boardHeight", "4");
      await assert.rejects(updateConfigFile("boardWidth", "wide"), ConfigError);

      const stored: unknown = JSON.parse(readFileSync(getConfigPath(), "utf-8"));
      assert.deepEqual(stored, { boardHeight: "4" });
    });

    it("covers every key in the env map", () => {
      assert.deepEqual(Object.keys(ENV_MAP).sort(), [...CONFIG_KEYS].sort());
    });
  });
});

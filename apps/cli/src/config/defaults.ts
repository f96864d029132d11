import bunyan from "bunyan";

export interface ConfigData {
  boardWidth: number;
  boardHeight: number;
  /** Draw legal-move markers on the board */
  showHints: boolean;
  logLevel: bunyan.LogLevelString;
}

export type ConfigKey = keyof ConfigData;

/** Config values as they arrive from the file, the environment or the command line */
export type RawConfig = Partial<Record<ConfigKey, string>>;

export const CONFIG_KEYS: ConfigKey[] = [
  "boardWidth",
  "boardHeight",
  "showHints",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  boardWidth: 8,
  boardHeight: 8,
  showHints: true,
  logLevel: "warn",
};

export const ENV_MAP: Record<ConfigKey, string> = {
  boardWidth: "BOARD_WIDTH",
  boardHeight: "BOARD_HEIGHT",
  showHints: "SHOW_HINTS",
  logLevel: "LOG_LEVEL",
};

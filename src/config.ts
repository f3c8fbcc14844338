import { join } from "path";
import { splitArgs } from "./utils.js";

export type FastListMode = "auto" | "on" | "off";

export const FAST_LIST_MODES: readonly FastListMode[] = ["auto", "on", "off"];

export interface SizerConfig {
  rcloneBin: string;
  cacheFile: string;
  historyFile: string;
  /** Extra `rclone size` args: RCLONE_SIZE_ARGS first, then command-line pass-through. */
  extraArgs: string[];
  fastListMode: FastListMode;
  sortBySizeDefault: boolean;
  sizeAlignMaxLen: number;
  color: boolean;
  statusWidth: number;
  maxRemoteHops: number;
  logFile?: string;
}

export const DEFAULT_CACHE_FILE = "cloud-folder-size-data.txt";
export const DEFAULT_HISTORY_FILE = "cloud-folder-size-history.md";
export const DEFAULT_STATUS_WIDTH = 96;
export const DEFAULT_MAX_REMOTE_HOPS = 5;
export const DEFAULT_SIZE_ALIGN_MAX_LEN = 20;

export interface ConfigOverrides {
  fastListMode?: FastListMode;
  passthroughArgs?: string[];
  logFile?: string;
}

export function isFastListMode(value: string): value is FastListMode {
  return (FAST_LIST_MODES as readonly string[]).includes(value);
}

/**
 * Build the runtime configuration from environment variables, with
 * command-line overrides taking precedence.
 * Problems that do not stop the program are returned as warnings.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  cwd: string,
  overrides: ConfigOverrides = {}
): { config: SizerConfig; warnings: string[] } {
  const warnings: string[] = [];

  let fastListMode: FastListMode = "auto";
  const envMode = env.FAST_LIST_MODE?.trim();
  if (envMode) {
    if (isFastListMode(envMode)) {
      fastListMode = envMode;
    } else {
      warnings.push(`Unknown FAST_LIST_MODE "${envMode}", using auto.`);
    }
  }
  if (overrides.fastListMode) {
    fastListMode = overrides.fastListMode;
  }

  let sizeAlignMaxLen = DEFAULT_SIZE_ALIGN_MAX_LEN;
  if (env.SIZE_ALIGN_MAX_LEN) {
    const parsed = parseInt(env.SIZE_ALIGN_MAX_LEN, 10);
    if (isNaN(parsed) || parsed < 1) {
      warnings.push(`Invalid SIZE_ALIGN_MAX_LEN "${env.SIZE_ALIGN_MAX_LEN}", using ${DEFAULT_SIZE_ALIGN_MAX_LEN}.`);
    } else {
      sizeAlignMaxLen = parsed;
    }
  }

  return {
    config: {
      rcloneBin: env.RCLONE_BIN || "rclone",
      cacheFile: env.SIZE_DATA_FILE || join(cwd, DEFAULT_CACHE_FILE),
      historyFile: env.HISTORY_FILE || join(cwd, DEFAULT_HISTORY_FILE),
      extraArgs: [...splitArgs(env.RCLONE_SIZE_ARGS), ...(overrides.passthroughArgs ?? [])],
      fastListMode,
      sortBySizeDefault: (env.SORT_BY_SIZE_DEFAULT ?? "1") === "1",
      sizeAlignMaxLen,
      color: (env.MENU_COLOR ?? "1") === "1" && env.NO_COLOR === undefined,
      statusWidth: DEFAULT_STATUS_WIDTH,
      maxRemoteHops: DEFAULT_MAX_REMOTE_HOPS,
      logFile: overrides.logFile,
    },
    warnings,
  };
}

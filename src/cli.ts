import { SizeCache } from "./cache.js";
import { loadConfig } from "./config.js";
import type { FastListMode } from "./config.js";
import { HistoryWriter } from "./history.js";
import { MenuSession } from "./menu.js";
import { RcloneCli } from "./rclone.js";
import { SizeRunner } from "./runner.js";
import { createLogger, Terminal } from "./terminal.js";

export const VERSION = "0.1.0";

export interface CliOptions {
  help: boolean;
  version: boolean;
  fastListMode?: FastListMode;
  logFile?: string;
  /** Arguments passed through to `rclone size` */
  passthrough: string[];
}

export function parseArgs(args: string[]): CliOptions {
  const result: CliOptions = {
    help: false,
    version: false,
    passthrough: [],
  };

  let passthroughOnly = false;
  for (const arg of args) {
    if (passthroughOnly) {
      result.passthrough.push(arg);
      continue;
    }

    if (arg === "--") {
      passthroughOnly = true;
    } else if (arg === "--fast-list") {
      result.fastListMode = "on";
    } else if (arg === "--no-fast-list") {
      result.fastListMode = "off";
    } else if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg.startsWith("--log-file=")) {
      result.logFile = arg.slice("--log-file=".length);
    } else {
      // Unknown args go to rclone size
      result.passthrough.push(arg);
    }
  }

  return result;
}

export const HELP_TEXT = `
📦 cloud-folder-size - rclone folder sizes with a local cache

Usage:
  cloud-folder-size [--fast-list|--no-fast-list] [--log-file=<path>] [-- <rclone size args>]

Options:
  --fast-list          Force --fast-list for all remotes
  --no-fast-list       Disable --fast-list and strip it from extra args
  --log-file=<path>    Append diagnostic messages to a file
  -v, --version        Show version information
  -h, --help           Show this help

Environment:
  SIZE_DATA_FILE       Cache file (default: ./cloud-folder-size-data.txt)
  HISTORY_FILE         History log (default: ./cloud-folder-size-history.md)
  RCLONE_SIZE_ARGS     Extra args appended to rclone size
  FAST_LIST_MODE       auto|on|off (default: auto)
  RCLONE_BIN           rclone executable (default: rclone)

Notes:
  Unknown args are passed through to rclone size; use -- to force pass-through.
  Google Drive remotes get --fast-list in auto mode.
  OneDrive remotes get --onedrive-delta only when --fast-list is enabled.
`;

export async function runCli(argv: string[]): Promise<void> {
  const options = parseArgs(argv.slice(2));

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (options.version) {
    console.log(`cloud-folder-size v${VERSION}`);
    return;
  }

  const { config, warnings } = loadConfig(process.env, process.cwd(), {
    fastListMode: options.fastListMode,
    passthroughArgs: options.passthrough,
    logFile: options.logFile,
  });

  const terminal = new Terminal({ color: config.color && process.stdout.isTTY, statusWidth: config.statusWidth });
  for (const warning of warnings) {
    terminal.warn(warning);
  }

  const log = createLogger(config.logFile);
  const rclone = new RcloneCli(config.rcloneBin);
  await rclone.requireRclone();

  const cache = new SizeCache(config.cacheFile, {
    warn: (message) => process.stderr.write(`${message}\n`),
  });
  const entries = cache.load();
  log(`Loaded ${entries.length} cached sizes from ${cache.path}`);

  const history = new HistoryWriter(config.historyFile, {
    warn: (message) => process.stderr.write(`${message}\n`),
  });
  log(`History log: ${history.path}`);

  const runner = new SizeRunner({ config, resolver: rclone, history, terminal, log });
  const session = new MenuSession({ config, cache, rclone, runner, terminal });
  await session.run();
}

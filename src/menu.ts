import { input, select } from "@inquirer/prompts";
import type { SizeCache } from "./cache.js";
import type { SizerConfig } from "./config.js";
import type { RcloneCli } from "./rclone.js";
import type { RunResult, SizeRunner } from "./runner.js";
import { COLORS } from "./terminal.js";
import type { Terminal } from "./terminal.js";
import { formatBytesCompact, pluralize } from "./utils.js";

export interface MenuChoice<T> {
  name: string;
  value: T;
}

/**
 * The one capability the menus need from an interactive UI.
 * `select` resolves to undefined when the user cancels.
 */
export interface Picker {
  select<T>(message: string, choices: MenuChoice<T>[]): Promise<T | undefined>;
  pause(message?: string): Promise<void>;
}

export type FolderAction =
  | { kind: "return" }
  | { kind: "sort" }
  | { kind: "folder"; folder: string }
  | { kind: "size-all" }
  | { kind: "clear" };

export type RemoteAction =
  | { kind: "remote"; remote: string }
  | { kind: "clear-all" }
  | { kind: "quit" };

export const ACTION_RETURN = "Return to remote list";
export const ACTION_SORT_SIZE = "Sort by size (desc)";
export const ACTION_SORT_ORIGINAL = "Show original order";
export const ACTION_SIZE_ALL = "Get size for all unsized folders";
export const ACTION_CLEAR = "Clear size data for this remote";
export const ACTION_CLEAR_ALL = "Clear size data for all remotes";
export const ACTION_QUIT = "Quit";

const FALLBACK_TERM_HEIGHT = 24;
const termPageSize = (reserved = 4) =>
  Math.max(5, (process.stdout.rows ?? FALLBACK_TERM_HEIGHT) - reserved);

function isPromptExit(err: unknown): boolean {
  return err instanceof Error && err.name === "ExitPromptError";
}

export const inquirerPicker: Picker = {
  async select<T>(message: string, choices: MenuChoice<T>[]): Promise<T | undefined> {
    try {
      return await select<T>({ message, choices, pageSize: termPageSize(), loop: false });
    } catch (err) {
      if (isPromptExit(err)) return undefined;
      throw err;
    }
  },

  async pause(message = "Press Enter to continue..."): Promise<void> {
    try {
      await input({ message });
    } catch (err) {
      if (!isPromptExit(err)) throw err;
    }
  },
};

/**
 * Folders in display order: by cached size (largest first, unsized last)
 * or as listed.
 */
export function orderFolders(folders: string[], cache: SizeCache, remote: string, sortBySize: boolean): string[] {
  if (!sortBySize) return [...folders];
  return [...folders].sort((a, b) => {
    const sa = cache.lookup(remote, a) ?? -1n;
    const sb = cache.lookup(remote, b) ?? -1n;
    return sa === sb ? 0 : sa > sb ? -1 : 1;
  });
}

export function folderLabel(folder: string, bytes: bigint | undefined, width: number): string {
  if (bytes === undefined) return folder;
  const name = folder.length > width ? folder.slice(0, width) : folder;
  return `${name.padEnd(width)}  [${formatBytesCompact(bytes)}]`;
}

export function buildFolderChoices(
  folders: string[],
  cache: SizeCache,
  remote: string,
  sortBySize: boolean,
  alignMax: number
): MenuChoice<FolderAction>[] {
  const width = Math.min(alignMax, Math.max(0, ...folders.map((f) => f.length)));

  return [
    { name: ACTION_RETURN, value: { kind: "return" } },
    { name: sortBySize ? ACTION_SORT_ORIGINAL : ACTION_SORT_SIZE, value: { kind: "sort" } },
    ...orderFolders(folders, cache, remote, sortBySize).map((folder) => ({
      name: folderLabel(folder, cache.lookup(remote, folder), width),
      value: { kind: "folder" as const, folder },
    })),
    { name: ACTION_SIZE_ALL, value: { kind: "size-all" } },
    { name: ACTION_CLEAR, value: { kind: "clear" } },
  ];
}

export function buildRemoteChoices(remotes: string[]): MenuChoice<RemoteAction>[] {
  return [
    ...remotes.map((remote) => ({ name: remote, value: { kind: "remote" as const, remote } })),
    { name: ACTION_CLEAR_ALL, value: { kind: "clear-all" } },
    { name: ACTION_QUIT, value: { kind: "quit" } },
  ];
}

export interface MenuSessionDeps {
  config: SizerConfig;
  cache: SizeCache;
  rclone: RcloneCli;
  runner: SizeRunner;
  terminal: Terminal;
  picker?: Picker;
}

/**
 * Interactive remote -> folder browsing, with sizes cached after each run.
 */
export class MenuSession {
  private config: SizerConfig;
  private cache: SizeCache;
  private rclone: RcloneCli;
  private runner: SizeRunner;
  private terminal: Terminal;
  private picker: Picker;

  constructor(deps: MenuSessionDeps) {
    this.config = deps.config;
    this.cache = deps.cache;
    this.rclone = deps.rclone;
    this.runner = deps.runner;
    this.terminal = deps.terminal;
    this.picker = deps.picker ?? inquirerPicker;
  }

  async run(): Promise<void> {
    while (true) {
      const remotes = await this.rclone.listRemotes();
      if (remotes.length === 0) {
        this.terminal.print("No rclone remotes found.");
        return;
      }

      const action = await this.picker.select("rclone folder sizes: select a remote", buildRemoteChoices(remotes));
      if (!action || action.kind === "quit") {
        return;
      }

      if (action.kind === "clear-all") {
        if (this.cache.clearAll()) {
          this.terminal.blank();
          this.terminal.ok("Cleared cached size data for all remotes.");
        }
        await this.picker.pause();
        continue;
      }

      await this.folderMenu(action.remote);
    }
  }

  async folderMenu(remote: string): Promise<void> {
    let sortBySize = this.config.sortBySizeDefault;

    while (true) {
      const folders = await this.rclone.listTopLevelDirs(remote);
      if (folders.length === 0) {
        this.terminal.print(`No top-level folders found on ${remote}:`);
        await this.picker.pause();
        return;
      }

      const choices = buildFolderChoices(folders, this.cache, remote, sortBySize, this.config.sizeAlignMaxLen);
      const action = await this.picker.select(`[REMOTE: ${remote}] Choose a top-level folder`, choices);
      if (!action || action.kind === "return") {
        return;
      }

      switch (action.kind) {
        case "sort":
          sortBySize = !sortBySize;
          break;
        case "size-all":
          await this.sizeAllUnsized(remote, folders);
          await this.picker.pause();
          break;
        case "clear": {
          const removed = this.cache.clear(remote);
          if (removed !== null) {
            this.terminal.blank();
            this.terminal.ok(`Cleared ${removed} cached size ${pluralize(removed, "entry", "entries")} for remote ${remote}.`);
          }
          await this.picker.pause();
          break;
        }
        case "folder":
          await this.measure(remote, action.folder);
          await this.picker.pause();
          break;
      }
    }
  }

  /**
   * Size every folder that has no cached value yet; returns how many were run.
   */
  async sizeAllUnsized(remote: string, folders: string[]): Promise<number> {
    const unsized = folders.filter((folder) => this.cache.lookup(remote, folder) === undefined);
    if (unsized.length === 0) {
      this.terminal.blank();
      this.terminal.print("All displayed folders already have size data.");
      return 0;
    }

    let i = 0;
    for (const folder of unsized) {
      i++;
      this.terminal.blank();
      this.terminal.print(`[${i}/${unsized.length}] ${folder}`, this.terminal.paint(`[${i}/${unsized.length}] ${folder}`, COLORS.bold));
      const result = await this.measure(remote, folder);
      if (result.aborted) {
        break;
      }
    }

    this.terminal.blank();
    this.terminal.print(`Finished sizing ${i} ${pluralize(i, "folder", "folders")}.`);
    return i;
  }

  /**
   * Run one measurement with Ctrl+C aborting the run, then cache its byte total.
   */
  async measure(remote: string, folder: string): Promise<RunResult> {
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once("SIGINT", onInterrupt);

    try {
      const result = await this.runner.runMeasurement(remote, folder, { signal: controller.signal });
      if (result.bytes !== undefined && !this.cache.upsert(remote, folder, result.bytes)) {
        this.terminal.warn(`Size for ${result.target} not cached.`);
      }
      return result;
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }
}

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { LogFn } from "./terminal.js";
import { isByteCount } from "./utils.js";

// One cached measurement
export interface CacheEntry {
  remote: string;
  folder: string;
  bytes: bigint;
}

export const CACHE_HEADER = [
  "# Cache for cloud-folder-size",
  "# Format: remote|folder|bytes",
  "# Safe to delete; it will be recreated.",
];

function isKeyPart(value: string): boolean {
  return value !== "" && !/[|\r\n]/.test(value);
}

export interface SizeCacheOptions {
  warn?: LogFn;
}

/**
 * Folder sizes keyed by (remote, folder), persisted as `remote|folder|bytes` lines.
 * Memory only changes once the new file is in place; a failed write is
 * reported through `warn` and leaves the previous state.
 */
export class SizeCache {
  private cacheFile: string;
  private items: CacheEntry[] = [];
  private warn: LogFn;

  constructor(cacheFile: string, options: SizeCacheOptions = {}) {
    this.cacheFile = cacheFile;
    this.warn = options.warn ?? ((message) => console.error(message));
  }

  get path(): string {
    return this.cacheFile;
  }

  /**
   * Read the cache file, replacing anything held in memory.
   * Malformed lines are skipped; an unreadable file gives an empty cache.
   */
  load(): CacheEntry[] {
    this.items = [];
    if (!existsSync(this.cacheFile)) {
      return this.entries();
    }

    let content: string;
    try {
      content = readFileSync(this.cacheFile, "utf-8");
    } catch (err) {
      this.warn(`⚠  WARNING: Unable to read size cache: ${this.cacheFile} (${err instanceof Error ? err.message : String(err)})`);
      return this.entries();
    }

    for (const line of content.split("\n")) {
      if (!line || /^\s*#/.test(line)) continue;

      const fields = line.split("|");
      if (fields.length !== 3) continue;

      const [remote, folder, bytes] = fields;
      if (!remote || !folder || !isByteCount(bytes)) continue;

      this.items.push({ remote, folder, bytes: BigInt(bytes) });
    }

    return this.entries();
  }

  entries(): CacheEntry[] {
    return this.items.map((entry) => ({ ...entry }));
  }

  lookup(remote: string, folder: string): bigint | undefined {
    return this.items.find((e) => e.remote === remote && e.folder === folder)?.bytes;
  }

  /**
   * Insert or overwrite the size for (remote, folder) and persist.
   * Returns false, leaving the cache untouched, when the value is not a
   * non-negative integer, the key cannot be stored or the file cannot be
   * written.
   */
  upsert(remote: string, folder: string, bytes: string | bigint): boolean {
    if (!isKeyPart(remote) || !isKeyPart(folder)) {
      return false;
    }

    let value: bigint;
    if (typeof bytes === "bigint") {
      if (bytes < 0n) return false;
      value = bytes;
    } else {
      if (!isByteCount(bytes)) return false;
      value = BigInt(bytes);
    }

    const exists = this.items.some((e) => e.remote === remote && e.folder === folder);
    const next = exists
      ? this.items.map((e) => (e.remote === remote && e.folder === folder ? { ...e, bytes: value } : e))
      : [...this.items, { remote, folder, bytes: value }];

    return this.save(next);
  }

  /**
   * Remove every entry of a remote; returns how many were removed, or
   * null when the file could not be written.
   */
  clear(remote: string): number | null {
    const toKeep = this.items.filter((e) => e.remote !== remote);
    const removed = this.items.length - toKeep.length;
    return this.save(toKeep) ? removed : null;
  }

  clearAll(): boolean {
    return this.save([]);
  }

  private save(next: CacheEntry[]): boolean {
    const tmpFile = `${this.cacheFile}.tmp`;
    const lines = [
      ...CACHE_HEADER,
      ...next.map((e) => `${e.remote}|${e.folder}|${e.bytes}`),
    ];

    try {
      mkdirSync(dirname(this.cacheFile), { recursive: true });
      writeFileSync(tmpFile, lines.join("\n") + "\n");
      renameSync(tmpFile, this.cacheFile);
    } catch (err) {
      if (existsSync(tmpFile)) {
        rmSync(tmpFile, { force: true });
      }
      this.warn(`⚠  WARNING: Unable to write size cache: ${this.cacheFile} (${err instanceof Error ? err.message : String(err)})`);
      return false;
    }

    this.items = next;
    return true;
  }
}

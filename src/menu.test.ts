import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { Readable } from "stream";

import { SizeCache } from "./cache.js";
import { loadConfig } from "./config.js";
import { HistoryWriter } from "./history.js";
import {
  ACTION_CLEAR,
  ACTION_CLEAR_ALL,
  ACTION_QUIT,
  ACTION_RETURN,
  ACTION_SIZE_ALL,
  ACTION_SORT_ORIGINAL,
  ACTION_SORT_SIZE,
  MenuSession,
  buildFolderChoices,
  buildRemoteChoices,
  folderLabel,
} from "./menu.js";
import type { MenuChoice, Picker } from "./menu.js";
import { RcloneCli } from "./rclone.js";
import type { BackendInfo, MeasureLauncher } from "./rclone.js";
import { SizeRunner } from "./runner.js";
import { Terminal } from "./terminal.js";

const TEST_DIR = join(tmpdir(), "cloud-folder-size-menu-test-" + Date.now());
const CACHE_FILE = join(TEST_DIR, "sizes.txt");

class FakeRclone extends RcloneCli {
  constructor(private remotes: string[], private folders: Record<string, string[]>) {
    super("rclone");
  }

  async listRemotes(): Promise<string[]> {
    return this.remotes;
  }

  async listTopLevelDirs(remote: string): Promise<string[]> {
    return this.folders[remote] ?? [];
  }

  async resolveBackendType(): Promise<BackendInfo> {
    return { type: "s3", target: "" };
  }
}

// Answers select() calls by choice name, in order
class ScriptedPicker implements Picker {
  messages: string[] = [];
  pauses = 0;

  constructor(private answers: string[]) {}

  async select<T>(message: string, choices: MenuChoice<T>[]): Promise<T | undefined> {
    this.messages.push(message);
    const answer = this.answers.shift();
    return choices.find((choice) => choice.name === answer)?.value;
  }

  async pause(): Promise<void> {
    this.pauses++;
  }
}

// Reports a size derived from the folder name length
const sizeByName: MeasureLauncher = (_command, args) => {
  const folder = args[1].slice(args[1].indexOf(":") + 1);
  return {
    output: Readable.from([`Total size: ${folder.length} B (${folder.length * 100} Byte)\n`]),
    exited: Promise.resolve(0),
    kill: () => {},
  };
};

function makeSession(
  rclone: RcloneCli,
  picker: Picker,
  launch: MeasureLauncher = sizeByName,
  cacheFile: string = CACHE_FILE
) {
  const config = loadConfig({}, TEST_DIR).config;
  const stderr: string[] = [];
  const terminal = new Terminal({
    color: false,
    stdout: { write: () => true },
    stderr: { write: (text: string) => stderr.push(text) },
  });
  const cacheWarnings: string[] = [];
  const cache = new SizeCache(cacheFile, { warn: (message) => cacheWarnings.push(message) });
  const history = new HistoryWriter(join(TEST_DIR, "history.md"));
  const runner = new SizeRunner({ config, resolver: rclone, history, terminal, launch });
  return { session: new MenuSession({ config, cache, rclone, runner, terminal, picker }), cache, stderr, cacheWarnings };
}

function setupTestDirs() {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
  mkdirSync(TEST_DIR, { recursive: true });
}

function cleanupTestDirs() {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe("menu choices", () => {
  beforeEach(() => {
    setupTestDirs();
  });

  afterEach(() => {
    cleanupTestDirs();
  });

  test("should sort folders by cached size with unsized ones last", () => {
    const cache = new SizeCache(CACHE_FILE);
    cache.upsert("r1", "Photos", "2000");
    cache.upsert("r1", "Archive", "5000000");

    const choices = buildFolderChoices(["Photos", "Docs", "Archive"], cache, "r1", true, 20);

    expect(choices.map((c) => c.name)).toEqual([
      ACTION_RETURN,
      ACTION_SORT_ORIGINAL,
      "Archive  [5.00 MB]",
      "Photos   [2.00 KB]",
      "Docs",
      ACTION_SIZE_ALL,
      ACTION_CLEAR,
    ]);
    expect(choices[2].value).toEqual({ kind: "folder", folder: "Archive" });
  });

  test("should keep the listing order when not sorting", () => {
    const cache = new SizeCache(CACHE_FILE);
    cache.upsert("r1", "Archive", "5000000");

    const choices = buildFolderChoices(["Photos", "Docs", "Archive"], cache, "r1", false, 20);

    expect(choices.slice(1, 5).map((c) => c.name)).toEqual([ACTION_SORT_SIZE, "Photos", "Docs", "Archive  [5.00 MB]"]);
  });

  test("should truncate long names to the alignment width", () => {
    expect(folderLabel("AVeryLongFolderNameIndeed", 1000n, 10)).toBe("AVeryLongF  [1.00 KB]");
    expect(folderLabel("AVeryLongFolderNameIndeed", undefined, 10)).toBe("AVeryLongFolderNameIndeed");
  });

  test("should list remotes followed by the global actions", () => {
    expect(buildRemoteChoices(["b2", "gdrive"]).map((c) => c.name)).toEqual(["b2", "gdrive", ACTION_CLEAR_ALL, ACTION_QUIT]);
  });
});

describe("MenuSession", () => {
  beforeEach(() => {
    setupTestDirs();
  });

  afterEach(() => {
    cleanupTestDirs();
  });

  test("should cache the size of a selected folder", async () => {
    const rclone = new FakeRclone(["r1"], { r1: ["Photos", "Docs"] });
    const picker = new ScriptedPicker(["r1", "Photos", ACTION_RETURN, ACTION_QUIT]);
    const { session, cache } = makeSession(rclone, picker);

    await session.run();

    expect(cache.entries()).toEqual([{ remote: "r1", folder: "Photos", bytes: 600n }]);
    expect(picker.messages).toEqual([
      "rclone folder sizes: select a remote",
      "[REMOTE: r1] Choose a top-level folder",
      "[REMOTE: r1] Choose a top-level folder",
      "rclone folder sizes: select a remote",
    ]);
    expect(picker.pauses).toBe(1);
  });

  test("should size only unsized folders", async () => {
    const rclone = new FakeRclone(["r1"], {});
    const { session, cache } = makeSession(rclone, new ScriptedPicker([]));
    cache.upsert("r1", "A", "1");

    const count = await session.sizeAllUnsized("r1", ["A", "Books", "Music"]);

    expect(count).toBe(2);
    expect(cache.entries()).toEqual([
      { remote: "r1", folder: "A", bytes: 1n },
      { remote: "r1", folder: "Books", bytes: 500n },
      { remote: "r1", folder: "Music", bytes: 500n },
    ]);
  });

  test("should not cache failed runs", async () => {
    const failing: MeasureLauncher = () => ({
      output: Readable.from(["Total size: 1 B (1 Byte)\n"]),
      exited: Promise.resolve(1),
      kill: () => {},
    });
    const { session, cache } = makeSession(new FakeRclone([], {}), new ScriptedPicker([]), failing);
    cache.upsert("r1", "Photos", "42");

    const result = await session.measure("r1", "Photos");

    expect(result.bytes).toBeUndefined();
    expect(cache.entries()).toEqual([{ remote: "r1", folder: "Photos", bytes: 42n }]);
  });

  test("should warn instead of failing when the cache cannot be written", async () => {
    const blocker = join(TEST_DIR, "blocker");
    writeFileSync(blocker, "not a directory");
    const { session, cache, stderr, cacheWarnings } = makeSession(
      new FakeRclone([], {}),
      new ScriptedPicker([]),
      sizeByName,
      join(blocker, "sizes.txt")
    );

    const result = await session.measure("r1", "Photos");

    expect(result.bytes).toBe(600n);
    expect(cache.lookup("r1", "Photos")).toBeUndefined();
    expect(cacheWarnings).toHaveLength(1);
    expect(stderr).toEqual(["⚠  WARNING: Size for r1:Photos not cached.\n"]);
  });

  test("should warn when a folder name cannot be cached", async () => {
    const { session, cache, stderr } = makeSession(new FakeRclone([], {}), new ScriptedPicker([]));

    const result = await session.measure("r1", "a|b");

    expect(result.bytes).toBe(300n);
    expect(cache.lookup("r1", "a|b")).toBeUndefined();
    expect(stderr).toEqual(["⚠  WARNING: Size for r1:a|b not cached.\n"]);
  });

  test("should keep running when clearing the cache cannot be written", async () => {
    const blocker = join(TEST_DIR, "blocker");
    writeFileSync(blocker, "not a directory");
    const picker = new ScriptedPicker([ACTION_CLEAR_ALL, ACTION_QUIT]);
    const { session, stderr, cacheWarnings } = makeSession(
      new FakeRclone(["r1"], {}),
      picker,
      sizeByName,
      join(blocker, "sizes.txt")
    );

    await session.run();

    expect(cacheWarnings).toHaveLength(1);
    expect(stderr).toEqual([]);
    expect(picker.messages).toHaveLength(2);
  });

  test("should clear a remote from the folder menu", async () => {
    const rclone = new FakeRclone(["r1"], { r1: ["Photos"] });
    const picker = new ScriptedPicker([ACTION_CLEAR, ACTION_RETURN]);
    const { session, cache } = makeSession(rclone, picker);
    cache.upsert("r1", "Photos", "1");
    cache.upsert("r2", "Music", "2");

    await session.folderMenu("r1");

    expect(cache.entries()).toEqual([{ remote: "r2", folder: "Music", bytes: 2n }]);
  });

  test("should clear every remote from the remote menu", async () => {
    const rclone = new FakeRclone(["r1"], {});
    const picker = new ScriptedPicker([ACTION_CLEAR_ALL, ACTION_QUIT]);
    const { session, cache } = makeSession(rclone, picker);
    cache.upsert("r1", "Photos", "1");

    await session.run();

    expect(cache.entries()).toEqual([]);
  });

  test("should stop when the user cancels the prompt", async () => {
    const rclone = new FakeRclone(["r1"], {});
    const picker = new ScriptedPicker([]);
    const { session } = makeSession(rclone, picker);

    await session.run();

    expect(picker.messages).toHaveLength(1);
  });
});

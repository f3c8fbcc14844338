import {
  appendFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { LineRecorder, LogFn } from "./terminal.js";
import { formatHistoryTimestamp, stripAnsi } from "./utils.js";

export interface HistoryWriterOptions {
  warn?: LogFn;
  now?: () => Date;
  scratchDir?: string;
}

/**
 * Markdown run log, newest entry first.
 *
 * An entry is collected in a scratch file while the run is going and
 * prepended to the history file by endEntry(). Failures only disable the
 * writer for the current entry; they never reach the caller.
 */
export class HistoryWriter implements LineRecorder {
  private historyFile: string;
  private warn: LogFn;
  private now: () => Date;
  private scratchDir: string;
  private entryFile: string | null = null;
  private active = false;
  private warned = false;

  constructor(historyFile: string, options: HistoryWriterOptions = {}) {
    this.historyFile = historyFile;
    this.warn = options.warn ?? ((message) => console.error(message));
    this.now = options.now ?? (() => new Date());
    this.scratchDir = options.scratchDir ?? tmpdir();
  }

  get path(): string {
    return this.historyFile;
  }

  get isActive(): boolean {
    return this.active;
  }

  startEntry(remote: string, folder: string, commandDisplay: string): void {
    if (this.active) {
      this.endEntry();
    }

    const header = [
      "",
      "---",
      "",
      `## ${formatHistoryTimestamp(this.now())}`,
      "",
      `- Remote: ${remote}`,
      `- Folder: ${folder}`,
      `- Command: \`${commandDisplay}\``,
      "",
      "```",
      "",
    ].join("\n");

    try {
      mkdirSync(dirname(this.historyFile), { recursive: true });
      const entryDir = mkdtempSync(join(this.scratchDir, "cfs-history-"));
      this.entryFile = join(entryDir, "entry.md");
      writeFileSync(this.entryFile, header);
      this.active = true;
    } catch {
      this.fail();
    }
  }

  writeLine(text: string): void {
    if (!this.active || !this.entryFile) return;

    const line = stripAnsi(text.replace(/\r/g, ""));
    try {
      appendFileSync(this.entryFile, `${line}\n`);
    } catch {
      this.fail();
    }
  }

  endEntry(): void {
    if (this.active && this.entryFile) {
      const tmpOut = `${this.historyFile}.tmp`;
      try {
        appendFileSync(this.entryFile, "```\n\n---\n");
        const entry = readFileSync(this.entryFile, "utf-8");
        const existing = existsSync(this.historyFile) ? readFileSync(this.historyFile, "utf-8") : "";
        writeFileSync(tmpOut, entry + existing);
        renameSync(tmpOut, this.historyFile);
      } catch (err) {
        rmSync(tmpOut, { force: true });
        this.warn(`⚠  WARNING: Unable to update history log ${this.historyFile}: ${String(err)}`);
      }
    }
    this.disable();
  }

  private fail(): void {
    this.disable();
    if (!this.warned) {
      this.warn(`⚠  WARNING: Unable to write history log: ${this.historyFile}`);
      this.warned = true;
    }
  }

  private disable(): void {
    this.active = false;
    if (this.entryFile) {
      const entryDir = dirname(this.entryFile);
      this.entryFile = null;
      try {
        rmSync(entryDir, { recursive: true, force: true });
      } catch (err) {
        this.warn(`⚠  WARNING: Unable to remove ${entryDir}: ${String(err)}`);
      }
    }
  }
}

import { StringDecoder } from "string_decoder";
import { buildSizeArgs, sizeTarget } from "./command.js";
import type { SizerConfig } from "./config.js";
import type { HistoryWriter } from "./history.js";
import { LineSplitter, SizeOutputParser } from "./parser.js";
import type { ProgressEvent } from "./parser.js";
import { resolveRemoteType, spawnMeasureProcess } from "./rclone.js";
import type { BackendResolver, MeasureLauncher, MeasureProcess } from "./rclone.js";
import { COLORS } from "./terminal.js";
import type { LogFn, Terminal } from "./terminal.js";
import { formatBytesCompact, formatCommand, formatIntegerWithCommas } from "./utils.js";

export interface RunResult {
  target: string;
  /** Shell-quoted command line as shown to the user */
  command: string;
  exitCode: number;
  aborted: boolean;
  bytes?: bigint;
  humanSize?: string;
  totalTimeDisplay: string;
  objectsLine?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface SizeRunnerDeps {
  config: SizerConfig;
  resolver: BackendResolver;
  history: HistoryWriter;
  terminal: Terminal;
  launch?: MeasureLauncher;
  log?: LogFn;
  now?: () => number;
}

/**
 * Runs `rclone size` for one folder: prints the command, draws live
 * progress, records the transcript and reports the totals. Caching the
 * result is left to the caller.
 */
export class SizeRunner {
  private config: SizerConfig;
  private resolver: BackendResolver;
  private history: HistoryWriter;
  private terminal: Terminal;
  private launch: MeasureLauncher;
  private log: LogFn;
  private now: () => number;

  constructor(deps: SizeRunnerDeps) {
    this.config = deps.config;
    this.resolver = deps.resolver;
    this.history = deps.history;
    this.terminal = deps.terminal;
    this.launch = deps.launch ?? spawnMeasureProcess;
    this.log = deps.log ?? (() => {});
    this.now = deps.now ?? Date.now;
  }

  async buildCommand(remote: string, folder: string): Promise<string[]> {
    const remoteType = await resolveRemoteType(this.resolver, remote, this.config.maxRemoteHops);
    this.log(`Remote ${remote} resolved to backend type "${remoteType}"`);

    return [
      this.config.rcloneBin,
      ...buildSizeArgs({
        remote,
        folder,
        extraArgs: this.config.extraArgs,
        fastListMode: this.config.fastListMode,
        remoteType,
      }),
    ];
  }

  async runMeasurement(remote: string, folder: string, options: RunOptions = {}): Promise<RunResult> {
    const target = sizeTarget(remote, folder);
    const argv = await this.buildCommand(remote, folder);
    const command = formatCommand(argv);
    const t = this.terminal;

    this.history.startEntry(remote, folder, command);
    t.attach(this.history);

    try {
      t.blank();
      const intro = "Running rclone to get the total size of all files within the selected cloud drive folder";
      t.print(intro, t.paint(intro, COLORS.bold, COLORS.blue));
      t.print(`Sizing: ${target}`, `${t.paint("Sizing:", COLORS.bold, COLORS.accent)} ${target}`);
      t.print(`Command: ${command}`, `${t.paint("Command:", COLORS.bold, COLORS.accent)} ${command}`);
      t.print();

      const startedAt = this.now();
      const parser = new SizeOutputParser();
      const { exitCode, aborted } = await this.consume(argv, parser, options.signal);
      const totalSeconds = Math.floor((this.now() - startedAt) / 1000);
      this.log(`${command} exited with code ${exitCode}`);

      const summary = parser.finalize();
      const totalTimeDisplay = summary.elapsed ?? `${totalSeconds}s`;
      const failed: RunResult = { target, command, exitCode, aborted, totalTimeDisplay };

      t.endStatus();

      if (aborted) {
        t.blank();
        t.warn(`Run aborted for ${target}.`);
        return failed;
      }

      if (exitCode !== 0) {
        t.blank();
        t.error(`rclone size failed for ${target}.`);
        t.blank();
        return failed;
      }

      t.blank();
      const result: RunResult = {
        ...failed,
        bytes: summary.bytes,
        humanSize: summary.humanSize,
        objectsLine: summary.objectsLine,
      };

      if (summary.totalLine) {
        if (summary.bytes !== undefined) {
          const sizeLine = `Total size: ${formatBytesCompact(summary.bytes)} (${formatIntegerWithCommas(summary.bytes)} bytes)`;
          t.print(sizeLine, t.paint(sizeLine, COLORS.bold));
          if (summary.humanSize) {
            t.print(`Total size reported by rclone: ${summary.humanSize}`);
          }
        } else {
          t.print(summary.totalLine, t.paint(summary.totalLine, COLORS.bold));
        }
        if (summary.objectsLine) {
          t.print(summary.objectsLine);
        }
      } else {
        t.warn("Total size not found in output.");
      }
      t.print(`Total time: ${totalTimeDisplay}`);
      t.blank();

      return result;
    } finally {
      t.attach(null);
      this.history.endEntry();
    }
  }

  /**
   * Feed the process output through the parser until the stream closes.
   */
  private async consume(
    argv: string[],
    parser: SizeOutputParser,
    signal?: AbortSignal
  ): Promise<{ exitCode: number; aborted: boolean }> {
    const [bin, ...args] = argv;
    const proc: MeasureProcess = this.launch(bin, args);
    const splitter = new LineSplitter();
    const decoder = new StringDecoder("utf8");
    let aborted = false;

    const onAbort = () => {
      aborted = true;
      proc.kill();
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      for await (const chunk of proc.output) {
        const text = typeof chunk === "string" ? chunk : decoder.write(chunk);
        for (const line of splitter.push(text)) {
          this.handleLine(line, parser);
        }
      }
      for (const line of [...splitter.push(decoder.end()), ...splitter.flush()]) {
        this.handleLine(line, parser);
      }
      return { exitCode: await proc.exited, aborted };
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private handleLine(line: string, parser: SizeOutputParser): void {
    this.history.writeLine(line);
    const event = parser.consume(line);
    if (event) {
      this.drawProgress(event);
    }
  }

  private drawProgress(event: ProgressEvent): void {
    const t = this.terminal;
    const styled =
      `${t.paint(`Listed objects: ${event.listedDisplay}`, COLORS.accent)} | ` +
      `${t.paint("Elapsed time:", COLORS.accent)} ${event.elapsedDisplay}`;
    t.status(event.status, styled);
  }
}

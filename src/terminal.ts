import { appendFileSync } from "fs";

export type LogFn = (message: string) => void;

export interface OutputSink {
  write(text: string): unknown;
}

// Anything that records plain transcript lines (the history writer)
export interface LineRecorder {
  writeLine(text: string): void;
}

export const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  accent: "\x1b[36m",
  blue: "\x1b[34m",
};

export interface TerminalOptions {
  stdout?: OutputSink;
  stderr?: OutputSink;
  color?: boolean;
  statusWidth?: number;
}

/**
 * Interactive output: plain and styled lines on stdout, leveled messages on
 * stderr, and a single status line redrawn in place. Everything except the
 * status line is mirrored into the attached recorder.
 */
export class Terminal {
  private stdout: OutputSink;
  private stderr: OutputSink;
  private color: boolean;
  private statusWidth: number;
  private recorder: LineRecorder | null = null;
  private statusDrawn = false;

  constructor(options: TerminalOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.color = options.color ?? true;
    this.statusWidth = options.statusWidth ?? 96;
  }

  attach(recorder: LineRecorder | null): void {
    this.recorder = recorder;
  }

  paint(text: string, ...codes: string[]): string {
    if (!this.color || codes.length === 0) return text;
    return `${codes.join("")}${text}${COLORS.reset}`;
  }

  /**
   * Print a line on stdout. `styled` replaces the plain text on screen only.
   */
  print(plain: string = "", styled?: string): void {
    this.stdout.write(`${styled ?? plain}\n`);
    this.recorder?.writeLine(plain);
  }

  /** Print on screen without recording. */
  blank(): void {
    this.stdout.write("\n");
  }

  info(message: string): void {
    this.message(`ℹ  ${message}`);
  }

  warn(message: string): void {
    this.message(`⚠  WARNING: ${message}`);
  }

  error(message: string): void {
    this.message(`✗ ERROR: ${message}`);
  }

  ok(message: string): void {
    this.message(`✓ ${message}`);
  }

  /**
   * Redraw the status line in place, padded to a fixed width so shorter
   * text overwrites the previous one completely.
   */
  status(plain: string, styled?: string): void {
    const padding = " ".repeat(Math.max(0, this.statusWidth - plain.length));
    this.stdout.write(`\r${styled ?? plain}${padding}`);
    this.statusDrawn = true;
  }

  /** Leave the status line so later output starts on a fresh line. */
  endStatus(): void {
    if (this.statusDrawn) {
      this.stdout.write("\n");
      this.statusDrawn = false;
    }
  }

  private message(text: string): void {
    this.stderr.write(`${text}\n`);
    this.recorder?.writeLine(text);
  }
}

/**
 * Diagnostic logger: timestamped lines appended to a file, or nothing when
 * no file is configured.
 */
export function createLogger(logFilePath?: string): LogFn {
  if (logFilePath) {
    return (message: string) => {
      const timestamp = new Date().toISOString();
      try {
        appendFileSync(logFilePath, `[${timestamp}] ${message}\n`);
      } catch (err) {
        process.stderr.write(`⚠  WARNING: Unable to write log file ${logFilePath}: ${String(err)}\n`);
      }
    };
  }
  return () => {};
}

import { formatIntegerWithCommas, stripAnsi } from "./utils.js";

export interface ProgressEvent {
  listedCount: bigint;
  listedDisplay: string;
  elapsedDisplay: string;
  /** Colorless status line, e.g. "Listed objects: 2,048 | Elapsed time: 3.0s" */
  status: string;
}

export interface SizeSummary {
  bytes?: bigint;
  humanSize?: string;
  totalLine?: string;
  objectsLine?: string;
  elapsed?: string;
}

const LISTED_PATTERN = /Listed\s+([0-9][0-9,]*)/;
const ELAPSED_LABEL = "Elapsed time:";
const TOTAL_SIZE_PREFIX = "Total size:";
const TOTAL_OBJECTS_PREFIX = "Total objects:";

/**
 * Splits a process output stream into lines. rclone redraws its progress
 * with bare carriage returns, so `\r` ends a line just like `\n`.
 */
export class LineSplitter {
  private pending = "";

  push(chunk: string): string[] {
    const text = (this.pending + chunk).replace(/\r/g, "\n");
    const parts = text.split("\n");
    this.pending = parts.pop() ?? "";
    return parts.filter((line) => line.trim() !== "");
  }

  flush(): string[] {
    const rest = this.pending;
    this.pending = "";
    return rest.trim() !== "" ? [rest] : [];
  }
}

export function extractBytesFromTotalLine(line: string): bigint | undefined {
  const match = line.match(/\(([0-9]+)\s+Bytes?\)/);
  return match ? BigInt(match[1]) : undefined;
}

export function extractHumanFromTotalLine(line: string): string | undefined {
  const match = line.match(/^Total size:\s*([^()]+)/);
  const human = match?.[1].trim();
  return human || undefined;
}

/**
 * Rewrite a "Total objects:" line with separators in the exact count:
 * "Total objects: 45,231 (45231)" -> "Total objects: 45,231 (45,231)".
 */
export function formatTotalObjectsLine(line: string): string {
  const counted = line.match(/\(([0-9]+)\)/);
  if (counted) {
    const count = formatIntegerWithCommas(counted[1]);
    const human = line.match(/^Total objects:\s*([^()]*)\([0-9]+\)/)?.[1].trim();
    return human ? `Total objects: ${human} (${count})` : `Total objects: ${count}`;
  }

  const bare = line.match(/^Total objects:\s*([0-9]+)/);
  if (bare) {
    return `Total objects: ${formatIntegerWithCommas(bare[1])}`;
  }

  return line;
}

/**
 * Line classifier for `rclone size --progress` output.
 *
 * Progress lines update the listed count and elapsed time; the last
 * "Total size:" and "Total objects:" lines seen are kept for finalize().
 */
export class SizeOutputParser {
  private listedCount = 0n;
  private listedDisplay = "0";
  private elapsedDisplay = "0.0s";
  private elapsedSeen: string | undefined;
  private totalLine: string | undefined;
  private objectsLine: string | undefined;
  private lastStatus = "";

  /**
   * Returns a progress event when the rendered status changed, otherwise null.
   */
  consume(rawLine: string): ProgressEvent | null {
    const line = stripAnsi(rawLine);

    const listed = line.match(LISTED_PATTERN);
    if (listed) {
      const digits = listed[1].replace(/,/g, "");
      this.listedCount = BigInt(digits);
      this.listedDisplay = formatIntegerWithCommas(digits);
    }

    const labelAt = line.lastIndexOf(ELAPSED_LABEL);
    if (labelAt !== -1) {
      let value = line.slice(labelAt + ELAPSED_LABEL.length);
      const nextLabel = value.indexOf("Transferred:");
      if (nextLabel !== -1) {
        value = value.slice(0, nextLabel);
      }
      value = value.trim();
      if (value) {
        this.elapsedDisplay = value;
        this.elapsedSeen = value;
      }
    }

    if (line.startsWith(TOTAL_SIZE_PREFIX)) {
      this.totalLine = line;
    }
    if (line.startsWith(TOTAL_OBJECTS_PREFIX)) {
      this.objectsLine = line;
    }

    const status = `Listed objects: ${this.listedDisplay} | Elapsed time: ${this.elapsedDisplay}`;
    if (status === this.lastStatus) {
      return null;
    }
    this.lastStatus = status;

    return {
      listedCount: this.listedCount,
      listedDisplay: this.listedDisplay,
      elapsedDisplay: this.elapsedDisplay,
      status,
    };
  }

  finalize(): SizeSummary {
    const summary: SizeSummary = { elapsed: this.elapsedSeen };

    if (this.totalLine) {
      summary.totalLine = this.totalLine;
      summary.bytes = extractBytesFromTotalLine(this.totalLine);
      summary.humanSize = extractHumanFromTotalLine(this.totalLine);
    }
    if (this.objectsLine) {
      summary.objectsLine = formatTotalObjectsLine(this.objectsLine);
    }

    return summary;
  }
}

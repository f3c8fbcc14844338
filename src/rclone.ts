import { execFile, spawn } from "child_process";
import { PassThrough } from "stream";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface BackendInfo {
  /** Backend type from `type = ...`, "" when unknown */
  type: string;
  /** Remote name referenced by an alias/crypt remote, "" when none */
  target: string;
}

export interface BackendResolver {
  resolveBackendType(name: string): Promise<BackendInfo>;
}

// A running measurement: combined stdout/stderr plus the exit code
export interface MeasureProcess {
  output: NodeJS.ReadableStream;
  exited: Promise<number>;
  kill(): void;
}

export type MeasureLauncher = (command: string, args: string[]) => MeasureProcess;

/**
 * Read `type = ...` and `remote = ...` from `rclone config show <name>` output.
 */
export function parseConfigShow(output: string): BackendInfo {
  let type = "";
  let remoteRef = "";

  for (const line of output.split("\n")) {
    const match = line.match(/^\s*(type|remote)\s*=(.*)$/);
    if (!match) continue;
    const value = match[2].trim();
    if (match[1] === "type" && !type) type = value;
    if (match[1] === "remote" && !remoteRef) remoteRef = value;
  }

  const colonAt = remoteRef.indexOf(":");
  return {
    type,
    target: colonAt === -1 ? remoteRef : remoteRef.slice(0, colonAt),
  };
}

/**
 * Follow alias/crypt remotes down to the concrete backend type.
 * Gives "" when information is missing or the hop limit is reached.
 */
export async function resolveRemoteType(
  resolver: BackendResolver,
  remote: string,
  maxHops: number = 5
): Promise<string> {
  let name = remote;
  let depth = 0;

  while (name && depth < maxHops) {
    const info = await resolver.resolveBackendType(name);
    if (!info.type) {
      return "";
    }
    if ((info.type === "crypt" || info.type === "alias") && info.target) {
      name = info.target;
      depth++;
      continue;
    }
    return info.type;
  }

  return "";
}

export function parseRemoteList(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim().replace(/:$/, ""))
    .filter(Boolean)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function parseDirList(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.replace(/\r$/, "").replace(/\/$/, ""))
    .filter((line) => line !== "");
}

/**
 * Spawn a process and merge its stdout and stderr into one stream.
 * A launch failure ends the stream with the error text and exit code 127.
 */
export function spawnMeasureProcess(command: string, args: string[]): MeasureProcess {
  const output = new PassThrough();
  const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

  child.stdout?.pipe(output, { end: false });
  child.stderr?.pipe(output, { end: false });

  const exited = new Promise<number>((resolve) => {
    let settled = false;
    const finish = (code: number) => {
      if (settled) return;
      settled = true;
      if (!output.writableEnded) {
        output.end();
      }
      resolve(code);
    };

    child.on("error", (err) => {
      if (!output.writableEnded) {
        output.write(`${command}: ${err.message}\n`);
      }
      finish(127);
    });
    child.on("close", (code) => finish(code ?? 1));
  });

  return {
    output,
    exited,
    kill: () => {
      child.kill("SIGTERM");
    },
  };
}

/**
 * Read-only rclone commands used around the measurement itself.
 */
export class RcloneCli implements BackendResolver {
  private bin: string;

  constructor(bin: string = "rclone") {
    this.bin = bin;
  }

  get command(): string {
    return this.bin;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.bin, ["version"], { timeout: 15000 });
      return true;
    } catch {
      return false;
    }
  }

  async requireRclone(): Promise<void> {
    if (!(await this.isAvailable())) {
      throw new Error(`${this.bin} not found in PATH.`);
    }
  }

  async resolveBackendType(name: string): Promise<BackendInfo> {
    try {
      const { stdout } = await execFileAsync(this.bin, ["config", "show", name]);
      return parseConfigShow(stdout);
    } catch {
      return { type: "", target: "" };
    }
  }

  async listRemotes(): Promise<string[]> {
    try {
      const { stdout } = await execFileAsync(this.bin, ["listremotes"]);
      return parseRemoteList(stdout);
    } catch {
      return [];
    }
  }

  async listTopLevelDirs(remote: string): Promise<string[]> {
    try {
      const { stdout } = await execFileAsync(
        this.bin,
        ["lsf", "--dirs-only", "--max-depth", "1", `${remote}:`],
        { maxBuffer: 64 * 1024 * 1024 }
      );
      return parseDirList(stdout);
    } catch {
      return [];
    }
  }
}

import type { FastListMode } from "./config.js";

export const FAST_LIST_FLAG = "--fast-list";
export const ONEDRIVE_DELTA_FLAG = "--onedrive-delta";

// Backend types that get --fast-list in auto mode
const FAST_LIST_AUTO_TYPES = ["drive"];
// Backend type whose delta listing only works together with --fast-list
const DELTA_LISTING_TYPE = "onedrive";

export interface SizeArgsOptions {
  remote: string;
  folder: string;
  extraArgs: string[];
  fastListMode: FastListMode;
  /** Resolved backend type, "" when unknown */
  remoteType: string;
}

export function sizeTarget(remote: string, folder: string): string {
  return `${remote}:${folder}`;
}

export function shouldEnableFastList(mode: FastListMode, remoteType: string): boolean {
  if (mode === "on") return true;
  if (mode === "auto") return FAST_LIST_AUTO_TYPES.includes(remoteType);
  return false;
}

/**
 * Arguments for `rclone size`, without the executable:
 * base invocation, then extra args, then the injected listing flags.
 */
export function buildSizeArgs(options: SizeArgsOptions): string[] {
  const { remote, folder, fastListMode, remoteType } = options;

  let extraArgs = [...options.extraArgs];
  if (fastListMode === "off") {
    extraArgs = extraArgs.filter((arg) => arg !== FAST_LIST_FLAG);
  }

  const args = ["size", sizeTarget(remote, folder), "--progress", "--stats", "1s", ...extraArgs];

  const alreadyPresent = extraArgs.includes(FAST_LIST_FLAG);
  if (shouldEnableFastList(fastListMode, remoteType) && !alreadyPresent) {
    args.push(FAST_LIST_FLAG);
  }

  if (remoteType === DELTA_LISTING_TYPE && args.includes(FAST_LIST_FLAG) && !extraArgs.includes(ONEDRIVE_DELTA_FLAG)) {
    args.push(ONEDRIVE_DELTA_FLAG);
  }

  return args;
}

const ANSI_PATTERN = /\x1B\[[0-9;?]*[A-Za-z]/g;
const SHELL_SAFE_ARG = /^[A-Za-z0-9_@%+=:,./\u0080-\uFFFF-]+$/;
const SHELL_UNSAFE_CHAR = /[^A-Za-z0-9_@%+=:,./\u0080-\uFFFF-]/g;

/**
 * Format a byte count with decimal units and two decimals, e.g. "1.29 TB".
 */
export function formatBytesCompact(bytes: bigint | number): string {
  const units = ["B", "KB", "MB", "GB", "TB", "PB"];
  let size = Number(bytes);
  let i = 0;
  while (size >= 1000 && i < units.length - 1) {
    size /= 1000;
    i++;
  }
  return `${size.toFixed(2)} ${units[i]}`;
}

/**
 * Insert thousands separators into the digits of a value.
 * Non-digit characters are dropped first, so "45,231" and "45231" both give "45,231".
 */
export function formatIntegerWithCommas(value: string | bigint | number): string {
  const digits = String(value).replace(/[^0-9]/g, "");
  if (!digits) return "";
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

export function isByteCount(value: string): boolean {
  return /^[0-9]+$/.test(value);
}

/**
 * Quote one argument the way bash's `printf %q` would, so the printed
 * command can be pasted back into a shell.
 */
export function quoteShellArg(arg: string): string {
  if (arg === "") return "''";
  if (SHELL_SAFE_ARG.test(arg)) return arg;
  if (/[\x00-\x1F\x7F]/.test(arg)) {
    const escaped = arg.replace(/[\\']/g, "\\$&").replace(/[\x00-\x1F\x7F]/g, (ch) => {
      switch (ch) {
        case "\n": return "\\n";
        case "\r": return "\\r";
        case "\t": return "\\t";
        default: return `\\x${ch.charCodeAt(0).toString(16).padStart(2, "0")}`;
      }
    });
    return `$'${escaped}'`;
  }
  return arg.replace(SHELL_UNSAFE_CHAR, "\\$&");
}

export function formatCommand(argv: string[]): string {
  return argv.map(quoteShellArg).join(" ");
}

export function splitArgs(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter(Boolean);
}

/**
 * Format a date like "2026-10-19 3:05 PM" (local time).
 */
export function formatHistoryTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const meridiem = hours < 12 ? "AM" : "PM";
  return `${year}-${month}-${day} ${hour12}:${minutes} ${meridiem}`;
}

export function pluralize(count: number, singular: string, plural: string): string {
  return count === 1 ? singular : plural;
}

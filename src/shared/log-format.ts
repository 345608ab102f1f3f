import type { LogLevel, LogMeta } from "../core/ports/logger.js";

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const dim = (s: string) => `${esc("2")}${s}${reset}`;

const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const timestamp = (): string => {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const formatMeta = (meta: LogMeta): string => {
  const entries = Object.entries(meta);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(String(v))}`);
  return ` ${parts.join(" ")}`;
};

// ── Public formatters ───────────────────────────────────────────────────

/**
 * Format a structured log entry (used by the Logger port).
 *
 *   WRN 12:34:56.789 Attempt failed, retrying  attempt=2 delayMs=1000 error=timeout
 */
export const formatLogEntry = (level: LogLevel, msg: string, meta: LogMeta): string => {
  const ts = dim(gray(timestamp()));
  const badge = levelBadge(level);
  const metaStr = formatMeta(meta);
  return `  ${badge} ${ts} ${white(msg)}${metaStr}\n`;
};

/**
 * Format a structured log entry as one JSON line (for log aggregators).
 */
export const formatJsonEntry = (level: LogLevel, msg: string, meta: LogMeta): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};

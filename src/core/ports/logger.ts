/**
 * Port: Logger — structured, level-based logging contract.
 * The retry controller never writes logs on its own; failure logging is
 * opt-in through an observer built on this port.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  fatal(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

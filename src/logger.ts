/**
 * Unified logging abstraction for devkit.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All devkit output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 * Progress markers go to stderr so stdout carries only command output
 * (e.g. the tag printed by `devkit image --print-tag`).
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Parse a level name (case-insensitive). Returns null for unknown names.
 */
export function parseLogLevel(name: string | undefined): LogLevel | null {
  if (!name) {return null;}
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? null;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes (and explicitly printed command output) communicate results.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 *   log.progress("Building image: x...") ... log.progressEnd(true)
 */
export const log = {
  /** Debug-level message, dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(message));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /** Yellow, on stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Red, on stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(message));
    }
  },

  /**
   * Raw output without any styling, ignoring quiet mode and level.
   * Reserved for command results that callers parse.
   */
  result(message: string): void {
    process.stdout.write(`${message}\n`);
  },

  /**
   * Start a progress line on stderr (no newline). Finish it with progressEnd.
   */
  progress(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      process.stderr.write(message);
    }
  },

  progressEnd(ok: boolean): void {
    if (canOutput(LogLevel.INFO)) {
      process.stderr.write(ok ? `${pc.green(" [OK]")}\n` : `${pc.red(" [FAILED]")}\n`);
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 * These return styled strings without printing.
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
};

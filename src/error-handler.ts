/**
 * Error reporting for the devkit CLI.
 *
 * Maps errors to process exit codes and prints them, with hints for the
 * exit codes external commands commonly fail with.
 */

import { DevkitError, DockerError, SysrootError, ValidationError, type CommandDiagnostics } from "./errors.js";
import { log } from "./logger.js";

/** Known external command exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  [-1]: {
    code: -1,
    name: "NOT_STARTED",
    description: "Command could not be started",
    suggestion: "Check that the executable is installed and in PATH",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "General error or command failure",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable",
    suggestion: "Check file permissions (chmod +x)",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Verify the command exists in PATH",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
  },
  137: {
    code: 137,
    name: "KILLED",
    description: "Command was killed (OOM or manual stop)",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Command terminated by signal",
  },
};

/** Process exit code for usage errors. */
export const EXIT_USAGE = 2;
/** Process exit code for every other failure. */
export const EXIT_FAILURE = 1;

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Exit code ${code}`,
    }
  );
}

/**
 * Exit code the CLI should terminate with for this error.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ValidationError ? EXIT_USAGE : EXIT_FAILURE;
}

function diagnosticsOf(error: unknown): CommandDiagnostics | undefined {
  if (error instanceof SysrootError || error instanceof DockerError) {
    return error.diagnostics;
  }
  return undefined;
}

/**
 * Log an error with context.
 *
 * @param operation - What was being done, phrased to follow "Failed to".
 */
export function logError(error: unknown, operation: string): void {
  const message = error instanceof Error ? error.message : String(error);
  const kind = error instanceof DevkitError ? `${error.name}: ` : "";

  log.error(`Failed to ${operation}: ${kind}${message}`);

  const diagnostics = diagnosticsOf(error);
  if (diagnostics) {
    const info = getExitCodeInfo(diagnostics.exitCode);
    if (info.suggestion) {
      log.dim(`${info.description}. ${info.suggestion}`);
    }
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}

/**
 * Report an error from a CLI action and return the exit code to use.
 */
export function handleCliError(error: unknown, operation: string): number {
  logError(error, operation);
  return exitCodeFor(error);
}

/**
 * Process runner for devkit.
 *
 * Every external command (tag resolution, docker, image inspection) flows
 * through runCommand so all stages share one contract:
 *   (command, cwd) -> (exitCode, stdout, stderr)
 * Callers that need a different transport (tests) pass their own CommandRunner.
 */

import { execa, ExecaError } from "execa";

import { ValidationError, formatCommand, type CommandDiagnostics } from "./errors.js";

export { formatCommand };

/** Outcome of one command. exitCode is -1 when the process never ran to an exit. */
export type CommandResult = CommandDiagnostics;

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Signature shared by the real runner and test fakes. */
export type CommandRunner = (command: readonly string[], options?: RunOptions) => Promise<CommandResult>;

/**
 * Execute a command and capture both streams. Never rejects on a non-zero
 * exit; a command that cannot be spawned resolves with exitCode -1 and the
 * spawn error on stderr.
 *
 * There is no timeout: a hung command blocks its caller.
 */
export const runCommand: CommandRunner = async (command, options = {}) => {
  const [file, ...args] = command;
  if (!file) {
    throw new ValidationError("Cannot run an empty command");
  }

  const result = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    reject: false,
    stdin: "ignore",
    stripFinalNewline: false,
  });

  const stdout = String(result.stdout ?? "");
  const stderr = String(result.stderr ?? "");

  if (result.exitCode === undefined) {
    const failure: unknown = result;
    const reason = failure instanceof ExecaError
      ? failure.originalMessage || failure.shortMessage
      : `${file} did not exit normally`;
    return {
      command: [...command],
      exitCode: -1,
      stdout,
      stderr: stderr ? `${stderr}\n${reason}` : reason,
    };
  }

  return { command: [...command], exitCode: result.exitCode, stdout, stderr };
};

/**
 * True when the result means the executable itself was missing.
 * Covers both spawn failures and shells reporting 127.
 */
export function isCommandNotFound(result: CommandResult): boolean {
  return result.exitCode === 127 || (result.exitCode === -1 && /ENOENT/.test(result.stderr));
}

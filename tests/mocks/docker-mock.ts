/**
 * Scripted command runner for unit tests.
 *
 * Stands in for runCommand so image and sysroot logic can be exercised
 * without docker or a build-description command on PATH.
 */

import type { CommandResult, CommandRunner, RunOptions } from "../../src/exec.js";

export interface RecordedCall {
  command: string[];
  options?: RunOptions;
}

/** What a matched command resolves with. Missing fields default to success. */
export type ScriptedOutcome = Partial<Omit<CommandResult, "command">>;

export type Responder = (command: string[]) => ScriptedOutcome | Promise<ScriptedOutcome>;

interface Rule {
  prefix: string[];
  respond: Responder;
}

function startsWith(command: readonly string[], prefix: readonly string[]): boolean {
  return prefix.every((part, i) => command[i] === part);
}

/** Record of all runner calls, answering each from the first matching rule. */
export class DockerMockRecorder {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];

  /**
   * Answer commands starting with prefix. Later rules win over earlier ones.
   */
  on(prefix: string[], outcome: ScriptedOutcome | Responder): this {
    const respond: Responder = typeof outcome === "function" ? outcome : () => outcome;
    this.rules.unshift({ prefix, respond });
    return this;
  }

  readonly run: CommandRunner = async (command, options) => {
    const recorded = [...command];
    this.calls.push(options ? { command: recorded, options } : { command: recorded });

    const rule = this.rules.find((r) => startsWith(recorded, r.prefix));
    const outcome = rule ? await rule.respond(recorded) : {};
    return {
      command: recorded,
      exitCode: outcome.exitCode ?? 0,
      stdout: outcome.stdout ?? "",
      stderr: outcome.stderr ?? "",
    };
  };

  /** Commands run so far, joined with spaces. */
  commandLines(): string[] {
    return this.calls.map((call) => call.command.join(" "));
  }

  reset(): void {
    this.calls.length = 0;
  }
}

/**
 * Pull `dest` out of a `--output=type=local,dest=<dir>` argument.
 */
export function outputDest(command: readonly string[]): string {
  const output = command.find((arg) => arg.startsWith("--output="));
  const match = output?.match(/dest=(.+)$/);
  if (!match?.[1]) {
    throw new Error(`No --output dest in: ${command.join(" ")}`);
  }
  return match[1];
}

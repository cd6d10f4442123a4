/**
 * Unified exception hierarchy for devkit.
 *
 * All custom exceptions inherit from DevkitError for consistent error handling.
 * CLI catches these and converts to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other devkit modules.
 *   It should NOT import from any other devkit modules.
 */

/** Captured outcome of one external command, attached to command-backed errors. */
export interface CommandDiagnostics {
  command: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
}

const SHELL_UNSAFE = /[\s'"\\$`;&|<>(){}*?!#~]/;

/**
 * Render a command line so it can be pasted into a shell.
 * Arguments with shell metacharacters are single-quoted.
 */
export function formatCommand(command: readonly string[]): string {
  return command
    .map((arg) => {
      if (arg === "") {return "''";}
      if (!SHELL_UNSAFE.test(arg)) {return arg;}
      return `'${arg.replace(/'/g, `'\\''`)}'`;
    })
    .join(" ");
}

function withTrailingNewline(text: string): string {
  return text === "" || text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Format a command failure with everything needed to reproduce it by hand.
 */
export function formatDiagnostics(summary: string, diagnostics: CommandDiagnostics): string {
  return (
    `${summary}\n` +
    `Command: ${formatCommand(diagnostics.command)}\n` +
    `Exit code: ${diagnostics.exitCode}\n` +
    `STDOUT:\n${withTrailingNewline(diagnostics.stdout)}` +
    `STDERR:\n${withTrailingNewline(diagnostics.stderr)}`
  ).trimEnd();
}

/**
 * Base exception for all devkit errors.
 *
 * All devkit-specific exceptions should inherit from this class.
 * This enables consistent error handling at the CLI layer.
 */
export class DevkitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DevkitError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - devkit.json or deps.json is not valid JSON
 *   - A Dockerfile named by the image manifest is missing
 *   - A required image recipe is absent from the images directory
 */
export class ConfigError extends DevkitError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Missing or non-hex sha256
 *   - --print-tag without a target image
 *   - Unknown target image name
 */
export class ValidationError extends DevkitError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Image dependency graph errors (cycles, unresolved dependency tags). */
export class DependencyError extends DevkitError {
  constructor(message: string) {
    super(message);
    this.name = "DependencyError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends DevkitError {
  readonly diagnostics?: CommandDiagnostics;

  constructor(message: string, diagnostics?: CommandDiagnostics) {
    super(diagnostics ? formatDiagnostics(message, diagnostics) : message);
    this.name = "DockerError";
    this.diagnostics = diagnostics;
  }
}

/** Raised when Docker is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Docker not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when a container image build (or the pull replacing it) fails. */
export class ImageBuildError extends DockerError {
  constructor(message: string, diagnostics?: CommandDiagnostics) {
    super(message, diagnostics);
    this.name = "ImageBuildError";
  }
}

/** Stage of sysroot acquisition an error came from. */
export type SysrootStage = "tag" | "build" | "artifact" | "checksum" | "extract";

/**
 * Sysroot acquisition errors.
 *
 * Every one is terminal for the current evaluation; none is retried.
 */
export class SysrootError extends DevkitError {
  readonly stage: SysrootStage;
  readonly diagnostics?: CommandDiagnostics;

  constructor(stage: SysrootStage, message: string, diagnostics?: CommandDiagnostics) {
    super(diagnostics ? formatDiagnostics(message, diagnostics) : message);
    this.name = "SysrootError";
    this.stage = stage;
    this.diagnostics = diagnostics;
  }
}

/** The tag command failed or produced no tag. */
export class TagResolutionError extends SysrootError {
  constructor(message: string, diagnostics?: CommandDiagnostics) {
    super("tag", message, diagnostics);
    this.name = "TagResolutionError";
  }
}

/** The tag command succeeded but its last non-empty line was empty. */
export class EmptyTagError extends TagResolutionError {
  constructor(message: string, diagnostics?: CommandDiagnostics) {
    super(message, diagnostics);
    this.name = "EmptyTagError";
  }
}

/** The archive build succeeded but left no archive behind. */
export class MissingArtifactError extends SysrootError {
  readonly artifactPath: string;

  constructor(artifactPath: string) {
    super("artifact", `Dockerfile build did not produce the expected archive at ${artifactPath}`);
    this.name = "MissingArtifactError";
    this.artifactPath = artifactPath;
  }
}

/** The archive could not be read for hashing. */
export class ChecksumComputationError extends SysrootError {
  constructor(message: string) {
    super("checksum", message);
    this.name = "ChecksumComputationError";
  }
}

/** The archive digest differs from the pinned one. */
export class ChecksumMismatchError extends SysrootError {
  readonly expected: string;
  readonly actual: string;

  constructor(archiveName: string, expected: string, actual: string) {
    super(
      "checksum",
      `SHA256 mismatch for generated archive ${archiveName}. Expected: '${expected}', Got: '${actual}'. ` +
        "Please update the pinned sha256 (--sha256 or sysroot.sha256 in devkit.json)."
    );
    this.name = "ChecksumMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** The archive is corrupt or holds entries that cannot be placed safely. */
export class ExtractionError extends SysrootError {
  constructor(message: string) {
    super("extract", message);
    this.name = "ExtractionError";
  }
}

/**
 * Extract a short, printable description from an unknown error.
 *
 * @param error - Unknown error to extract details from.
 * @param maxLength - Maximum length of returned string (default: 1000).
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

import assert from "node:assert/strict";
import test from "node:test";

import {
  EXIT_FAILURE,
  EXIT_USAGE,
  exitCodeFor,
  getExitCodeInfo,
  handleCliError,
  logError,
} from "../src/error-handler.js";
import {
  ChecksumMismatchError,
  ConfigError,
  DevkitError,
  EmptyTagError,
  MissingArtifactError,
  SysrootError,
  TagResolutionError,
  ValidationError,
  formatDiagnostics,
} from "../src/errors.js";
import { LogLevel, getLogLevel, setLogLevel } from "../src/logger.js";

setLogLevel(LogLevel.SILENT);

test("command errors carry the full diagnostics in their message", () => {
  const error = new TagResolutionError("Failed to get base image tag", {
    command: ["devkit", "image", "sysroot-archive-generator"],
    exitCode: 1,
    stdout: "",
    stderr: "boom",
  });

  assert.equal(
    error.message,
    "Failed to get base image tag\n" +
      "Command: devkit image sysroot-archive-generator\n" +
      "Exit code: 1\n" +
      "STDOUT:\n" +
      "STDERR:\n" +
      "boom"
  );
  assert.equal(error.stage, "tag");
  assert.equal(error.diagnostics?.exitCode, 1);
});

test("formatDiagnostics keeps stdout lines apart from the STDERR header", () => {
  const text = formatDiagnostics("Dockerfile build failed", {
    command: ["docker", "buildx", "build"],
    exitCode: 17,
    stdout: "step 1",
    stderr: "failed to solve\n",
  });

  assert.equal(
    text,
    "Dockerfile build failed\nCommand: docker buildx build\nExit code: 17\nSTDOUT:\nstep 1\nSTDERR:\nfailed to solve"
  );
});

test("sysroot errors form one hierarchy", () => {
  const empty = new EmptyTagError("Base image tag command returned an empty tag");
  assert.ok(empty instanceof TagResolutionError);
  assert.ok(empty instanceof SysrootError);
  assert.ok(empty instanceof DevkitError);
  assert.equal(empty.name, "EmptyTagError");

  const missing = new MissingArtifactError("/out/sysroot.tar.gz");
  assert.equal(missing.stage, "artifact");
  assert.equal(missing.message, "Dockerfile build did not produce the expected archive at /out/sysroot.tar.gz");
});

test("ChecksumMismatchError names both digests", () => {
  const error = new ChecksumMismatchError("sysroot.tar.gz", "deadbeef", "abc123");
  assert.equal(
    error.message,
    "SHA256 mismatch for generated archive sysroot.tar.gz. Expected: 'deadbeef', Got: 'abc123'. " +
      "Please update the pinned sha256 (--sha256 or sysroot.sha256 in devkit.json)."
  );
  assert.equal(error.stage, "checksum");
});

test("usage errors exit with 2, everything else with 1", () => {
  assert.equal(exitCodeFor(new ValidationError("bad flag")), EXIT_USAGE);
  assert.equal(exitCodeFor(new ConfigError("bad file")), EXIT_FAILURE);
  assert.equal(exitCodeFor(new Error("plain")), EXIT_FAILURE);
  assert.equal(exitCodeFor("thrown string"), EXIT_FAILURE);
  assert.equal(handleCliError(new ValidationError("bad flag"), "acquire sysroot"), 2);
});

test("getExitCodeInfo describes known and unknown codes", () => {
  assert.equal(getExitCodeInfo(127).name, "NOT_FOUND");
  assert.deepEqual(getExitCodeInfo(42), { code: 42, name: "UNKNOWN", description: "Exit code 42" });
});

test("logError prints the operation and error kind on one line", (t) => {
  const previous = getLogLevel();
  setLogLevel(LogLevel.ERROR);
  t.after(() => setLogLevel(previous));
  const errors = t.mock.method(console, "error", () => {});
  const lines = t.mock.method(console, "log", () => {});

  logError(new ConfigError("bad file"), "acquire sysroot");

  assert.equal(errors.mock.callCount(), 1);
  assert.match(String(errors.mock.calls[0]?.arguments[0]), /Failed to acquire sysroot: ConfigError: bad file/);
  assert.equal(lines.mock.callCount(), 0);
});

/**
 * Build descriptor, input fingerprint and marker file for an extracted sysroot.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { readdir, writeFile } from "node:fs/promises";
import { join, posix } from "node:path";

import { BUILD_FILE_NAME, SYSROOT_MARKER_FILE } from "../constants.js";
import { log } from "../logger.js";

/** Files the descriptor itself adds to the output; never part of the filegroup. */
export const GENERATED_FILES: readonly string[] = [BUILD_FILE_NAME, SYSROOT_MARKER_FILE];

const TARGET_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.+=,@~-]*$/;

export function isValidTargetName(name: string): boolean {
  return TARGET_NAME_PATTERN.test(name);
}

/**
 * BUILD.bazel content exposing every extracted file under one public target.
 */
export function renderBuildFile(targetName: string): string {
  const exclude = GENERATED_FILES.map((file) => `"${file}"`).join(", ");
  return [
    "filegroup(",
    `    name = "${targetName}",`,
    `    srcs = glob(["**"], exclude = [${exclude}]),`,
    `    visibility = ["//visibility:public"],`,
    ")",
    "",
  ].join("\n");
}

/** One labelled input to the fingerprint. */
export interface FingerprintInput {
  label: string;
  /** File to read; it must exist. */
  path?: string;
  /** Literal value, used when no path is given. */
  value?: string;
}

/**
 * SHA-256 over every input, in the given order.
 * Any change to a recipe, the config or the pinned digest changes the result.
 */
export function computeFingerprint(inputs: readonly FingerprintInput[]): string {
  const hash = createHash("sha256");
  for (const input of inputs) {
    hash.update(`${input.label}\n`);
    if (input.path !== undefined) {
      hash.update(readFileSync(input.path));
    } else {
      hash.update(input.value ?? "");
    }
    hash.update("\n");
  }
  return hash.digest("hex");
}

/** Contents of the marker file left in a finished output directory. */
export interface SysrootMarker {
  fingerprint: string;
  sha256: string;
  tag: string;
}

export async function writeMarker(dir: string, marker: SysrootMarker): Promise<void> {
  await writeFile(join(dir, SYSROOT_MARKER_FILE), `${JSON.stringify(marker, null, 2)}\n`, "utf-8");
}

/**
 * Read the marker of a previous run. Missing or unreadable markers yield null.
 */
export function readMarker(dir: string): SysrootMarker | null {
  const path = join(dir, SYSROOT_MARKER_FILE);
  if (!existsSync(path)) {return null;}

  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (
      typeof parsed === "object" && parsed !== null &&
      "fingerprint" in parsed && typeof parsed.fingerprint === "string" &&
      "sha256" in parsed && typeof parsed.sha256 === "string" &&
      "tag" in parsed && typeof parsed.tag === "string"
    ) {
      return { fingerprint: parsed.fingerprint, sha256: parsed.sha256, tag: parsed.tag };
    }
  } catch (e: unknown) {
    log.debug(`Ignoring unreadable marker ${path}: ${String(e)}`);
  }
  return null;
}

/**
 * Every path below root (files, directories, links), as sorted POSIX paths,
 * leaving out the generated descriptor files at the top level.
 */
export async function listTree(root: string): Promise<string[]> {
  const entries = await readdir(root, { recursive: true, withFileTypes: false });
  return entries
    .map((entry) => entry.split(/[\\/]/).join(posix.sep))
    .filter((entry) => !GENERATED_FILES.includes(entry))
    .sort();
}

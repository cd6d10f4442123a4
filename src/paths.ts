/**
 * Path helpers for devkit.
 *
 * Locates the installed package (for the bundled images) and prepares
 * the environment handed to the container engine.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { platform } from "node:process";
import { fileURLToPath } from "node:url";

import { DEVKIT_ENV } from "./constants.js";

let packageRoot: string | null = null;

/**
 * Find the package root by walking up from this module to the first package.json.
 * Works both from sources (src/) and from the compiled tree (dist/src/).
 */
export function getPackageRoot(): string {
  if (packageRoot) {return packageRoot;}

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, "package.json"))) {
      packageRoot = dir;
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`package.json not found above ${fileURLToPath(import.meta.url)}`);
    }
    dir = parent;
  }
}

/** Version from the package's own package.json (SSOT). */
export function getPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(getPackageRoot(), "package.json"), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Directory holding the bundled image recipes and deps.json.
 * DEVKIT_IMAGES_DIR overrides the bundled copy.
 */
export function getImagesDir(): string {
  const override = process.env[DEVKIT_ENV.IMAGES_DIR];
  if (override) {
    return resolve(override);
  }
  return join(getPackageRoot(), "images");
}

/**
 * Get environment for Docker commands.
 *
 * Enables BuildKit and, on Windows, disables MSYS path conversion so
 * --file and --output paths reach docker untouched.
 */
export function getDockerEnv(): NodeJS.ProcessEnv {
  const envCopy: NodeJS.ProcessEnv = { ...process.env, DOCKER_BUILDKIT: "1" };

  if (platform === "win32") {
    envCopy.MSYS_NO_PATHCONV = "1";
    envCopy.MSYS2_ARG_CONV_EXCL = "*";
  }

  return envCopy;
}

/**
 * Content-derived image tags.
 *
 * A tag is a pure function of the Dockerfile bytes and the tags of the images
 * it builds on, so any change to a recipe or one of its ancestors yields a new tag.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";

import { DEFAULT_ARCH, IMAGE_NAMESPACE } from "../constants.js";

/**
 * SHA-256 over the Dockerfile content followed by each "NAME=tag" build arg.
 *
 * @param sortedBuildArgs - Build args as NAME=VALUE strings, already sorted.
 */
export function calculateImageHash(dockerfilePath: string, sortedBuildArgs: readonly string[]): string {
  const hash = createHash("sha256");
  hash.update(readFileSync(dockerfilePath));
  for (const arg of sortedBuildArgs) {
    hash.update(arg, "utf8");
  }
  return hash.digest("hex");
}

export interface TagOptions {
  /** Registry prefix (host/project/repository), empty for local-only names. */
  registry?: string;
  arch?: string;
}

/**
 * Full tag: [registry/]devkit/<image>:<arch>-<sha>.
 */
export function getImageTag(imageName: string, sha: string, options: TagOptions = {}): string {
  const imagePath = `${IMAGE_NAMESPACE}/${imageName}`;
  const suffix = `${options.arch ?? DEFAULT_ARCH}-${sha}`;
  return options.registry ? `${options.registry}/${imagePath}:${suffix}` : `${imagePath}:${suffix}`;
}

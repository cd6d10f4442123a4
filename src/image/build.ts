/**
 * Build-description command: tag, and make available, images from deps.json.
 *
 * `devkit image <target> --print-tag` is what the sysroot rule runs to learn
 * the generator image tag; the tag is always the last line on stdout.
 */

import { existsSync, realpathSync } from "node:fs";
import { dirname, join } from "node:path";

import { loadDevkitConfig, getRegistryPrefix } from "../config.js";
import { DEFAULT_ARCH, DOCKERFILE_SUFFIX } from "../constants.js";
import { ConfigError, DependencyError, ValidationError } from "../errors.js";
import { runCommand, type CommandRunner } from "../exec.js";
import { log } from "../logger.js";
import { validateImageName } from "../validation.js";

import { manageImage, type BuildArg, type ImageSource } from "./docker.js";
import { getBuildOrder, getDependencySubgraph, loadImageConfigs, type ImageConfig } from "./manifest.js";
import { calculateImageHash, getImageTag } from "./tag.js";

/** Settings shared by every image processed in one run. */
export interface ImageBuildContext {
  searchPaths: readonly string[];
  registry: string;
  arch: string;
  /** Force local-only mode for every image. */
  localOnly: boolean;
  runner: CommandRunner;
}

export interface ProcessedImage {
  name: string;
  tag: string;
  source: ImageSource;
}

/**
 * Find `<image>.Dockerfile` in the first search path that has it.
 */
export function findDockerfile(imageName: string, searchPaths: readonly string[]): string | null {
  for (const searchPath of searchPaths) {
    const candidate = join(searchPath, `${imageName}${DOCKERFILE_SUFFIX}`);
    if (existsSync(candidate)) {
      return realpathSync(candidate);
    }
  }
  return null;
}

/**
 * Tag one image and make sure it exists.
 *
 * @param generatedTags - Tags of images processed so far; receives this image's tag.
 * @throws ConfigError if the Dockerfile is missing.
 * @throws DependencyError if a dependency has not been tagged yet.
 */
export async function processImage(
  imageName: string,
  config: ImageConfig,
  generatedTags: Map<string, string>,
  context: ImageBuildContext
): Promise<ProcessedImage> {
  validateImageName(imageName);
  log.bold(`=== Processing: ${imageName} ===`);

  const dockerfilePath = findDockerfile(imageName, context.searchPaths);
  if (!dockerfilePath) {
    throw new ConfigError(
      `Dockerfile ${imageName}${DOCKERFILE_SUFFIX} not found for image '${imageName}' ` +
        `in any of the search paths: ${context.searchPaths.join(", ")}`
    );
  }

  const buildArgs: BuildArg[] = [];
  for (const [argName, depImage] of Object.entries(config.deps)) {
    const depTag = generatedTags.get(depImage);
    if (depTag === undefined) {
      throw new DependencyError(
        `Dependency tag for '${depImage}' (needed by '${imageName}' as build arg '${argName}') not found`
      );
    }
    buildArgs.push({ name: argName, value: depTag });
    log.debug(`Build arg for ${imageName}: ${argName}=${depImage} (Tag: ${depTag})`);
  }

  const hashArgs = buildArgs.map(({ name, value }) => `${name}=${value}`).sort();
  const sha = calculateImageHash(dockerfilePath, hashArgs);
  log.debug(`SHA for ${dockerfilePath} (Content + Sorted Build Args [${hashArgs.join(", ")}]): ${sha}`);

  const tag = getImageTag(imageName, sha, { registry: context.registry, arch: context.arch });
  log.dim(`Tag for ${imageName}: ${tag}`);
  generatedTags.set(imageName, tag);

  const source = await manageImage(
    {
      tag,
      dockerfilePath,
      buildArgs,
      contextPath: dirname(dockerfilePath),
      localOnly: context.localOnly || config.local === true,
    },
    context.runner
  );

  return { name: imageName, tag, source };
}

export interface ImageCommandOptions {
  /** Build only this image and its dependencies. */
  target?: string;
  /** Print the target's tag as the final stdout line. */
  printTag?: boolean;
  configPath: string;
  searchPaths: readonly string[];
  local?: boolean;
  arch?: string;
  runner?: CommandRunner;
}

export interface ImageCommandResult {
  images: ProcessedImage[];
  /** Tag of the target image, when one was given. */
  targetTag?: string;
}

/**
 * Process the target image and its dependencies, or every image.
 *
 * @throws ValidationError for --print-tag without a target, or an unknown target.
 */
export async function runImageCommand(options: ImageCommandOptions): Promise<ImageCommandResult> {
  if (options.searchPaths.length === 0) {
    throw new ValidationError("At least one --search-path is required");
  }

  const registry = getRegistryPrefix(loadDevkitConfig(options.configPath));
  const configs = loadImageConfigs(options.searchPaths);
  const known = Object.keys(configs);
  const { target } = options;

  if (options.printTag && !target) {
    throw new ValidationError("--print-tag requires a target image to be specified");
  }
  if (target !== undefined && !(target in configs)) {
    throw new ValidationError(
      `Target image '${target}' is not a valid image name. Choose from: ${known.sort().join(", ")}`
    );
  }

  const order = target !== undefined ? getDependencySubgraph(target, configs) : getBuildOrder(configs);
  log.info(
    target !== undefined
      ? `Processing image '${target}' and its dependencies: ${order.join(", ")}`
      : "Processing all images..."
  );

  const context: ImageBuildContext = {
    searchPaths: options.searchPaths,
    registry,
    arch: options.arch ?? DEFAULT_ARCH,
    localOnly: options.local ?? false,
    runner: options.runner ?? runCommand,
  };

  const generatedTags = new Map<string, string>();
  const images: ProcessedImage[] = [];
  for (const name of order) {
    const config = configs[name];
    if (!config) {continue;}
    images.push(await processImage(name, config, generatedTags, context));
  }

  const targetTag = target !== undefined ? generatedTags.get(target) : undefined;
  if (options.printTag) {
    if (targetTag === undefined) {
      throw new DependencyError(`Target image '${target ?? ""}' for --print-tag was not processed`);
    }
    log.result(targetTag);
  } else {
    log.success(
      target !== undefined
        ? `Image '${target}' and its dependencies processed successfully.`
        : "All images processed successfully."
    );
  }

  return targetTag !== undefined ? { images, targetTag } : { images };
}

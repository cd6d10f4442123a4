/**
 * Docker command wrappers for the ensure-image flow.
 *
 * All docker invocations go through dockerRun so a missing docker binary
 * surfaces the same way everywhere.
 */

import { formatCommand, runCommand, isCommandNotFound, type CommandResult, type CommandRunner } from "../exec.js";
import { DockerNotFoundError, ImageBuildError } from "../errors.js";
import { log } from "../logger.js";
import { getDockerEnv } from "../paths.js";

/** A --build-arg NAME=VALUE pair. */
export interface BuildArg {
  name: string;
  value: string;
}

/**
 * Run a docker command with the devkit docker environment.
 *
 * @throws DockerNotFoundError if the docker executable is missing.
 */
export async function dockerRun(args: readonly string[], runner: CommandRunner = runCommand): Promise<CommandResult> {
  const result = await runner(["docker", ...args], { env: getDockerEnv() });
  if (isCommandNotFound(result)) {
    throw new DockerNotFoundError(`Docker not found in PATH. Command: ${formatCommand(result.command)}`);
  }
  return result;
}

export async function imageExistsLocally(tag: string, runner?: CommandRunner): Promise<boolean> {
  const result = await dockerRun(["image", "inspect", tag], runner);
  return result.exitCode === 0;
}

export async function imageExistsInRegistry(tag: string, runner?: CommandRunner): Promise<boolean> {
  const result = await dockerRun(["manifest", "inspect", tag], runner);
  return result.exitCode === 0;
}

/**
 * @throws ImageBuildError if the pull fails.
 */
export async function pullImage(tag: string, runner?: CommandRunner): Promise<void> {
  log.progress(`Pulling image: ${tag}...`);
  const result = await dockerRun(["pull", tag], runner);
  log.progressEnd(result.exitCode === 0);
  if (result.exitCode !== 0) {
    throw new ImageBuildError(`Failed to pull image ${tag}`, result);
  }
}

/**
 * Command line for a tagged image build.
 */
export function buildImageArgs(
  tag: string,
  dockerfilePath: string,
  buildArgs: readonly BuildArg[],
  contextPath: string
): string[] {
  const args = ["buildx", "build", "--tag", tag, "--file", dockerfilePath];
  for (const { name, value } of buildArgs) {
    args.push("--build-arg", `${name}=${value}`);
  }
  args.push(contextPath);
  return args;
}

/**
 * @throws ImageBuildError if the build fails.
 */
export async function buildTaggedImage(
  tag: string,
  dockerfilePath: string,
  buildArgs: readonly BuildArg[],
  contextPath: string,
  runner?: CommandRunner
): Promise<void> {
  log.progress(`Building image: ${tag}...`);
  const result = await dockerRun(buildImageArgs(tag, dockerfilePath, buildArgs, contextPath), runner);
  log.progressEnd(result.exitCode === 0);
  if (result.exitCode !== 0) {
    throw new ImageBuildError(`Failed to build image ${tag}`, result);
  }
}

/**
 * Push an image. A failed push is not fatal: the local image stays usable.
 *
 * @returns True if the push succeeded.
 */
export async function pushImage(tag: string, runner?: CommandRunner): Promise<boolean> {
  log.progress(`Pushing image: ${tag}...`);
  const result = await dockerRun(["push", tag], runner);
  log.progressEnd(result.exitCode === 0);
  if (result.exitCode !== 0) {
    log.warn(`Failed to push image ${tag}. Continuing with local image.`);
    if (result.stderr.trim()) {
      log.dim(`Details: ${result.stderr.trim()}`);
    }
    return false;
  }
  return true;
}

/** What to ensure, and how. */
export interface ManagedImage {
  tag: string;
  dockerfilePath: string;
  buildArgs: readonly BuildArg[];
  contextPath: string;
  /** Never consult the registry: build when missing, never push. */
  localOnly: boolean;
}

/** How an image was made available. */
export type ImageSource = "local" | "pulled" | "built";

/**
 * Make sure an image with the given tag exists locally.
 *
 * Order: local image -> registry pull -> build (then push).
 * In local-only mode the registry is skipped entirely.
 */
export async function manageImage(image: ManagedImage, runner?: CommandRunner): Promise<ImageSource> {
  const { tag } = image;

  log.debug(`Checking for local image: ${tag}`);
  if (await imageExistsLocally(tag, runner)) {
    log.dim(`Image ${tag} already exists locally. Skipping build/pull.`);
    return "local";
  }

  if (!image.localOnly) {
    log.debug(`Checking for remote image manifest: ${tag}`);
    if (await imageExistsInRegistry(tag, runner)) {
      await pullImage(tag, runner);
      return "pulled";
    }
  }

  await buildTaggedImage(tag, image.dockerfilePath, image.buildArgs, image.contextPath, runner);

  if (!image.localOnly) {
    await pushImage(tag, runner);
  }
  return "built";
}

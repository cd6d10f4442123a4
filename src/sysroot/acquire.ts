/**
 * Sysroot acquisition.
 *
 * Given a devkit.json and a pinned digest, produce a verified, extracted
 * sysroot plus a BUILD.bazel exposing it:
 *
 *   resolve generator tag -> build archive -> check archive exists
 *     -> verify sha256 -> extract -> write descriptor
 *
 * Every stage awaits the previous one and any failure aborts the whole
 * evaluation. An output built from other inputs is removed first, and work
 * happens in a sibling staging directory renamed into place only once
 * everything succeeded, so a failed run leaves no output directory.
 */

import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

import {
  BUILD_FILE_NAME,
  DEFAULT_FILEGROUP_NAME,
  DEFAULT_TAG_COMMAND,
  SYSROOT_ARCHIVE_NAME,
  SYSROOT_FILES,
  SYSROOT_GENERATOR_IMAGE,
} from "../constants.js";
import {
  ConfigError,
  EmptyTagError,
  ImageBuildError,
  MissingArtifactError,
  TagResolutionError,
  ValidationError,
} from "../errors.js";
import { runCommand, type CommandRunner } from "../exec.js";
import { log } from "../logger.js";
import { getDockerEnv, getImagesDir } from "../paths.js";
import { validateSha256 } from "../validation.js";

import { verifyChecksum } from "./checksum.js";
import {
  computeFingerprint,
  isValidTargetName,
  listTree,
  readMarker,
  renderBuildFile,
  writeMarker,
} from "./descriptor.js";
import { extractArchive } from "./extract.js";

export interface SysrootOptions {
  /** devkit.json handed to the tag command. Must exist. */
  configPath: string;
  /** Pinned hex SHA-256 of the generated archive. */
  sha256: string;
  /** Directory that receives the extracted sysroot. */
  outputDir: string;
  /** Image recipes and deps.json; defaults to the bundled images. */
  imagesDir?: string;
  /** Name of the public filegroup. */
  targetName?: string;
  /** Build-description command, without the target and flags. */
  tagCommand?: readonly string[];
  runner?: CommandRunner;
}

export interface SysrootResult {
  outputDir: string;
  buildFile: string;
  /** Tag of the generator image the archive was built from. */
  tag: string;
  /** Digest of the verified archive. */
  sha256: string;
  /** Every extracted path, relative to outputDir, sorted. */
  files: string[];
  /** True when a previous output with identical inputs was reused. */
  cached: boolean;
}

/** Image recipe files whose change must force regeneration. */
export interface SysrootInputs {
  configPath: string;
  imagesDir: string;
  baseDockerfile: string;
  generatorDockerfile: string;
  archiveDockerfile: string;
  depsManifest: string;
}

/**
 * Resolve and check every file the acquisition depends on.
 *
 * @throws ConfigError if the config or an image recipe is missing.
 */
export function declareInputs(configPath: string, imagesDir: string): SysrootInputs {
  const inputs: SysrootInputs = {
    configPath: resolve(configPath),
    imagesDir: resolve(imagesDir),
    baseDockerfile: resolve(imagesDir, SYSROOT_FILES.BASE_DOCKERFILE),
    generatorDockerfile: resolve(imagesDir, SYSROOT_FILES.GENERATOR_DOCKERFILE),
    archiveDockerfile: resolve(imagesDir, SYSROOT_FILES.ARCHIVE_DOCKERFILE),
    depsManifest: resolve(imagesDir, SYSROOT_FILES.DEPS_MANIFEST),
  };

  if (!existsSync(inputs.configPath)) {
    throw new ConfigError(`Config file not found: ${inputs.configPath}`);
  }
  for (const file of [inputs.baseDockerfile, inputs.generatorDockerfile, inputs.archiveDockerfile, inputs.depsManifest]) {
    if (!existsSync(file)) {
      throw new ConfigError(`Sysroot image recipe not found: ${file}`);
    }
  }
  return inputs;
}

/**
 * Ask the build-description command for the generator image tag.
 *
 * @throws TagResolutionError if the command fails.
 * @throws EmptyTagError if it prints no tag.
 */
export async function resolveGeneratorTag(
  inputs: SysrootInputs,
  tagCommand: readonly string[],
  runner: CommandRunner
): Promise<string> {
  const command = [
    ...tagCommand,
    SYSROOT_GENERATOR_IMAGE,
    "--print-tag",
    "--config",
    inputs.configPath,
    "--search-path",
    dirname(inputs.depsManifest),
  ];
  const result = await runner(command);

  if (result.exitCode !== 0) {
    throw new TagResolutionError("Failed to get base image tag", result);
  }

  const lines = result.stdout.trim().split(/\r?\n/);
  const tag = (lines[lines.length - 1] ?? "").trim();
  if (!tag) {
    throw new EmptyTagError("Base image tag command returned an empty tag", result);
  }
  return tag;
}

/**
 * Build the archive image and export its filesystem into destDir.
 *
 * @throws ImageBuildError if the build fails.
 */
export async function buildSysrootArchive(
  tag: string,
  inputs: SysrootInputs,
  destDir: string,
  runner: CommandRunner
): Promise<void> {
  const command = [
    "docker",
    "buildx",
    "build",
    `--build-arg=BASE=${tag}`,
    `--file=${inputs.archiveDockerfile}`,
    `--output=type=local,dest=${destDir}`,
    dirname(inputs.archiveDockerfile),
  ];
  const result = await runner(command, { env: getDockerEnv() });

  if (result.exitCode !== 0) {
    throw new ImageBuildError("Dockerfile build failed", result);
  }
}

async function replaceDirectory(staging: string, outputDir: string): Promise<void> {
  await rm(outputDir, { recursive: true, force: true });
  await rename(staging, outputDir);
}

/**
 * Produce a verified, extracted sysroot.
 *
 * Deterministic and idempotent: with unchanged inputs an intact previous
 * output is returned as-is.
 */
export async function acquireSysroot(options: SysrootOptions): Promise<SysrootResult> {
  const expected = validateSha256(options.sha256);
  const targetName = options.targetName ?? DEFAULT_FILEGROUP_NAME;
  if (!isValidTargetName(targetName)) {
    throw new ValidationError(`Invalid target name '${targetName}'`);
  }
  const runner = options.runner ?? runCommand;
  const tagCommand = options.tagCommand ?? DEFAULT_TAG_COMMAND;
  if (tagCommand.length === 0) {
    throw new ValidationError("Tag command must not be empty");
  }

  const outputDir = resolve(options.outputDir);
  const buildFile = join(outputDir, BUILD_FILE_NAME);
  const inputs = declareInputs(options.configPath, options.imagesDir ?? getImagesDir());

  const fingerprint = computeFingerprint([
    { label: "config", path: inputs.configPath },
    { label: SYSROOT_FILES.BASE_DOCKERFILE, path: inputs.baseDockerfile },
    { label: SYSROOT_FILES.GENERATOR_DOCKERFILE, path: inputs.generatorDockerfile },
    { label: SYSROOT_FILES.ARCHIVE_DOCKERFILE, path: inputs.archiveDockerfile },
    { label: SYSROOT_FILES.DEPS_MANIFEST, path: inputs.depsManifest },
    { label: "sha256", value: expected },
    { label: "target", value: targetName },
  ]);

  const previous = readMarker(outputDir);
  if (previous?.fingerprint === fingerprint && existsSync(buildFile)) {
    log.dim(`Sysroot at ${outputDir} is up to date`);
    return {
      outputDir,
      buildFile,
      tag: previous.tag,
      sha256: previous.sha256,
      files: await listTree(outputDir),
      cached: true,
    };
  }

  if (existsSync(outputDir)) {
    log.debug(`Inputs changed, removing previous sysroot at ${outputDir}`);
    await rm(outputDir, { recursive: true, force: true });
  }

  await mkdir(dirname(outputDir), { recursive: true });
  const staging = await mkdtemp(join(dirname(outputDir), `${basename(outputDir)}.staging-`));

  try {
    log.dim("Resolving sysroot generator image tag...");
    const tag = await resolveGeneratorTag(inputs, tagCommand, runner);
    log.dim(`Generator image: ${tag}`);

    log.dim("Building sysroot archive...");
    await buildSysrootArchive(tag, inputs, staging, runner);

    const archivePath = join(staging, SYSROOT_ARCHIVE_NAME);
    if (!existsSync(archivePath)) {
      throw new MissingArtifactError(archivePath);
    }

    const actual = await verifyChecksum(archivePath, SYSROOT_ARCHIVE_NAME, options.sha256);
    log.dim(`Verified ${SYSROOT_ARCHIVE_NAME} (sha256 ${actual})`);

    await extractArchive(archivePath, staging);
    await rm(archivePath);

    await writeFile(join(staging, BUILD_FILE_NAME), renderBuildFile(targetName), "utf-8");
    await writeMarker(staging, { fingerprint, sha256: actual, tag });
    const files = await listTree(staging);

    await replaceDirectory(staging, outputDir);
    log.success(`Sysroot ready at ${outputDir} (${files.length} entries)`);

    return { outputDir, buildFile, tag, sha256: actual, files, cached: false };
  } catch (error: unknown) {
    await rm(staging, { recursive: true, force: true });
    throw error;
  }
}

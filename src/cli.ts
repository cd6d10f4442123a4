#!/usr/bin/env node
/**
 * CLI entry point for devkit.
 *
 * Commander.js-based CLI with the sysroot, image and mounts commands.
 */

import { join, resolve } from "node:path";

import { Command } from "commander";

import { findProjectRoot, loadDevkitConfig } from "./config.js";
import { DEFAULT_ARCH, DEFAULT_CONFIG_FILE, DEFAULT_FILEGROUP_NAME, DEFAULT_TAG_COMMAND, DEVKIT_ENV } from "./constants.js";
import { handleCliError } from "./error-handler.js";
import { runImageCommand } from "./image/index.js";
import { LogLevel, enableQuietMode, getLogLevel, log, parseLogLevel, setLogLevel, style } from "./logger.js";
import { listExternalMounts } from "./mounts.js";
import { getPackageVersion } from "./paths.js";
import { acquireSysroot } from "./sysroot/index.js";

type GlobalOptions = {
  quiet?: boolean;
  verbose?: boolean;
};

interface SysrootCliOptions {
  output: string;
  config?: string;
  sha256?: string;
  imagesDir?: string;
  targetName: string;
  tagCommand?: string[];
}

interface ImageCliOptions {
  searchPath: string[];
  config?: string;
  printTag?: boolean;
  local?: boolean;
  arch: string;
}

/**
 * Explicit --config, else devkit.json at the project root, else in the cwd.
 */
function resolveConfigPath(option: string | undefined): string {
  if (option) {return resolve(option);}
  const root = findProjectRoot();
  return root ? join(root, DEFAULT_CONFIG_FILE) : resolve(DEFAULT_CONFIG_FILE);
}

const initialLevel = parseLogLevel(process.env[DEVKIT_ENV.LOG_LEVEL]);
if (initialLevel !== null) {
  setLogLevel(initialLevel);
}

const program = new Command();

program
  .name("devkit")
  .description("Reproducible containerized build environments")
  .version(getPackageVersion())
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .option("-v, --verbose", "Show debug output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

program
  .command("sysroot")
  .description("Build, verify and extract the sysroot archive, then write its BUILD.bazel")
  .requiredOption("-o, --output <dir>", "Directory that receives the sysroot")
  .option("--config <path>", `Path to ${DEFAULT_CONFIG_FILE} (default: project root)`)
  .option("--sha256 <hex>", "Expected SHA-256 of the generated archive (default: sysroot.sha256 from the config)")
  .option("--images-dir <dir>", `Image recipes directory (default: bundled images, or $${DEVKIT_ENV.IMAGES_DIR})`)
  .option("--target-name <name>", "Name of the public filegroup", DEFAULT_FILEGROUP_NAME)
  .option("--tag-command <cmd...>", `Build-description command (default: ${DEFAULT_TAG_COMMAND.join(" ")})`)
  .action(async (options: SysrootCliOptions) => {
    try {
      const configPath = resolveConfigPath(options.config);
      const sha256 = options.sha256 ?? loadDevkitConfig(configPath).sysroot?.sha256 ?? "";
      const result = await acquireSysroot({
        configPath,
        sha256,
        outputDir: options.output,
        imagesDir: options.imagesDir,
        targetName: options.targetName,
        tagCommand: options.tagCommand,
      });
      log.info(`${style.bold(result.outputDir)} ${style.dim(`(${result.cached ? "cached" : "built"}, sha256 ${result.sha256})`)}`);
    } catch (error: unknown) {
      process.exitCode = handleCliError(error, "acquire sysroot");
    }
  });

program
  .command("image")
  .description("Tag images by content and make sure they exist (local, registry, or build)")
  .argument("[target]", "Only this image and its dependencies (default: all images)")
  .requiredOption("--search-path <dir...>", "Directories holding deps.json and *.Dockerfile")
  .option("--config <path>", `Path to ${DEFAULT_CONFIG_FILE} (default: project root)`)
  .option("--print-tag", "Print the target's tag as the last stdout line")
  .option("--local", "Never pull or push; build missing images locally")
  .option("--arch <arch>", "Architecture part of the tag", DEFAULT_ARCH)
  .action(async (target: string | undefined, options: ImageCliOptions) => {
    try {
      // stdout must end with the tag; keep progress chatter out unless asked for.
      if (options.printTag && !program.opts<GlobalOptions>().verbose && getLogLevel() < LogLevel.WARN) {
        setLogLevel(LogLevel.WARN);
      }
      await runImageCommand({
        target,
        printTag: options.printTag,
        configPath: resolveConfigPath(options.config),
        searchPaths: options.searchPath.map((dir) => resolve(dir)),
        local: options.local,
        arch: options.arch,
      });
    } catch (error: unknown) {
      process.exitCode = handleCliError(error, "process images");
    }
  });

program
  .command("mounts")
  .description("List paths outside a directory that symlinks inside it point at")
  .argument("[dir]", "Directory to scan", ".")
  .action((dir: string) => {
    try {
      for (const path of listExternalMounts(dir)) {
        log.result(path);
      }
    } catch (error: unknown) {
      process.exitCode = handleCliError(error, "list external mounts");
    }
  });

await program.parseAsync(process.argv);

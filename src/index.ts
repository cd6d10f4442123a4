/**
 * devkit - reproducible containerized build environments.
 *
 * This is the main entry point for the devkit-sysroot package.
 */

export {
  DevkitError,
  ConfigError,
  ValidationError,
  DependencyError,
  DockerError,
  DockerNotFoundError,
  ImageBuildError,
  SysrootError,
  TagResolutionError,
  EmptyTagError,
  MissingArtifactError,
  ChecksumComputationError,
  ChecksumMismatchError,
  ExtractionError,
  type CommandDiagnostics,
  type SysrootStage,
} from "./errors.js";
export { runCommand, formatCommand, type CommandResult, type CommandRunner, type RunOptions } from "./exec.js";
export { loadDevkitConfig, getRegistryPrefix, findProjectRoot, type DevkitConfig } from "./config.js";
export { getPackageVersion, getImagesDir } from "./paths.js";
export { acquireSysroot, type SysrootOptions, type SysrootResult } from "./sysroot/index.js";
export {
  runImageCommand,
  getImageTag,
  calculateImageHash,
  loadImageConfigs,
  getBuildOrder,
  getDependencySubgraph,
  manageImage,
  type ImageCommandOptions,
  type ImageCommandResult,
  type ImageConfig,
} from "./image/index.js";
export { listExternalMounts, minimizePaths } from "./mounts.js";
export { log, LogLevel, setLogLevel, enableQuietMode } from "./logger.js";

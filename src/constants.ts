/**
 * Constants module for devkit.
 *
 * Shared names, file layout and environment variable names are defined here (SSOT).
 */

// === Naming (SSOT) ===
export const DEVKIT_PREFIX = "devkit";
export const DEFAULT_CONFIG_FILE = "devkit.json";
/** Directory whose presence marks a project root. */
export const PROJECT_MARKER_DIR = "devkit";

// === Images ===
export const DEFAULT_ARCH = "amd64";
export const IMAGE_NAMESPACE = DEVKIT_PREFIX;
export const DEPS_MANIFEST_FILE = "deps.json";
export const DOCKERFILE_SUFFIX = ".Dockerfile";

// === Sysroot layout ===
export const SYSROOT_GENERATOR_IMAGE = "sysroot-archive-generator";
export const SYSROOT_FILES = {
  BASE_DOCKERFILE: "base.Dockerfile",
  GENERATOR_DOCKERFILE: "sysroot-archive-generator.Dockerfile",
  ARCHIVE_DOCKERFILE: "sysroot-archive.Dockerfile",
  DEPS_MANIFEST: DEPS_MANIFEST_FILE,
} as const;
export const SYSROOT_ARCHIVE_NAME = "sysroot.tar.gz";
export const BUILD_FILE_NAME = "BUILD.bazel";
export const SYSROOT_MARKER_FILE = ".devkit-sysroot.json";
export const DEFAULT_FILEGROUP_NAME = "files";
export const DEFAULT_TAG_COMMAND: readonly string[] = ["devkit", "image"];

// === Environment Variables (SSOT for names) ===
export const DEVKIT_ENV = {
  LOG_LEVEL: "DEVKIT_LOG_LEVEL",
  IMAGES_DIR: "DEVKIT_IMAGES_DIR",
} as const;

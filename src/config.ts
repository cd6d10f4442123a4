/**
 * devkit.json support.
 *
 * The config file parametrizes which registry images are tagged under and,
 * optionally, which sysroot checksum a project pins.
 *
 *   {
 *     "docker": { "registry": { "host": "...", "project": "...", "repository": "..." } },
 *     "sysroot": { "sha256": "<hex>" }
 *   }
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, image, sysroot
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { PROJECT_MARKER_DIR } from "./constants.js";
import { ConfigError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";

export interface RegistryConfig {
  host?: string;
  project?: string;
  repository?: string;
}

/**
 * devkit configuration options.
 * All fields are optional - CLI flags take precedence.
 */
export interface DevkitConfig {
  docker?: {
    registry?: RegistryConfig;
  };
  sysroot?: {
    sha256?: string;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRegistry(value: unknown): RegistryConfig | undefined {
  if (!isRecord(value)) {return undefined;}
  const registry: RegistryConfig = {};
  if (typeof value.host === "string") {registry.host = value.host;}
  if (typeof value.project === "string") {registry.project = value.project;}
  if (typeof value.repository === "string") {registry.repository = value.repository;}
  return registry;
}

/**
 * Load devkit.json. A missing file is an empty config; unreadable JSON is fatal.
 *
 * @throws ConfigError if the file exists but is not valid JSON.
 */
export function loadDevkitConfig(path: string): DevkitConfig {
  if (!existsSync(path)) {
    log.debug(`No config at ${path}, using defaults`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    throw new ConfigError(`Could not decode ${path}: ${extractErrorDetails(e)}`);
  }

  const config: DevkitConfig = {};
  if (!isRecord(parsed)) {
    log.warn(`${path} does not contain a JSON object, ignoring it`);
    return config;
  }

  if (isRecord(parsed.docker)) {
    const registry = readRegistry(parsed.docker.registry);
    config.docker = registry ? { registry } : {};
  }
  if (isRecord(parsed.sysroot)) {
    config.sysroot = typeof parsed.sysroot.sha256 === "string" ? { sha256: parsed.sysroot.sha256 } : {};
  }

  log.debug(`Loaded config: ${path}`);
  return config;
}

/**
 * Registry prefix for image tags: host/project/repository, or "" unless all
 * three parts are non-empty.
 */
export function getRegistryPrefix(config: DevkitConfig): string {
  const registry = config.docker?.registry;
  if (!registry?.host || !registry.project || !registry.repository) {
    return "";
  }
  return `${registry.host}/${registry.project}/${registry.repository}`;
}

/**
 * Walk up from `start` looking for a directory that contains `devkit/`.
 *
 * @returns The first such directory, or null when the filesystem root is reached.
 */
export function findProjectRoot(start: string = process.cwd()): string | null {
  let dir = resolve(start);
  for (;;) {
    if (existsSync(join(dir, PROJECT_MARKER_DIR))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

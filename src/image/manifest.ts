/**
 * Image manifest (deps.json) loading and dependency ordering.
 *
 * A deps.json maps image names to the build args that take another image's tag:
 *
 *   { "sysroot-archive-generator": { "deps": { "BASE": "base" } }, "base": { "deps": {} } }
 *
 * Every search path may carry one; later paths override earlier entries.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { DEPS_MANIFEST_FILE } from "../constants.js";
import { ConfigError, DependencyError, extractErrorDetails } from "../errors.js";
import { log } from "../logger.js";

export interface ImageConfig {
  /** Build arg name -> name of the image whose tag it receives. */
  deps: Record<string, string>;
  /** Build locally only: never pull from or push to the registry. */
  local?: boolean;
}

export type ImageConfigsMap = Record<string, ImageConfig>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseImageConfig(name: string, value: unknown, source: string): ImageConfig {
  if (!isRecord(value) || !isRecord(value.deps)) {
    throw new ConfigError(`Invalid entry '${name}' in ${source}: expected { "deps": { ... } }`);
  }

  const deps: Record<string, string> = {};
  for (const [arg, image] of Object.entries(value.deps)) {
    if (typeof image !== "string") {
      throw new ConfigError(`Invalid dependency '${arg}' of '${name}' in ${source}: expected an image name`);
    }
    deps[arg] = image;
  }

  const config: ImageConfig = { deps };
  if (typeof value.local === "boolean") {
    config.local = value.local;
  }
  return config;
}

/**
 * Load and merge deps.json from every search path.
 *
 * @throws ConfigError if a deps.json is not valid JSON or has a malformed entry.
 */
export function loadImageConfigs(searchPaths: readonly string[]): ImageConfigsMap {
  const all: ImageConfigsMap = {};

  for (const searchPath of searchPaths) {
    const depsFile = join(searchPath, DEPS_MANIFEST_FILE);
    if (!existsSync(depsFile)) {continue;}

    log.debug(`Loading image configs from ${depsFile}`);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(depsFile, "utf-8"));
    } catch (e: unknown) {
      throw new ConfigError(`Could not decode ${depsFile}: ${extractErrorDetails(e)}`);
    }

    if (!isRecord(parsed)) {
      log.warn(`${depsFile} does not contain a dict of configs.`);
      continue;
    }

    for (const [name, value] of Object.entries(parsed)) {
      all[name] = parseImageConfig(name, value, depsFile);
    }
  }

  return all;
}

/**
 * Order a graph so every node comes after its dependencies.
 * Nodes that become ready together are emitted alphabetically, so the order is stable.
 */
function topologicalOrder(graph: Map<string, Set<string>>): string[] {
  for (const [name, deps] of graph) {
    for (const dep of deps) {
      if (!graph.has(dep)) {
        throw new DependencyError(`Image '${name}' depends on unknown image '${dep}'`);
      }
    }
  }

  const remaining = new Map(graph);
  const order: string[] = [];

  while (remaining.size > 0) {
    const ready = [...remaining]
      .filter(([, deps]) => [...deps].every((dep) => !remaining.has(dep)))
      .map(([name]) => name)
      .sort();

    if (ready.length === 0) {
      throw new DependencyError(`Cycle detected in image dependencies: ${[...remaining.keys()].sort().join(", ")}`);
    }

    for (const name of ready) {
      order.push(name);
      remaining.delete(name);
    }
  }

  return order;
}

function toGraph(configs: ImageConfigsMap, names?: Iterable<string>): Map<string, Set<string>> {
  const graph = new Map<string, Set<string>>();
  for (const name of names ?? Object.keys(configs)) {
    const config = configs[name];
    if (config) {
      graph.set(name, new Set(Object.values(config.deps)));
    }
  }
  return graph;
}

/**
 * Build order for every image in the manifest.
 *
 * @throws DependencyError on a cycle or a dependency on an unknown image.
 */
export function getBuildOrder(configs: ImageConfigsMap): string[] {
  return topologicalOrder(toGraph(configs));
}

/**
 * The target and everything it transitively depends on, dependencies first.
 * An unknown target yields an empty list.
 *
 * @throws DependencyError on a cycle or a dependency on an unknown image.
 */
export function getDependencySubgraph(target: string, configs: ImageConfigsMap): string[] {
  if (!(target in configs)) {
    return [];
  }

  const visited = new Set<string>();
  const pending = [target];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || visited.has(current)) {continue;}
    visited.add(current);
    const config = configs[current];
    if (config) {
      pending.push(...Object.values(config.deps));
    }
  }

  return topologicalOrder(toGraph(configs, visited));
}

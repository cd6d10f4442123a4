/**
 * External mount discovery.
 *
 * A workspace mounted into a dev container often holds symlinks into the
 * host (bazel output bases, shared caches). This finds the smallest set of
 * outside paths that has to be mounted as well for every link to resolve.
 */

import { existsSync, lstatSync, type Dirent, readdirSync, readlinkSync, realpathSync, statSync } from "node:fs";
import { dirname, join, relative, resolve, isAbsolute, sep } from "node:path";

import { log } from "./logger.js";

function isInside(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Yield every symlink below dir without following links. */
function* walkSymlinks(dir: string): Generator<string> {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (e: unknown) {
    log.debug(`Cannot read ${dir}: ${String(e)}`);
    return;
  }
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isSymbolicLink()) {
      yield path;
    } else if (entry.isDirectory()) {
      yield* walkSymlinks(path);
    }
  }
}

/**
 * Follow one symlink chain, recording each existing hop outside scanRoot.
 * Newly found outside directories are queued for scanning.
 */
function followChain(link: string, scanRoot: string, external: Set<string>, worklist: string[]): void {
  const seen = new Set<string>();
  let current = link;

  while (isSymlink(current)) {
    if (seen.has(current)) {return;}
    seen.add(current);

    const target = resolve(dirname(current), readlinkSync(current));
    if (!existsSync(target)) {return;}

    if (!isInside(scanRoot, target) && !external.has(target)) {
      external.add(target);
      if (isDirectory(target)) {
        worklist.push(target);
      }
    }
    current = target;
  }
}

/**
 * Keep only outermost paths: {/a/b, /a/b/c, /d} -> {/a/b, /d}.
 */
export function minimizePaths(paths: Iterable<string>): string[] {
  const minimal: string[] = [];
  for (const path of [...paths].sort()) {
    if (minimal.some((kept) => path === kept || path.startsWith(kept.endsWith(sep) ? kept : kept + sep))) {
      continue;
    }
    minimal.push(path);
  }
  return minimal;
}

/**
 * Paths outside scanDir that symlinks inside it (transitively) point at.
 * Top-level `bazel-*` convenience links are ignored.
 *
 * @returns Minimal set of outside paths, sorted.
 */
export function listExternalMounts(scanDir: string): string[] {
  const scanRoot = realpathSync(resolve(scanDir));
  const external = new Set<string>();
  const worklist = [scanRoot];
  const scanned = new Set<string>();

  while (worklist.length > 0) {
    const dir = worklist.shift();
    if (dir === undefined || scanned.has(dir)) {continue;}
    scanned.add(dir);

    for (const link of walkSymlinks(dir)) {
      if (dirname(link) === scanRoot && link.slice(scanRoot.length + 1).startsWith("bazel-")) {
        continue;
      }
      followChain(link, scanRoot, external, worklist);
    }
  }

  return minimizePaths(external);
}

/**
 * Sysroot archive extraction.
 *
 * Unpacks a gzip-compressed tar into a directory, keeping entry modes and
 * mtimes so the same archive always yields the same tree. Nothing may be
 * written outside the destination: absolute names, `..` segments, writes
 * through an already-extracted symlink and hard links to outside paths all
 * fail the extraction.
 */

import { createReadStream, createWriteStream, lstatSync, mkdirSync, rmSync } from "node:fs";
import { chmod, link, mkdir, symlink, utimes } from "node:fs/promises";
import { dirname, isAbsolute, posix, relative, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";

import tar, { type Headers } from "tar-stream";

import { ExtractionError, extractErrorDetails } from "../errors.js";
import { log } from "../logger.js";

/** Strip "./" and trailing slashes; "" means the archive root. */
export function normalizeEntryName(name: string): string {
  return posix.normalize(name.replace(/\\/g, "/")).replace(/^(\.\/)+/, "").replace(/\/+$/, "").replace(/^\.$/, "");
}

/**
 * Resolve an entry name below root.
 *
 * @throws ExtractionError if the name is absolute or escapes root.
 */
export function resolveInside(root: string, name: string): string {
  if (isAbsolute(name) || name.startsWith("/")) {
    throw new ExtractionError(`Refusing absolute archive entry '${name}'`);
  }
  const target = resolve(root, name);
  if (target !== root && !target.startsWith(root + sep)) {
    throw new ExtractionError(`Refusing archive entry '${name}' outside ${root}`);
  }
  return target;
}

/** Directory metadata, applied once every entry is in place. */
interface DirectoryAttributes {
  path: string;
  mode?: number;
  mtime?: Date;
}

/**
 * Reject targets whose parent chain (below root) contains a symlink.
 */
function assertNoSymlinkParent(root: string, target: string): void {
  let current = root;
  for (const part of relative(root, dirname(target)).split(sep).filter(Boolean)) {
    current = resolve(current, part);
    const stats = lstatSync(current, { throwIfNoEntry: false });
    if (!stats) {return;}
    if (stats.isSymbolicLink()) {
      throw new ExtractionError(`Refusing to write '${relative(root, target)}' through symlink '${relative(root, current)}'`);
    }
  }
}

/** Discard an entry body. */
function drain(stream: Readable): Promise<void> {
  return new Promise((done, fail) => {
    stream.on("end", () => done());
    stream.on("error", fail);
    stream.resume();
  });
}

/** Copy an entry body into a new file; resolves once the file is closed. */
function writeBody(stream: Readable, target: string): Promise<void> {
  return new Promise((done, fail) => {
    const out = createWriteStream(target);
    stream.on("error", fail);
    out.on("error", fail);
    out.on("close", () => done());
    stream.pipe(out);
  });
}

/** Make room for an entry: create its parent, remove whatever sits at its path. */
function prepareTarget(target: string): void {
  mkdirSync(dirname(target), { recursive: true });
  rmSync(target, { force: true, recursive: true });
}

/**
 * Materialize one entry.
 *
 * The entry body must be drained or piped before the first await.
 *
 * @returns The normalized entry name, or null for skipped entries.
 */
async function writeEntry(
  root: string,
  header: Headers,
  stream: Readable,
  directories: DirectoryAttributes[]
): Promise<string | null> {
  const name = normalizeEntryName(header.name);
  if (name === "") {
    await drain(stream);
    return null;
  }

  const target = resolveInside(root, name);
  assertNoSymlinkParent(root, target);

  const type = header.type ?? "file";
  switch (type) {
    case "directory": {
      await drain(stream);
      await mkdir(target, { recursive: true });
      directories.push({
        path: target,
        mode: typeof header.mode === "number" ? header.mode & 0o7777 : undefined,
        mtime: header.mtime,
      });
      return name;
    }
    case "symlink": {
      await drain(stream);
      if (!header.linkname) {
        throw new ExtractionError(`Symlink entry '${name}' has no target`);
      }
      prepareTarget(target);
      await symlink(header.linkname, target);
      return name;
    }
    case "link": {
      await drain(stream);
      if (!header.linkname) {
        throw new ExtractionError(`Hard link entry '${name}' has no target`);
      }
      const linkTarget = resolveInside(root, normalizeEntryName(header.linkname));
      assertNoSymlinkParent(root, linkTarget);
      if (lstatSync(linkTarget, { throwIfNoEntry: false })?.isSymbolicLink()) {
        throw new ExtractionError(`Refusing hard link '${name}' to symlink '${relative(root, linkTarget)}'`);
      }
      prepareTarget(target);
      await link(linkTarget, target);
      return name;
    }
    case "file":
    case "contiguous-file": {
      prepareTarget(target);
      await writeBody(stream, target);
      if (typeof header.mode === "number") {
        await chmod(target, header.mode & 0o7777);
      }
      if (header.mtime) {
        await utimes(target, header.mtime, header.mtime);
      }
      return name;
    }
    default:
      log.debug(`Skipping ${type} entry ${name}`);
      await drain(stream);
      return null;
  }
}

/**
 * Apply directory modes and mtimes once all entries are written, deepest first.
 */
async function applyDirectoryAttributes(directories: readonly DirectoryAttributes[]): Promise<void> {
  const deepestFirst = [...directories].sort((a, b) => b.path.split(sep).length - a.path.split(sep).length);
  for (const dir of deepestFirst) {
    if (dir.mtime) {
      await utimes(dir.path, dir.mtime, dir.mtime);
    }
    if (dir.mode !== undefined) {
      await chmod(dir.path, dir.mode);
    }
  }
}

/**
 * Extract a .tar.gz into destDir.
 *
 * @returns Names of the extracted entries, sorted.
 * @throws ExtractionError if the archive is corrupt or holds an unsafe entry.
 */
export async function extractArchive(archivePath: string, destDir: string): Promise<string[]> {
  const root = resolve(destDir);
  await mkdir(root, { recursive: true });

  const extracted: string[] = [];
  const directories: DirectoryAttributes[] = [];
  const extract = tar.extract();

  extract.on("entry", (header, stream, next) => {
    writeEntry(root, header, stream, directories).then(
      (name) => {
        if (name !== null) {extracted.push(name);}
        next();
      },
      (error: unknown) => {
        stream.resume();
        extract.destroy(error instanceof Error ? error : new Error(String(error)));
      }
    );
  });

  try {
    await pipeline(createReadStream(archivePath), createGunzip(), extract);
    await applyDirectoryAttributes(directories);
  } catch (e: unknown) {
    if (e instanceof ExtractionError) {throw e;}
    throw new ExtractionError(
      `Failed to extract ${archivePath}: ${extractErrorDetails(e)}`
    );
  }

  return extracted.sort();
}

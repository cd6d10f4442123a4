import { mkdtempSync, realpathSync, rmSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { gzipSync } from "node:zlib";

import tar from "tar-stream";

/** One entry of a fixture archive. */
export interface FixtureEntry {
  name: string;
  type?: "file" | "directory" | "symlink" | "link";
  content?: string;
  mode?: number;
  linkname?: string;
}

const FIXED_MTIME = new Date("2024-01-01T00:00:00Z");

/** A real, empty temp directory. */
export function makeTempDir(prefix: string): string {
  return realpathSync(mkdtempSync(join(tmpdir(), `devkit-${prefix}-`)));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Gzip-compressed tar with the given entries, in order. */
export async function buildTarGz(entries: readonly FixtureEntry[]): Promise<Buffer> {
  const pack = tar.pack();
  const output = new PassThrough();
  pack.pipe(output);
  for (const entry of entries) {
    const type = entry.type ?? "file";
    pack.entry(
      {
        name: entry.name,
        type,
        mode: entry.mode ?? (type === "directory" ? 0o755 : 0o644),
        mtime: FIXED_MTIME,
        linkname: entry.linkname,
      },
      type === "file" ? entry.content ?? "" : undefined
    );
  }
  pack.finalize();

  const chunks: Buffer[] = [];
  for await (const chunk of output) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return gzipSync(Buffer.concat(chunks));
}

export async function writeTarGz(path: string, entries: readonly FixtureEntry[]): Promise<Buffer> {
  const archive = await buildTarGz(entries);
  await writeFile(path, archive);
  return archive;
}

/** A minimal sysroot layout. */
export const SYSROOT_ENTRIES: readonly FixtureEntry[] = [
  { name: "usr/", type: "directory" },
  { name: "usr/include/", type: "directory" },
  { name: "usr/include/stdio.h", content: "int printf(const char *, ...);\n" },
  { name: "usr/lib/", type: "directory" },
  { name: "usr/lib/libc.so.6", content: "libc", mode: 0o755 },
  { name: "usr/lib/libc.so", type: "symlink", linkname: "libc.so.6" },
  { name: "lib/", type: "directory" },
  { name: "lib/ld-linux.so.2", content: "ld" },
  { name: "lib64/", type: "directory" },
  { name: "lib64/ld-linux-x86-64.so.2", content: "ld64" },
];

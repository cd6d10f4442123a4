import assert from "node:assert/strict";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import test from "node:test";

import { ChecksumComputationError, ChecksumMismatchError } from "../src/errors.js";
import { sha256File, verifyChecksum } from "../src/sysroot/checksum.js";

import { makeTempDir, removeDir } from "./helpers.js";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

test("sha256File hashes the file content", async (t) => {
  const dir = makeTempDir("checksum");
  t.after(() => removeDir(dir));
  const file = join(dir, "hello.txt");
  writeFileSync(file, "hello");

  assert.equal(await sha256File(file), HELLO_SHA256);
});

test("verifyChecksum accepts the digest in any case, with or without prefix", async (t) => {
  const dir = makeTempDir("checksum");
  t.after(() => removeDir(dir));
  const file = join(dir, "hello.txt");
  writeFileSync(file, "hello");

  assert.equal(await verifyChecksum(file, "hello.txt", HELLO_SHA256.toUpperCase()), HELLO_SHA256);
  assert.equal(await verifyChecksum(file, "hello.txt", `sha256:${HELLO_SHA256}\n`), HELLO_SHA256);
});

test("verifyChecksum reports both digests on mismatch", async (t) => {
  const dir = makeTempDir("checksum");
  t.after(() => removeDir(dir));
  const file = join(dir, "hello.txt");
  writeFileSync(file, "hello");

  await assert.rejects(verifyChecksum(file, "hello.txt", "deadbeef"), (error: unknown) => {
    assert.ok(error instanceof ChecksumMismatchError);
    assert.equal(error.expected, "deadbeef");
    assert.equal(error.actual, HELLO_SHA256);
    assert.ok(
      error.message.startsWith(
        `SHA256 mismatch for generated archive hello.txt. Expected: 'deadbeef', Got: '${HELLO_SHA256}'.`
      )
    );
    return true;
  });
});

test("sha256File fails for an unreadable archive", async (t) => {
  const dir = makeTempDir("checksum");
  t.after(() => removeDir(dir));

  await assert.rejects(sha256File(join(dir, "missing.tar.gz")), (error: unknown) => {
    assert.ok(error instanceof ChecksumComputationError);
    assert.equal(error.stage, "checksum");
    return true;
  });
});

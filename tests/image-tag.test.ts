import assert from "node:assert/strict";
import { createHash } from "node:crypto";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import test from "node:test";

import { calculateImageHash, getImageTag } from "../src/image/tag.js";

import { makeTempDir, removeDir } from "./helpers.js";

test("calculateImageHash covers the Dockerfile bytes and the build args in order", (t) => {
  const dir = makeTempDir("tag");
  t.after(() => removeDir(dir));
  const dockerfile = join(dir, "gen.Dockerfile");
  writeFileSync(dockerfile, "ARG BASE\nFROM ${BASE}\n");

  const expected = createHash("sha256")
    .update("ARG BASE\nFROM ${BASE}\n")
    .update("BASE=devkit/base:amd64-1")
    .update("TOOLS=devkit/tools:amd64-2")
    .digest("hex");

  assert.equal(calculateImageHash(dockerfile, ["BASE=devkit/base:amd64-1", "TOOLS=devkit/tools:amd64-2"]), expected);
});

test("calculateImageHash changes with the recipe or a dependency tag", (t) => {
  const dir = makeTempDir("tag");
  t.after(() => removeDir(dir));
  const dockerfile = join(dir, "gen.Dockerfile");
  writeFileSync(dockerfile, "FROM scratch\n");

  const first = calculateImageHash(dockerfile, ["BASE=devkit/base:amd64-1"]);
  assert.equal(calculateImageHash(dockerfile, ["BASE=devkit/base:amd64-1"]), first);
  assert.notEqual(calculateImageHash(dockerfile, ["BASE=devkit/base:amd64-2"]), first);

  writeFileSync(dockerfile, "FROM scratch\nLABEL x=y\n");
  assert.notEqual(calculateImageHash(dockerfile, ["BASE=devkit/base:amd64-1"]), first);
});

test("getImageTag builds [registry/]devkit/<image>:<arch>-<sha>", () => {
  assert.equal(getImageTag("base", "abc"), "devkit/base:amd64-abc");
  assert.equal(getImageTag("base", "abc", { registry: "" }), "devkit/base:amd64-abc");
  assert.equal(
    getImageTag("base", "abc", { registry: "registry.test/tools/devkit", arch: "arm64" }),
    "registry.test/tools/devkit/devkit/base:arm64-abc"
  );
});

import assert from "node:assert/strict";
import test from "node:test";

import { DockerNotFoundError, ImageBuildError } from "../src/errors.js";
import { buildImageArgs, manageImage, type ManagedImage } from "../src/image/docker.js";
import { LogLevel, setLogLevel } from "../src/logger.js";

import { DockerMockRecorder } from "./mocks/docker-mock.js";

setLogLevel(LogLevel.SILENT);

const TAG = "devkit/tools:amd64-abc";

function managed(overrides: Partial<ManagedImage> = {}): ManagedImage {
  return {
    tag: TAG,
    dockerfilePath: "/images/tools.Dockerfile",
    buildArgs: [{ name: "BASE", value: "devkit/base:amd64-123" }],
    contextPath: "/images",
    localOnly: false,
    ...overrides,
  };
}

test("buildImageArgs passes tag, file, build args and context", () => {
  assert.deepEqual(buildImageArgs(TAG, "/images/tools.Dockerfile", [{ name: "BASE", value: "b" }], "/images"), [
    "buildx",
    "build",
    "--tag",
    TAG,
    "--file",
    "/images/tools.Dockerfile",
    "--build-arg",
    "BASE=b",
    "/images",
  ]);
});

test("manageImage uses an existing local image", async () => {
  const docker = new DockerMockRecorder().on(["docker", "image", "inspect"], { exitCode: 0 });

  assert.equal(await manageImage(managed(), docker.run), "local");
  assert.deepEqual(docker.commandLines(), [`docker image inspect ${TAG}`]);
  assert.equal(docker.calls[0]?.options?.env?.DOCKER_BUILDKIT, "1");
});

test("manageImage pulls an image the registry already has", async () => {
  const docker = new DockerMockRecorder()
    .on(["docker", "image", "inspect"], { exitCode: 1 })
    .on(["docker", "manifest", "inspect"], { exitCode: 0 });

  assert.equal(await manageImage(managed(), docker.run), "pulled");
  assert.deepEqual(docker.commandLines(), [
    `docker image inspect ${TAG}`,
    `docker manifest inspect ${TAG}`,
    `docker pull ${TAG}`,
  ]);
});

test("manageImage builds and pushes a missing image", async () => {
  const docker = new DockerMockRecorder()
    .on(["docker", "image", "inspect"], { exitCode: 1 })
    .on(["docker", "manifest", "inspect"], { exitCode: 1 });

  assert.equal(await manageImage(managed(), docker.run), "built");
  assert.deepEqual(docker.commandLines(), [
    `docker image inspect ${TAG}`,
    `docker manifest inspect ${TAG}`,
    `docker buildx build --tag ${TAG} --file /images/tools.Dockerfile --build-arg BASE=devkit/base:amd64-123 /images`,
    `docker push ${TAG}`,
  ]);
});

test("manageImage never touches the registry in local-only mode", async () => {
  const docker = new DockerMockRecorder().on(["docker", "image", "inspect"], { exitCode: 1 });

  assert.equal(await manageImage(managed({ localOnly: true }), docker.run), "built");
  assert.deepEqual(docker.commandLines(), [
    `docker image inspect ${TAG}`,
    `docker buildx build --tag ${TAG} --file /images/tools.Dockerfile --build-arg BASE=devkit/base:amd64-123 /images`,
  ]);
});

test("a failed push leaves the built image usable", async () => {
  const docker = new DockerMockRecorder()
    .on(["docker", "image", "inspect"], { exitCode: 1 })
    .on(["docker", "manifest", "inspect"], { exitCode: 1 })
    .on(["docker", "push"], { exitCode: 1, stderr: "denied: requested access to the resource is denied" });

  assert.equal(await manageImage(managed(), docker.run), "built");
});

test("a failed build reports the docker output", async () => {
  const docker = new DockerMockRecorder()
    .on(["docker", "image", "inspect"], { exitCode: 1 })
    .on(["docker", "manifest", "inspect"], { exitCode: 1 })
    .on(["docker", "buildx", "build"], { exitCode: 1, stderr: "failed to solve: missing base" });

  await assert.rejects(manageImage(managed(), docker.run), (error: unknown) => {
    assert.ok(error instanceof ImageBuildError);
    assert.ok(error.message.startsWith(`Failed to build image ${TAG}\n`));
    assert.match(error.message, /failed to solve: missing base/);
    return true;
  });
  assert.equal(docker.calls.length, 3);
});

test("a failed pull is fatal", async () => {
  const docker = new DockerMockRecorder()
    .on(["docker", "image", "inspect"], { exitCode: 1 })
    .on(["docker", "manifest", "inspect"], { exitCode: 0 })
    .on(["docker", "pull"], { exitCode: 1, stderr: "timeout" });

  await assert.rejects(manageImage(managed(), docker.run), ImageBuildError);
});

test("a missing docker binary is reported as such", async () => {
  const docker = new DockerMockRecorder().on(["docker"], { exitCode: -1, stderr: "spawn docker ENOENT" });

  await assert.rejects(manageImage(managed(), docker.run), DockerNotFoundError);
});

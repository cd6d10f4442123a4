/**
 * Content-addressed images.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - manifest.ts: deps.json loading and dependency ordering
 * - tag.ts: content-derived tags
 * - docker.ts: inspect/pull/build/push and the ensure-image flow
 * - build.ts: the `devkit image` command
 */

export {
  type ImageConfig,
  type ImageConfigsMap,
  loadImageConfigs,
  getBuildOrder,
  getDependencySubgraph,
} from "./manifest.js";

export { calculateImageHash, getImageTag, type TagOptions } from "./tag.js";

export {
  type BuildArg,
  type ManagedImage,
  type ImageSource,
  dockerRun,
  imageExistsLocally,
  imageExistsInRegistry,
  pullImage,
  buildImageArgs,
  buildTaggedImage,
  pushImage,
  manageImage,
} from "./docker.js";

export {
  type ImageBuildContext,
  type ImageCommandOptions,
  type ImageCommandResult,
  type ProcessedImage,
  findDockerfile,
  processImage,
  runImageCommand,
} from "./build.js";

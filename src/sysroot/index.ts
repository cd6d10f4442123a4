/**
 * Sysroot acquisition.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - acquire.ts: the tag -> build -> verify -> extract -> describe chain
 * - checksum.ts: archive digests
 * - extract.ts: safe .tar.gz extraction
 * - descriptor.ts: BUILD.bazel, input fingerprint, marker file
 */

export {
  type SysrootOptions,
  type SysrootResult,
  type SysrootInputs,
  acquireSysroot,
  declareInputs,
  resolveGeneratorTag,
  buildSysrootArchive,
} from "./acquire.js";

export { sha256File, verifyChecksum } from "./checksum.js";

export { extractArchive, normalizeEntryName, resolveInside } from "./extract.js";

export {
  type FingerprintInput,
  type SysrootMarker,
  GENERATED_FILES,
  computeFingerprint,
  isValidTargetName,
  listTree,
  readMarker,
  renderBuildFile,
  writeMarker,
} from "./descriptor.js";

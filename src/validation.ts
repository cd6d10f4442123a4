/**
 * Input validation utilities for devkit.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, image, sysroot
 */

import { ValidationError } from "./errors.js";

const HEX_PATTERN = /^[0-9a-f]+$/;

/** Image names double as Dockerfile stems and tag path segments. */
const IMAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/**
 * Normalize a SHA-256 digest for comparison: trim, lower-case and drop an
 * optional "sha256:" prefix.
 */
export function normalizeSha256(value: string): string {
  const trimmed = value.trim().toLowerCase();
  return trimmed.startsWith("sha256:") ? trimmed.slice("sha256:".length) : trimmed;
}

/**
 * Validate a caller-supplied digest and return its normalized form.
 *
 * Only the alphabet is checked, not the length: a short pin still goes
 * through the build and is reported as a mismatch with the real digest.
 *
 * @throws ValidationError if the value is missing, empty or not hex.
 */
export function validateSha256(value: string | undefined): string {
  if (value === undefined || value.trim() === "") {
    throw new ValidationError("A sha256 for the sysroot archive is required (--sha256 or sysroot.sha256 in devkit.json)");
  }
  const normalized = normalizeSha256(value);
  if (!HEX_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid sha256 '${value}'. Expected a hex digest.`);
  }
  return normalized;
}

export function isValidImageName(name: string): boolean {
  return IMAGE_NAME_PATTERN.test(name);
}

/**
 * @throws ValidationError if the name cannot be used as an image name.
 */
export function validateImageName(name: string): void {
  if (!isValidImageName(name)) {
    throw new ValidationError(
      `Invalid image name '${name}'. Use lowercase letters, digits, '.', '_' or '-', starting with a letter or digit.`
    );
  }
}

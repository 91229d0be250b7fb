/**
 * Release reference validation
 *
 * The pipeline only runs for version tags (`v*`) and release branches
 * (`release`, `release-1.8`, `release/1.8`). The image version tag is derived
 * from the reference.
 */

import { ConfigurationError } from '../errors';

const REF_PREFIXES = ['refs/heads/', 'refs/tags/', 'origin/'];

const RELEASE_REF_PATTERN = /^(?:v|release)[A-Za-z0-9._/-]*$/;

/** Docker tag grammar: first character word-like, at most 128 characters */
const DOCKER_TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

/**
 * Normalize and validate a git-like reference
 * @throws ConfigurationError when the reference is not a `v*` or `release*` ref
 */
export function parseReference(raw: string): string {
  let ref = raw.trim();
  for (const prefix of REF_PREFIXES) {
    if (ref.startsWith(prefix)) {
      ref = ref.slice(prefix.length);
      break;
    }
  }

  if (!RELEASE_REF_PATTERN.test(ref) || ref.includes('//') || ref.endsWith('/')) {
    throw new ConfigurationError(
      `Invalid reference "${raw}": expected a version tag (v*) or a release branch (release*, release/*)`,
      'ref',
      raw,
    );
  }

  return ref;
}

/**
 * Image tag for a validated reference: `release/1.8` → `release-1.8`
 */
export function deriveVersionTag(ref: string): string {
  const tag = parseReference(ref).replace(/\//g, '-');

  if (!DOCKER_TAG_PATTERN.test(tag)) {
    throw new ConfigurationError(`Reference "${ref}" does not yield a valid image tag`, 'ref', ref);
  }

  return tag;
}

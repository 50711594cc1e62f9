/**
 * Version types shared across the resolver, installer and switcher
 */

import type { SemVer } from "semver";

/**
 * The kinds of version a user can ask for
 * Adding a kind must be handled at every `switch (resolved.kind)` site
 */
export type VersionKind =
  | "tagged"
  | "stable"
  | "nightly"
  | "hash"
  | "nightly-rollback";

/**
 * A user version string turned into its canonical form
 */
export type ResolvedVersion = {
  /** Canonical identifier, e.g. v0.9.5, nightly, nightly-abc1234, or a hex hash */
  tag: string;
  kind: VersionKind;
  /** What the user typed (for hash builds, the full commit when known) */
  raw: string;
  /** Present for tagged and stable versions */
  semver: SemVer | null;
};

/**
 * A release as the GitHub API returns it
 * Extra fields are kept so bob.json is the exact upstream document
 */
export type UpstreamRelease = {
  tag_name: string;
  target_commitish?: string | null;
  published_at: string;
  [key: string]: unknown;
};

export const NIGHTLY_ROLLBACK_PATTERN = /^nightly-[0-9a-f]{7}$/;
export const HASH_PATTERN = /^[0-9a-f]{5,40}$/;
export const VERSION_PATTERN = /^v?[0-9]+(\.[0-9]+){0,2}/;

/**
 * Get the directory name of a version under the downloads root
 * @param resolved - The resolved version
 *
 * @returns The first 7 chars of the hash for hash builds, the tag otherwise
 */
export const installName = (resolved: ResolvedVersion): string => {
  return resolved.kind === "hash" ? resolved.raw.slice(0, 7) : resolved.tag;
};

/**
 * @param value - Version string or used-file payload
 *
 * @returns True if the value is a commit hash
 */
export const isHash = (value: string): boolean => HASH_PATTERN.test(value);

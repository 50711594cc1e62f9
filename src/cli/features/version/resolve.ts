/**
 * Turns a user version string into a ResolvedVersion
 */

import semver from "semver";

import { UserInputError } from "@/cli/errors.js";
import {
  HASH_PATTERN,
  NIGHTLY_ROLLBACK_PATTERN,
  VERSION_PATTERN,
} from "@/cli/features/version/types.js";
import { info } from "@/cli/logger.js";

import type { GitHubClient } from "@/cli/features/github/client.js";
import type { ResolvedVersion } from "@/cli/features/version/types.js";

export const INVALID_VERSION_MESSAGE =
  "Please provide a proper version string. Valid options are stable, latest, nightly, head, [v]x.x.x or a commit hash";

const stripV = (tag: string): string => tag.replace(/^v/, "");

/**
 * Resolve a version string
 * @param args - Resolver arguments
 * @param args.input - What the user typed
 * @param args.client - GitHub client for stable and head lookups
 *
 * @returns The resolved version
 */
export const resolveVersion = async (args: {
  input: string;
  client: GitHubClient;
}): Promise<ResolvedVersion> => {
  const { input, client } = args;

  switch (input) {
    case "nightly":
      return { tag: "nightly", kind: "nightly", raw: input, semver: null };
    case "stable":
    case "latest": {
      info({ message: "Fetching latest version" });
      const release = await client.getUpstreamStable();
      return {
        tag: release.tag_name,
        kind: "stable",
        raw: input,
        semver: semver.parse(stripV(release.tag_name)),
      };
    }
    case "head":
    case "HEAD":
    case "git": {
      info({ message: "Fetching latest commit" });
      const sha = await client.getLatestCommit();
      return { tag: sha, kind: "hash", raw: sha, semver: null };
    }
  }

  if (VERSION_PATTERN.test(input)) {
    const parsed = semver.parse(stripV(input));
    if (parsed != null) {
      return {
        tag: input.startsWith("v") ? input : `v${input}`,
        kind: "tagged",
        raw: input,
        semver: parsed,
      };
    }
  }

  if (HASH_PATTERN.test(input)) {
    return { tag: input, kind: "hash", raw: input, semver: null };
  }

  if (NIGHTLY_ROLLBACK_PATTERN.test(input)) {
    return { tag: input, kind: "nightly-rollback", raw: input, semver: null };
  }

  throw new UserInputError(INVALID_VERSION_MESSAGE);
};

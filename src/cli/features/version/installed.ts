/**
 * Installed versions under the downloads root
 */

import * as fs from "fs/promises";
import * as path from "path";

import {
  HASH_PATTERN,
  NIGHTLY_ROLLBACK_PATTERN,
} from "@/cli/features/version/types.js";

export type InstalledVersion = {
  name: string;
  path: string;
};

const TAG_DIR_PATTERN = /^v[0-9]+\.[0-9]+\.[0-9]+/;

/**
 * @param name - Directory name under the downloads root
 *
 * @returns True if the directory holds an editor install
 */
export const isVersionDirName = (name: string): boolean => {
  return (
    name === "nightly" ||
    TAG_DIR_PATTERN.test(name) ||
    NIGHTLY_ROLLBACK_PATTERN.test(name) ||
    HASH_PATTERN.test(name)
  );
};

/**
 * List installed versions
 * @param args - Arguments
 * @param args.root - Downloads root
 *
 * @returns Installs sorted by name
 */
export const listInstalledVersions = async (args: {
  root: string;
}): Promise<Array<InstalledVersion>> => {
  const { root } = args;
  const entries = await fs.readdir(root, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isDirectory() && isVersionDirName(entry.name))
    .map((entry) => ({ name: entry.name, path: path.join(root, entry.name) }))
    .sort((a, b) => a.name.localeCompare(b.name));
};

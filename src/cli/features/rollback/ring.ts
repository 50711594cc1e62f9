/**
 * Nightly rollback ring
 *
 * Past nightlies are kept as nightly-<7hex> copies of nightly/, keyed by the
 * commit they were built from, and evicted oldest-first past rollback_limit.
 */

import * as fs from "fs/promises";
import * as path from "path";

import Ajv from "ajv";

import { BobError, isErrnoException } from "@/cli/errors.js";
import { NIGHTLY_ROLLBACK_PATTERN } from "@/cli/features/version/types.js";
import { info } from "@/cli/logger.js";

import type { UpstreamRelease } from "@/cli/features/version/types.js";

export const NIGHTLY_DIR = "nightly";
export const NIGHTLY_INFO_FILE = "bob.json";

export type RollbackEntry = {
  /** Directory name, e.g. nightly-abc1234 */
  name: string;
  path: string;
  release: UpstreamRelease;
};

const ajv = new Ajv();
const validateRelease = ajv.compile<UpstreamRelease>({
  type: "object",
  properties: {
    tag_name: { type: "string" },
    target_commitish: { type: ["string", "null"] },
    published_at: { type: "string" },
  },
  required: ["tag_name", "published_at"],
});

/**
 * Read a nightly's bob.json
 * @param args - Read arguments
 * @param args.dir - Install directory
 *
 * @returns The stored release, or null when the file is missing
 */
export const readNightlyInfo = async (args: {
  dir: string;
}): Promise<UpstreamRelease | null> => {
  const file = path.join(args.dir, NIGHTLY_INFO_FILE);

  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new BobError({ kind: "filesystem", message: `${file} is corrupted` });
  }
  if (!validateRelease(parsed)) {
    throw new BobError({ kind: "filesystem", message: `${file} is corrupted` });
  }
  return parsed;
};

/**
 * Write a nightly's bob.json verbatim
 * @param args - Write arguments
 * @param args.dir - Install directory
 * @param args.release - Upstream release document
 */
export const writeNightlyInfo = async (args: {
  dir: string;
  release: UpstreamRelease;
}): Promise<void> => {
  const { dir, release } = args;
  await fs.writeFile(path.join(dir, NIGHTLY_INFO_FILE), JSON.stringify(release));
};

const publishedTime = (release: UpstreamRelease): number => {
  const time = Date.parse(release.published_at);
  return Number.isNaN(time) ? 0 : time;
};

/**
 * List rollback snapshots
 * @param args - List arguments
 * @param args.root - Downloads root
 *
 * @returns Snapshots, newest first
 */
export const listRollbacks = async (args: {
  root: string;
}): Promise<Array<RollbackEntry>> => {
  const { root } = args;
  const entries = await fs.readdir(root, { withFileTypes: true });

  const rollbacks: Array<RollbackEntry> = [];
  for (const entry of entries) {
    if (!entry.isDirectory() || !NIGHTLY_ROLLBACK_PATTERN.test(entry.name)) {
      continue;
    }
    const dir = path.join(root, entry.name);
    const release = await readNightlyInfo({ dir });
    if (release == null) {
      continue;
    }
    rollbacks.push({ name: entry.name, path: dir, release });
  }

  return rollbacks.sort(
    (a, b) => publishedTime(b.release) - publishedTime(a.release),
  );
};

/**
 * Copy the current nightly into the ring
 * @param args - Snapshot arguments
 * @param args.root - Downloads root
 * @param args.limit - Maximum number of snapshots (0 disables the ring)
 *
 * @returns The snapshot name, or null when nothing was snapshotted
 */
export const snapshotNightly = async (args: {
  root: string;
  limit: number;
}): Promise<string | null> => {
  const { root, limit } = args;
  if (limit <= 0) {
    return null;
  }

  const nightlyDir = path.join(root, NIGHTLY_DIR);
  const release = await readNightlyInfo({ dir: nightlyDir });
  const commitish = release?.target_commitish;
  if (release == null || commitish == null || commitish.length < 7) {
    return null;
  }

  const id = commitish.slice(0, 7);
  const name = `${NIGHTLY_DIR}-${id}`;
  const snapshotDir = path.join(root, name);

  await fs.rm(snapshotDir, { recursive: true, force: true });

  const existing = await listRollbacks({ root });
  while (existing.length >= limit) {
    const oldest = existing.pop();
    if (oldest == null) {
      break;
    }
    info({ message: `Removing oldest rollback: ${oldest.name}` });
    await fs.rm(oldest.path, { recursive: true, force: true });
  }

  info({ message: `Creating rollback: ${name}` });
  await fs.cp(nightlyDir, snapshotDir, { recursive: true });
  await writeNightlyInfo({
    dir: snapshotDir,
    release: { ...release, tag_name: `${release.tag_name}-${id}` },
  });

  return name;
};

/**
 * The `used` file: which version the shim launches
 */

import * as fs from "fs/promises";
import * as path from "path";

import { UserInputError, isErrnoException } from "@/cli/errors.js";
import { isHash } from "@/cli/features/version/types.js";
import { pathExists } from "@/utils/path.js";

import type { ResolvedVersion } from "@/cli/features/version/types.js";

export const ACTIVE_POINTER_FILE = "used";

/**
 * Read the active pointer
 * @param args - Pointer arguments
 * @param args.root - Downloads root
 *
 * @returns The trimmed payload, or null when no version is active
 */
export const readActivePointer = async (args: {
  root: string;
}): Promise<string | null> => {
  const { root } = args;
  try {
    const content = await fs.readFile(path.join(root, ACTIVE_POINTER_FILE), "utf-8");
    const payload = content.trim();
    return payload === "" ? null : payload;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
};

/**
 * Atomically replace the active pointer
 * @param args - Pointer arguments
 * @param args.root - Downloads root
 * @param args.payload - New payload
 */
export const writeActivePointer = async (args: {
  root: string;
  payload: string;
}): Promise<void> => {
  const { root, payload } = args;
  const target = path.join(root, ACTIVE_POINTER_FILE);
  const temp = `${target}.tmp`;
  await fs.writeFile(temp, payload);
  await fs.rename(temp, target);
};

/**
 * Compute what the `used` file holds for a version
 * Short hashes are expanded from the install's full-hash.txt
 * @param args - Payload arguments
 * @param args.resolved - The version
 * @param args.root - Downloads root
 *
 * @returns The payload string
 */
export const resolvePayload = async (args: {
  resolved: ResolvedVersion;
  root: string;
}): Promise<string> => {
  const { resolved, root } = args;

  switch (resolved.kind) {
    case "hash": {
      if (resolved.raw.length > 7) {
        return resolved.raw;
      }
      const hashFile = path.join(root, resolved.raw, "full-hash.txt");
      try {
        return (await fs.readFile(hashFile, "utf-8")).trim();
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") {
          throw new UserInputError(
            `Could not find ${hashFile}, reinstall ${resolved.raw} to restore it`,
          );
        }
        throw err;
      }
    }
    case "tagged":
    case "stable":
    case "nightly":
    case "nightly-rollback":
      return resolved.tag;
  }
};

/**
 * @param args - Check arguments
 * @param args.resolved - The version
 * @param args.root - Downloads root
 *
 * @returns True if the version is the active one
 */
export const isVersionActive = async (args: {
  resolved: ResolvedVersion;
  root: string;
}): Promise<boolean> => {
  const { resolved, root } = args;
  const active = await readActivePointer({ root });
  if (active == null) {
    return false;
  }

  if (
    resolved.kind === "hash" &&
    resolved.raw.length <= 7 &&
    !(await pathExists(path.join(root, resolved.raw, "full-hash.txt")))
  ) {
    return false;
  }

  return active === (await resolvePayload({ resolved, root }));
};

/**
 * @param payload - A `used` payload
 *
 * @returns The directory name of the payload under the downloads root
 */
export const payloadDirName = (payload: string): string => {
  return isHash(payload) ? payload.slice(0, 7) : payload;
};

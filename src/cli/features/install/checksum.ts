/**
 * SHA-256 verification of downloaded archives
 */

import { createHash } from "crypto";
import { createReadStream } from "fs";
import * as fs from "fs/promises";

import { ChecksumMismatchError } from "@/cli/errors.js";

/**
 * Find the expected hash for a file in a sha256sum-style listing
 * @param args - Parse arguments
 * @param args.content - Checksum file content, `<hash>  <filename>` per line
 * @param args.fileName - File to look up
 *
 * @returns Lower-case hex digest, or null when the file is not listed
 */
export const findExpectedChecksum = (args: {
  content: string;
  fileName: string;
}): string | null => {
  const { content, fileName } = args;

  for (const line of content.split(/\r?\n/)) {
    const match = /^([0-9a-fA-F]{64})\s+\*?(.+)$/.exec(line.trim());
    if (match == null) {
      continue;
    }
    const listed = match[2].trim().replace(/^\.\//, "");
    if (listed === fileName) {
      return match[1].toLowerCase();
    }
  }

  return null;
};

/**
 * Hash a file without loading it into memory
 * @param filePath - File to hash
 *
 * @returns Lower-case hex SHA-256 digest
 */
export const sha256File = async (filePath: string): Promise<string> => {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    if (Buffer.isBuffer(chunk)) {
      hash.update(chunk);
    }
  }
  return hash.digest("hex");
};

/**
 * Compare an archive against its checksum file
 * On mismatch both files are deleted; otherwise only the checksum file
 * @param args - Verify arguments
 * @param args.archivePath - Downloaded archive
 * @param args.checksumPath - Downloaded checksum file
 * @param args.fileName - Name the archive is listed under
 */
export const verifyChecksum = async (args: {
  archivePath: string;
  checksumPath: string;
  fileName: string;
}): Promise<void> => {
  const { archivePath, checksumPath, fileName } = args;

  let expected: string;
  let actual: string;
  try {
    const content = await fs.readFile(checksumPath, "utf-8");
    expected = findExpectedChecksum({ content, fileName }) ?? "(not listed)";
    actual = await sha256File(archivePath);
  } catch (err) {
    await fs.rm(checksumPath, { force: true });
    throw err;
  }

  if (actual !== expected) {
    await fs.rm(archivePath, { force: true });
    await fs.rm(checksumPath, { force: true });
    throw new ChecksumMismatchError({ file: fileName, expected, actual });
  }

  await fs.rm(checksumPath, { force: true });
};

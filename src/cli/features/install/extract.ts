/**
 * Archive extraction and install layout normalization
 *
 * Whatever directory an archive unpacks to (nvim-macos, nvim-osx64,
 * squashfs-root/usr, ...), the result is always <root>/<name>/bin/nvim.
 */

import * as fs from "fs/promises";
import * as path from "path";

import AdmZip from "adm-zip";
import { x as extractTar } from "tar";

import { BobError } from "@/cli/errors.js";
import { runChecked } from "@/cli/features/install/processes.js";
import { editorBinaryName } from "@/cli/features/platform/platform.js";
import { debug } from "@/cli/logger.js";
import { pathExists } from "@/utils/path.js";

import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type { ArchiveFormat, HostPlatform } from "@/cli/features/platform/platform.js";

export const EDITOR_BINARY_MODE = 0o551;

const unzip = async (args: { archivePath: string; destination: string }): Promise<void> => {
  const { archivePath, destination } = args;
  const zip = new AdmZip(archivePath);
  await new Promise<void>((resolve, reject) => {
    zip.extractAllToAsync(destination, true, false, (err) => {
      if (err != null) {
        reject(err);
        return;
      }
      resolve();
    });
  });
};

const extractAppImage = async (args: {
  archivePath: string;
  destination: string;
  runner: ProcessRunner;
}): Promise<void> => {
  const { archivePath, destination, runner } = args;
  await fs.chmod(archivePath, 0o755);
  await runChecked({
    runner,
    options: {
      command: path.resolve(archivePath),
      args: ["--appimage-extract"],
      cwd: destination,
      capture: true,
    },
  });
};

/**
 * Find the directory that contains bin/<editor>
 * Looks at the staging dir, each of its children, and each child's usr/
 * @param args - Probe arguments
 * @param args.staging - Extraction directory
 * @param args.binary - Editor binary name
 *
 * @returns The install directory, or null when the archive holds no editor
 */
export const findInstallDir = async (args: {
  staging: string;
  binary: string;
}): Promise<string | null> => {
  const { staging, binary } = args;

  const candidates = [staging];
  const entries = await fs.readdir(staging, { withFileTypes: true });
  const children = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  for (const child of children) {
    candidates.push(path.join(staging, child));
    candidates.push(path.join(staging, child, "usr"));
  }

  for (const candidate of candidates) {
    if (await pathExists(path.join(candidate, "bin", binary))) {
      return candidate;
    }
  }

  return null;
};

/**
 * Extract an archive into <root>/<name>
 * The archive and the staging directory are removed whether or not this succeeds
 * @param args - Extract arguments
 * @param args.archivePath - Downloaded archive
 * @param args.format - Archive format
 * @param args.root - Downloads root
 * @param args.name - Install directory name
 * @param args.platform - Target platform
 * @param args.runner - Process runner (for AppImages)
 *
 * @returns Path of the install directory
 */
export const extractArchive = async (args: {
  archivePath: string;
  format: ArchiveFormat;
  root: string;
  name: string;
  platform: HostPlatform;
  runner: ProcessRunner;
}): Promise<string> => {
  const { archivePath, format, root, name, platform, runner } = args;
  const staging = path.join(root, `.${name}-extract`);
  const target = path.join(root, name);
  const binary = editorBinaryName(platform);

  await fs.rm(staging, { recursive: true, force: true });
  await fs.mkdir(staging, { recursive: true });

  try {
    debug({ message: `Extracting ${archivePath} into ${staging}` });
    switch (format) {
      case "tar.gz":
        await extractTar({ file: archivePath, cwd: staging });
        break;
      case "zip":
        await unzip({ archivePath, destination: staging });
        break;
      case "appimage":
        await extractAppImage({ archivePath, destination: staging, runner });
        break;
    }

    const installDir = await findInstallDir({ staging, binary });
    if (installDir == null) {
      throw new BobError({
        kind: "filesystem",
        message: `Could not find bin/${binary} in ${path.basename(archivePath)}`,
      });
    }

    await fs.rm(target, { recursive: true, force: true });
    await fs.rename(installDir, target);

    if (platform.os !== "windows") {
      await fs.chmod(path.join(target, "bin", binary), EDITOR_BINARY_MODE);
    }

    return target;
  } finally {
    await fs.rm(staging, { recursive: true, force: true });
    await fs.rm(archivePath, { force: true });
  }
};

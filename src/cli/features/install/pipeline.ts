/**
 * Install pipeline
 *
 * Resolved version in, LocalInstall out: download + verify + extract for
 * releases, build from source for commits, with nightly bookkeeping.
 */

import * as fs from "fs/promises";
import * as path from "path";

import semver from "semver";

import { NetworkError, UserInputError } from "@/cli/errors.js";
import { buildFromSource } from "@/cli/features/install/build.js";
import { verifyChecksum } from "@/cli/features/install/checksum.js";
import { extractArchive } from "@/cli/features/install/extract.js";
import {
  assetFileName,
  getAppImageAsset,
  getReleaseAsset,
} from "@/cli/features/platform/platform.js";
import {
  NIGHTLY_DIR,
  readNightlyInfo,
  snapshotNightly,
  writeNightlyInfo,
} from "@/cli/features/rollback/ring.js";
import { readActivePointer } from "@/cli/features/version/active.js";
import { installName } from "@/cli/features/version/types.js";
import { blue, info, raw, warn } from "@/cli/logger.js";
import { getDownloadsDir, pathExists } from "@/utils/path.js";

import type { Config } from "@/cli/config.js";
import type { GitHubClient } from "@/cli/features/github/client.js";
import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type {
  HostPlatform,
  ReleaseAsset,
} from "@/cli/features/platform/platform.js";
import type {
  ResolvedVersion,
  UpstreamRelease,
} from "@/cli/features/version/types.js";

export const DEFAULT_MIRROR = "https://github.com";
export const MINIMUM_UNSUPPORTED_VERSION = "0.2.2";

export type InstallResult =
  | { type: "installed"; path: string }
  | { type: "already-installed" }
  | { type: "nightly-up-to-date" }
  | { type: "given-nightly-rollback" };

/**
 * Everything the pipeline talks to besides the filesystem
 */
export type InstallContext = {
  config: Config;
  client: GitHubClient;
  platform: HostPlatform;
  runner: ProcessRunner;
  env: NodeJS.ProcessEnv;
};

type DownloadedArchive = {
  archivePath: string;
  asset: ReleaseAsset;
  baseUrl: string;
};

/**
 * @param args - Arguments
 * @param args.config - Loaded config
 * @param args.tag - Release tag
 *
 * @returns Base URL of a release's assets
 */
export const releaseBaseUrl = (args: { config: Config; tag: string }): string => {
  const { config, tag } = args;
  const mirror = (config.githubMirror ?? DEFAULT_MIRROR).replace(/\/+$/, "");
  return `${mirror}/neovim/neovim/releases/download/${tag}`;
};

const downloadRelease = async (args: {
  resolved: ResolvedVersion;
  root: string;
  context: InstallContext;
}): Promise<DownloadedArchive> => {
  const { resolved, root, context } = args;
  const { client, config, platform } = context;
  const baseUrl = releaseBaseUrl({ config, tag: resolved.tag });

  const candidates = [
    getReleaseAsset({ platform, version: resolved.semver }),
    getAppImageAsset({ platform, version: resolved.semver }),
  ];

  for (const asset of candidates) {
    if (asset == null) {
      continue;
    }
    const url = `${baseUrl}/${assetFileName(asset)}`;
    info({ message: `Downloading ${url}` });

    const result = await client.download({ url });
    if (result.type === "not-found") {
      continue;
    }

    const archivePath = path.join(root, `${resolved.tag}.${asset.format}`);
    await fs.writeFile(archivePath, result.data);
    return { archivePath, asset, baseUrl };
  }

  throw new NetworkError(
    `Please provide an existing neovim version, ${resolved.tag} has no release for this platform`,
  );
};

/**
 * Releases after 0.10.4 (and nightly) publish one shasum.txt; older ones a
 * per-asset .sha256sum; 0.4.4 and earlier nothing
 * @param args - Arguments
 * @param args.resolved - The version being installed
 * @param args.asset - The downloaded asset
 *
 * @returns The checksum file to download, or null when the release has none
 */
export const checksumFileName = (args: {
  resolved: ResolvedVersion;
  asset: ReleaseAsset;
}): string | null => {
  const { resolved, asset } = args;
  const version = resolved.semver;

  if (resolved.kind === "nightly") {
    return "shasum.txt";
  }
  if (version == null || semver.lte(version, "0.4.4")) {
    return null;
  }
  return semver.gt(version, "0.10.4")
    ? "shasum.txt"
    : `${assetFileName(asset)}.sha256sum`;
};

const verifyDownload = async (args: {
  resolved: ResolvedVersion;
  root: string;
  download: DownloadedArchive;
  client: GitHubClient;
}): Promise<void> => {
  const { resolved, root, download, client } = args;
  const checksumName = checksumFileName({ resolved, asset: download.asset });
  if (checksumName == null) {
    return;
  }

  const result = await client.download({
    url: `${download.baseUrl}/${checksumName}`,
  });
  if (result.type === "not-found") {
    warn({
      message: `No checksum file found for ${resolved.tag}, skipping verification`,
    });
    return;
  }

  const checksumPath = path.join(root, `${resolved.tag}-${checksumName}`);
  await fs.writeFile(checksumPath, result.data);

  info({ message: "Verifying checksum" });
  await verifyChecksum({
    archivePath: download.archivePath,
    checksumPath,
    fileName: assetFileName(download.asset),
  });
};

/**
 * Print the commits that landed between two nightlies
 * @param args - Arguments
 * @param args.client - GitHub client
 * @param args.local - Installed nightly
 * @param args.upstream - New nightly
 */
export const printNightlyCommits = async (args: {
  client: GitHubClient;
  local: UpstreamRelease;
  upstream: UpstreamRelease;
}): Promise<void> => {
  const { client, local, upstream } = args;
  const commits = await client.getCommitsBetween({
    since: local.published_at,
    until: upstream.published_at,
  });

  for (const { commit } of commits) {
    raw({
      message: `| ${blue({ text: commit.author.name })} ${commit.message.replace(/\n/g, "\n| ")}`,
    });
  }
};

const installFromRelease = async (args: {
  resolved: ResolvedVersion;
  root: string;
  context: InstallContext;
}): Promise<string> => {
  const { resolved, root, context } = args;
  const download = await downloadRelease({ resolved, root, context });

  try {
    await verifyDownload({ resolved, root, download, client: context.client });
  } catch (err) {
    await fs.rm(download.archivePath, { force: true });
    throw err;
  }

  return extractArchive({
    archivePath: download.archivePath,
    format: download.asset.format,
    root,
    name: installName(resolved),
    platform: context.platform,
    runner: context.runner,
  });
};

const installFromSource = async (args: {
  resolved: ResolvedVersion;
  root: string;
  context: InstallContext;
  wasInstalled: boolean;
}): Promise<string> => {
  const { resolved, root, context, wasInstalled } = args;
  const { config, platform, runner, env } = context;
  const name = installName(resolved);
  const isNightly = resolved.kind === "nightly";

  try {
    await buildFromSource({
      root,
      ref: isNightly ? "HEAD" : resolved.raw,
      name,
      buildType: config.enableReleaseBuild ? "Release" : "RelWithDebInfo",
      writeFullHash: !isNightly,
      platform,
      runner,
      env,
    });
  } catch (err) {
    if (!wasInstalled) {
      await fs.rm(path.join(root, name), { recursive: true, force: true });
    }
    throw err;
  }

  return path.join(root, name);
};

/**
 * Produce <root>/<installName> by downloading or building
 * @param args - Arguments
 * @param args.resolved - Version to install
 * @param args.root - Downloads root
 * @param args.context - Collaborators
 * @param args.wasInstalled - Whether the install directory already existed
 *
 * @returns Path of the install directory
 */
const acquire = async (args: {
  resolved: ResolvedVersion;
  root: string;
  context: InstallContext;
  wasInstalled: boolean;
}): Promise<string> => {
  const { resolved, context } = args;

  switch (resolved.kind) {
    case "tagged":
    case "stable":
      return installFromRelease(args);
    case "nightly":
      return context.config.enableReleaseBuild
        ? installFromSource(args)
        : installFromRelease(args);
    case "hash":
      return installFromSource(args);
    case "nightly-rollback":
      throw new UserInputError(
        `${resolved.tag} is a rollback snapshot and cannot be installed`,
      );
  }
};

/**
 * Install a version into the downloads root
 * @param args - Install arguments
 * @param args.resolved - Version to install
 * @param args.context - Collaborators
 *
 * @returns What happened
 */
export const installVersion = async (args: {
  resolved: ResolvedVersion;
  context: InstallContext;
}): Promise<InstallResult> => {
  const { resolved, context } = args;
  const { config, client, env } = context;

  if (resolved.kind === "nightly-rollback") {
    return { type: "given-nightly-rollback" };
  }

  if (
    resolved.semver != null &&
    semver.lte(resolved.semver, MINIMUM_UNSUPPORTED_VERSION)
  ) {
    throw new UserInputError(
      `Versions ${MINIMUM_UNSUPPORTED_VERSION} and below are not supported`,
    );
  }

  const root = await getDownloadsDir({ config, env });
  const name = installName(resolved);
  const isInstalled = await pathExists(path.join(root, name));

  if (isInstalled && resolved.kind !== "nightly") {
    return { type: "already-installed" };
  }

  let upstreamNightly: UpstreamRelease | null = null;
  if (resolved.kind === "nightly") {
    upstreamNightly = await client.getUpstreamNightly();

    if (isInstalled) {
      info({ message: "Looking for nightly updates" });
      const local = await readNightlyInfo({ dir: path.join(root, NIGHTLY_DIR) });

      if (local != null && local.published_at === upstreamNightly.published_at) {
        return { type: "nightly-up-to-date" };
      }

      if ((await readActivePointer({ root })) === NIGHTLY_DIR) {
        await snapshotNightly({ root, limit: config.rollbackLimit });
      }

      if (config.enableNightlyInfo && local != null) {
        await printNightlyCommits({ client, local, upstream: upstreamNightly });
      }
    }
  }

  const installPath = await acquire({
    resolved,
    root,
    context,
    wasInstalled: isInstalled,
  });

  if (upstreamNightly != null) {
    await writeNightlyInfo({ dir: installPath, release: upstreamNightly });
  }

  return { type: "installed", path: installPath };
};

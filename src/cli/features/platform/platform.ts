/**
 * Host platform detection and release asset naming
 */

import semver from "semver";

import type { SemVer } from "semver";

export type HostOs = "windows" | "macos" | "linux";
export type HostArch = "x86_64" | "arm64";

export type HostPlatform = {
  os: HostOs;
  arch: HostArch;
};

export type ArchiveFormat = "zip" | "tar.gz" | "appimage";

/**
 * A downloadable release asset
 */
export type ReleaseAsset = {
  /** Asset name without extension, e.g. nvim-linux-x86_64 */
  name: string;
  format: ArchiveFormat;
};

/**
 * @returns The platform bob is running on
 */
export const detectPlatform = (): HostPlatform => {
  const os: HostOs =
    process.platform === "win32"
      ? "windows"
      : process.platform === "darwin"
        ? "macos"
        : "linux";
  const arch: HostArch = process.arch === "arm64" ? "arm64" : "x86_64";
  return { os, arch };
};

/**
 * @param platform - Target platform
 *
 * @returns nvim.exe on Windows, nvim elsewhere
 */
export const editorBinaryName = (platform: HostPlatform): string => {
  return platform.os === "windows" ? "nvim.exe" : "nvim";
};

const isAtMost = (version: SemVer | null, limit: string): boolean => {
  return version != null && semver.lte(version, limit);
};

/**
 * Get the platform part of a release asset's name
 * Versions without semver (nightly) use the newest naming scheme
 * @param args - Naming arguments
 * @param args.platform - Target platform
 * @param args.version - Parsed version, null for nightly
 *
 * @returns e.g. nvim-win64, nvim-macos-arm64, nvim-linux64
 */
export const getPlatformName = (args: {
  platform: HostPlatform;
  version: SemVer | null;
}): string => {
  const { platform, version } = args;

  switch (platform.os) {
    case "windows":
      return "nvim-win64";
    case "macos":
      if (isAtMost(version, "0.9.5")) {
        return "nvim-macos";
      }
      return platform.arch === "arm64" ? "nvim-macos-arm64" : "nvim-macos-x86_64";
    case "linux":
      if (isAtMost(version, "0.10.3")) {
        return "nvim-linux64";
      }
      return platform.arch === "arm64" ? "nvim-linux-arm64" : "nvim-linux-x86_64";
  }
};

/**
 * @param args - Naming arguments
 * @param args.platform - Target platform
 * @param args.version - Parsed version, null for nightly
 *
 * @returns The primary archive to download
 */
export const getReleaseAsset = (args: {
  platform: HostPlatform;
  version: SemVer | null;
}): ReleaseAsset => {
  const { platform } = args;
  return {
    name: getPlatformName(args),
    format: platform.os === "windows" ? "zip" : "tar.gz",
  };
};

/**
 * Older Linux releases only shipped an AppImage
 * @param args - Naming arguments
 * @param args.platform - Target platform
 * @param args.version - Parsed version, null for nightly
 *
 * @returns The AppImage asset, or null off Linux
 */
export const getAppImageAsset = (args: {
  platform: HostPlatform;
  version: SemVer | null;
}): ReleaseAsset | null => {
  const { platform, version } = args;
  if (platform.os !== "linux") {
    return null;
  }
  return {
    name: isAtMost(version, "0.10.3") ? "nvim" : getPlatformName(args),
    format: "appimage",
  };
};

/**
 * @param asset - Release asset
 *
 * @returns File name of the asset, e.g. nvim-win64.zip
 */
export const assetFileName = (asset: ReleaseAsset): string => {
  return `${asset.name}.${asset.format}`;
};

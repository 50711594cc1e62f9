/**
 * Path utility functions for bob's configurable directories
 *
 * Nothing here is cached: every directory is a function of config and
 * environment so callers (and tests) can point bob at another root.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { UserInputError } from "@/cli/errors.js";

import type { Config } from "@/cli/config.js";

/**
 * @param args - Configuration arguments
 * @param args.env - Environment to read HOME/USERPROFILE from
 *
 * @returns The user's home directory
 */
export const getHomeDir = (args: { env: NodeJS.ProcessEnv }): string => {
  const { env } = args;
  const home = process.platform === "win32" ? env.USERPROFILE : env.HOME;
  return home != null && home !== "" ? home : os.homedir();
};

/**
 * Expand a leading tilde and resolve relative paths against cwd
 * @param args - Configuration arguments
 * @param args.target - Path as the user wrote it
 * @param args.env - Environment used for the home directory
 *
 * @returns Absolute, normalized path
 */
export const normalizePath = (args: {
  target: string;
  env: NodeJS.ProcessEnv;
}): string => {
  const { target, env } = args;
  let normalizedPath = target;

  if (normalizedPath === "~") {
    normalizedPath = getHomeDir({ env });
  } else if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(getHomeDir({ env }), normalizedPath.slice(2));
  }

  return path.resolve(normalizedPath);
};

/**
 * Get the per-user configuration directory
 * @param args - Configuration arguments
 * @param args.env - Environment
 *
 * @returns %APPDATA%, ~/Library/Application Support, or $XDG_CONFIG_HOME / ~/.config
 */
export const getConfigDir = (args: { env: NodeJS.ProcessEnv }): string => {
  const { env } = args;
  const home = getHomeDir({ env });

  switch (process.platform) {
    case "win32":
      return env.APPDATA ?? path.join(home, "AppData", "Roaming");
    case "darwin":
      return path.join(home, "Library", "Application Support");
    default:
      return env.XDG_CONFIG_HOME != null && env.XDG_CONFIG_HOME !== ""
        ? env.XDG_CONFIG_HOME
        : path.join(home, ".config");
  }
};

/**
 * Get the per-user data directory
 * @param args - Configuration arguments
 * @param args.env - Environment
 *
 * @returns %LOCALAPPDATA%, or $XDG_DATA_HOME / ~/.local/share
 */
export const getDataDir = (args: { env: NodeJS.ProcessEnv }): string => {
  const { env } = args;
  const home = getHomeDir({ env });

  if (process.platform === "win32") {
    return env.LOCALAPPDATA ?? path.join(home, "AppData", "Local");
  }

  return env.XDG_DATA_HOME != null && env.XDG_DATA_HOME !== ""
    ? env.XDG_DATA_HOME
    : path.join(home, ".local", "share");
};

/**
 * Get the downloads root that holds every install
 * A configured location must already exist; the default one is created
 * @param args - Configuration arguments
 * @param args.config - Loaded config
 * @param args.env - Environment (defaults to process.env)
 *
 * @returns Absolute path to the downloads root
 */
export const getDownloadsDir = async (args: {
  config: Config;
  env?: NodeJS.ProcessEnv | null;
}): Promise<string> => {
  const { config } = args;
  const env = args.env ?? process.env;

  if (config.downloadsLocation != null) {
    const custom = normalizePath({ target: config.downloadsLocation, env });
    try {
      await fs.access(custom);
    } catch {
      throw new UserInputError(`Custom directory ${custom} doesn't exist!`);
    }
    return custom;
  }

  const root = path.join(getDataDir({ env }), "bob");
  await fs.mkdir(root, { recursive: true });
  return root;
};

/**
 * Get the directory the shim lives in
 * @param args - Configuration arguments
 * @param args.config - Loaded config
 * @param args.env - Environment (defaults to process.env)
 *
 * @returns installation_location, or <downloads root>/nvim-bin
 */
export const getInstallationDir = async (args: {
  config: Config;
  env?: NodeJS.ProcessEnv | null;
}): Promise<string> => {
  const { config } = args;
  const env = args.env ?? process.env;

  if (config.installationLocation != null) {
    return normalizePath({ target: config.installationLocation, env });
  }

  const root = await getDownloadsDir({ config, env });
  return path.join(root, "nvim-bin");
};

/**
 * @param target - Path to check
 *
 * @returns True if something exists at the path
 */
export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

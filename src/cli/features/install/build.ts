/**
 * Build neovim from source into the downloads root
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ToolchainError, UserInputError } from "@/cli/errors.js";
import {
  commandExists,
  runChecked,
} from "@/cli/features/install/processes.js";
import { info } from "@/cli/logger.js";
import { pathExists } from "@/utils/path.js";

import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type { HostPlatform } from "@/cli/features/platform/platform.js";

export const UPSTREAM_GIT_URL = "https://github.com/neovim/neovim.git";
export const BUILD_WORKSPACE = "neovim-git";
export const FULL_HASH_FILE = "full-hash.txt";

export type BuildType = "Release" | "RelWithDebInfo";

/**
 * Fail before any work when a required tool is missing
 * @param args - Probe arguments
 * @param args.runner - Process runner
 * @param args.platform - Target platform
 * @param args.env - Environment (for the MSVC developer shell check)
 */
export const checkToolchain = async (args: {
  runner: ProcessRunner;
  platform: HostPlatform;
  env: NodeJS.ProcessEnv;
}): Promise<void> => {
  const { runner, platform, env } = args;

  if (!(await commandExists({ runner, command: "git" }))) {
    throw new ToolchainError("git is not installed, it is required to build neovim");
  }
  if (!(await commandExists({ runner, command: "cmake" }))) {
    throw new ToolchainError("cmake is not installed, it is required to build neovim");
  }

  if (platform.os === "windows") {
    if (env.VisualStudioVersion == null) {
      throw new ToolchainError(
        "Please run this command from a Visual Studio developer shell to build neovim",
      );
    }
    return;
  }

  const hasCompiler =
    (await commandExists({ runner, command: "gcc" })) ||
    (await commandExists({ runner, command: "clang" }));
  if (!hasCompiler) {
    throw new ToolchainError(
      "Neither gcc nor clang is installed, a C compiler is required to build neovim",
    );
  }
};

const prepareWorkspace = async (args: {
  runner: ProcessRunner;
  workspace: string;
  ref: string;
}): Promise<string> => {
  const { runner, workspace, ref } = args;
  const git = (gitArgs: Array<string>, capture?: boolean) =>
    runChecked({
      runner,
      options: { command: "git", args: gitArgs, cwd: workspace, capture },
    });

  await fs.mkdir(workspace, { recursive: true });

  if (!(await pathExists(path.join(workspace, ".git")))) {
    await git(["init"], true);
  }

  const remotes = await git(["remote"], true);
  if (remotes.split(/\r?\n/).includes("origin")) {
    await git(["remote", "set-url", "origin", UPSTREAM_GIT_URL], true);
  } else {
    await git(["remote", "add", "origin", UPSTREAM_GIT_URL], true);
  }

  info({ message: `Fetching ${ref} from ${UPSTREAM_GIT_URL}` });
  try {
    await git(["fetch", "--depth=1", "origin", ref]);
  } catch {
    throw new UserInputError(
      `Failed to fetch ${ref}, try providing the full commit hash`,
    );
  }

  await git(["checkout", "FETCH_HEAD"], true);
  return (await git(["rev-parse", "FETCH_HEAD"], true)).trim();
};

/**
 * Fetch, build and install a commit
 * @param args - Build arguments
 * @param args.root - Downloads root
 * @param args.ref - Commit hash, or HEAD
 * @param args.name - Install directory name under root
 * @param args.buildType - CMake build type
 * @param args.writeFullHash - Record the full commit hash in the install
 * @param args.platform - Target platform
 * @param args.runner - Process runner
 * @param args.env - Environment
 *
 * @returns The full commit hash that was built
 */
export const buildFromSource = async (args: {
  root: string;
  ref: string;
  name: string;
  buildType: BuildType;
  writeFullHash: boolean;
  platform: HostPlatform;
  runner: ProcessRunner;
  env: NodeJS.ProcessEnv;
}): Promise<string> => {
  const { root, ref, name, buildType, writeFullHash, platform, runner, env } = args;

  await checkToolchain({ runner, platform, env });

  const workspace = path.join(root, BUILD_WORKSPACE);
  const prefix = path.join(root, name);
  const fullHash = await prepareWorkspace({ runner, workspace, ref });

  await fs.rm(path.join(workspace, "build"), { recursive: true, force: true });
  await fs.mkdir(path.join(workspace, "build"), { recursive: true });

  const run = (command: string, commandArgs: Array<string>) =>
    runChecked({ runner, options: { command, args: commandArgs, cwd: workspace } });

  info({ message: `Building neovim ${fullHash.slice(0, 7)} (${buildType})` });

  if (platform.os === "windows") {
    await fs.rm(path.join(workspace, ".deps"), { recursive: true, force: true });
    await fs.mkdir(path.join(workspace, ".deps"), { recursive: true });

    await run("cmake", ["-S", "cmake.deps", "-B", ".deps", `-DCMAKE_BUILD_TYPE=${buildType}`]);
    await run("cmake", ["--build", ".deps", "--config", buildType]);
    await run("cmake", ["-B", "build", `-DCMAKE_BUILD_TYPE=${buildType}`]);
    await run("cmake", ["--build", "build", "--config", buildType]);
    await run("cmake", ["--install", "build", "--prefix", prefix]);
  } else {
    await run("make", [
      `CMAKE_BUILD_TYPE=${buildType}`,
      `CMAKE_INSTALL_PREFIX=${prefix}`,
    ]);
    await run("make", ["install"]);
  }

  if (writeFullHash) {
    await fs.writeFile(path.join(prefix, FULL_HASH_FILE), fullHash);
  }

  return fullHash;
};

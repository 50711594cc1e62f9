/**
 * The nvim shim
 *
 * A small script in the installation directory that hands every argument
 * to `bob --bob-shim`, which reads the `used` file and launches that nvim.
 */

import { spawn } from "child_process";
import * as fs from "fs/promises";
import { constants as osConstants } from "os";
import * as path from "path";

import { BobError, FileBusyError, UserInputError, isErrnoException } from "@/cli/errors.js";
import { editorBinaryName } from "@/cli/features/platform/platform.js";
import { payloadDirName, readActivePointer } from "@/cli/features/version/active.js";
import { debug, info } from "@/cli/logger.js";
import { pathExists } from "@/utils/path.js";

import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type { HostPlatform } from "@/cli/features/platform/platform.js";
import type { Dirent } from "fs";

export const SHIM_FLAG = "--bob-shim";
export const SHIM_VERSION_FLAG = "--bob-shim-version";

const FORWARDED_SIGNALS: Array<NodeJS.Signals> = [
  "SIGUSR1",
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGQUIT",
];

/**
 * The shim flag counts only as the first argument after the entry script
 * @param argv - Full process argv
 *
 * @returns Arguments after the flag, or null when not launched by the shim
 */
export const shimArguments = (argv: Array<string>): Array<string> | null => {
  return argv[2] === SHIM_FLAG ? argv.slice(3) : null;
};

/**
 * How the shim reaches bob: the node binary and bob's entry script
 */
export type ShimTarget = {
  nodePath: string;
  entry: string;
};

/**
 * @returns The node binary and script of the running bob
 */
export const currentShimTarget = (): ShimTarget => {
  return {
    nodePath: process.execPath,
    entry: path.resolve(process.argv[1] ?? ""),
  };
};

/**
 * @param platform - Target platform
 *
 * @returns nvim.cmd on Windows, nvim elsewhere
 */
export const shimFileName = (platform: HostPlatform): string => {
  return platform.os === "windows" ? "nvim.cmd" : "nvim";
};

/**
 * @param args - Render arguments
 * @param args.version - bob version the shim belongs to
 * @param args.target - How to reach bob
 * @param args.platform - Target platform
 *
 * @returns Shim file contents
 */
export const renderShim = (args: {
  version: string;
  target: ShimTarget;
  platform: HostPlatform;
}): string => {
  const { version, target, platform } = args;

  if (platform.os === "windows") {
    return [
      "@echo off",
      `rem bob shim ${version}`,
      `"${target.nodePath}" "${target.entry}" ${SHIM_FLAG} %*`,
      "exit /b %ERRORLEVEL%",
      "",
    ].join("\r\n");
  }

  return [
    "#!/bin/sh",
    `# bob shim ${version}`,
    `exec "${target.nodePath}" "${target.entry}" ${SHIM_FLAG} "$@"`,
    "",
  ].join("\n");
};

const readShimVersion = async (args: {
  shimPath: string;
  platform: HostPlatform;
  runner: ProcessRunner;
}): Promise<string | null> => {
  const { shimPath, platform, runner } = args;
  try {
    const result = await runner.run(
      platform.os === "windows"
        ? { command: "cmd.exe", args: ["/d", "/c", shimPath, SHIM_VERSION_FLAG], capture: true }
        : { command: shimPath, args: [SHIM_VERSION_FLAG], capture: true },
    );
    return result.exitCode === 0 ? result.stdout.trim() : null;
  } catch (err) {
    debug({ message: `Could not run ${shimPath}: ${String(err)}` });
    return null;
  }
};

/**
 * Make sure the shim exists and belongs to the running bob version
 * @param args - Shim arguments
 * @param args.installDir - Installation directory
 * @param args.version - Running bob version
 * @param args.target - How the shim reaches bob
 * @param args.platform - Target platform
 * @param args.runner - Process runner used to query the shim
 *
 * @returns True if the shim was (re)written
 */
export const ensureShim = async (args: {
  installDir: string;
  version: string;
  target: ShimTarget;
  platform: HostPlatform;
  runner: ProcessRunner;
}): Promise<boolean> => {
  const { installDir, version, target, platform, runner } = args;
  const shimPath = path.join(installDir, shimFileName(platform));

  if (await pathExists(shimPath)) {
    const shimVersion = await readShimVersion({ shimPath, platform, runner });
    if (shimVersion === version) {
      return false;
    }
    debug({ message: `Shim version ${shimVersion ?? "unknown"} differs from ${version}` });
  }

  await fs.mkdir(installDir, { recursive: true });
  try {
    await fs.writeFile(shimPath, renderShim({ version, target, platform }));
  } catch (err) {
    if (
      platform.os === "windows" &&
      isErrnoException(err) &&
      (err.code === "EBUSY" || err.code === "EPERM")
    ) {
      throw new FileBusyError(shimPath);
    }
    throw err;
  }

  if (platform.os !== "windows") {
    await fs.chmod(shimPath, 0o755);
  }

  info({ message: `Installed shim at ${shimPath}` });
  return true;
};

/**
 * Find the editor binary of an installed version
 * Some older releases nest bin/ one directory deeper
 * @param args - Lookup arguments
 * @param args.root - Downloads root
 * @param args.dirName - Install directory name
 * @param args.platform - Target platform
 *
 * @returns Path to the binary, or null if the install has none
 */
export const findEditorBinary = async (args: {
  root: string;
  dirName: string;
  platform: HostPlatform;
}): Promise<string | null> => {
  const { root, dirName, platform } = args;
  const installDir = path.join(root, dirName);
  const binary = editorBinaryName(platform);

  const direct = path.join(installDir, "bin", binary);
  if (await pathExists(direct)) {
    return direct;
  }

  let entries: Array<Dirent>;
  try {
    entries = await fs.readdir(installDir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const nested = path.join(installDir, entry.name, "bin", binary);
    if (await pathExists(nested)) {
      return nested;
    }
  }

  return null;
};

const signalNumber = (signal: NodeJS.Signals): number => {
  const match = Object.entries(osConstants.signals).find(([name]) => name === signal);
  return typeof match?.[1] === "number" ? match[1] : 0;
};

/**
 * Launch nvim and wait for it
 * Termination signals sent to bob are passed on to nvim
 * @param args - Spawn arguments
 * @param args.binary - Editor binary
 * @param args.args - Arguments for the editor
 * @param args.env - Environment for the editor
 *
 * @returns The editor's exit code (128 + signal number when killed by a signal)
 */
export const spawnEditor = async (args: {
  binary: string;
  args: Array<string>;
  env: NodeJS.ProcessEnv;
}): Promise<number> => {
  const { binary, env } = args;
  const child = spawn(binary, args.args, { stdio: "inherit", env });

  const forwarders = new Map<NodeJS.Signals, () => void>();
  if (process.platform !== "win32") {
    for (const signal of FORWARDED_SIGNALS) {
      const forward = (): void => {
        child.kill(signal);
      };
      forwarders.set(signal, forward);
      process.on(signal, forward);
    }
  }

  try {
    return await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code, signal) => {
        if (signal != null) {
          resolve(128 + signalNumber(signal));
          return;
        }
        resolve(code ?? 1);
      });
    });
  } finally {
    for (const [signal, forward] of forwarders) {
      process.off(signal, forward);
    }
  }
};

/**
 * Entry point of the shim
 * @param args - Shim arguments
 * @param args.root - Downloads root
 * @param args.argv - Arguments for nvim
 * @param args.env - Environment for nvim
 * @param args.platform - Target platform
 *
 * @returns Exit code of nvim
 */
export const runShim = async (args: {
  root: string;
  argv: Array<string>;
  env: NodeJS.ProcessEnv;
  platform: HostPlatform;
}): Promise<number> => {
  const { root, argv, env, platform } = args;

  const payload = await readActivePointer({ root });
  if (payload == null) {
    throw new UserInputError(
      "No active version, install one with `bob use <version>`",
    );
  }

  const dirName = payloadDirName(payload);
  const binary = await findEditorBinary({ root, dirName, platform });
  if (binary == null) {
    throw new BobError({
      kind: "filesystem",
      message: `The active version ${payload} is not installed correctly, reinstall it with \`bob use ${payload}\``,
    });
  }

  return spawnEditor({ binary, args: argv, env });
};

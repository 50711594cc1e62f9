/**
 * PATH integration
 *
 * Puts the installation directory on the user's PATH exactly once: the
 * HKCU Environment key on Windows, generated env scripts sourced from the
 * shell's rc files everywhere else. removeFromPath undoes all of it.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { saveConfigValue } from "@/cli/config.js";
import { runChecked } from "@/cli/features/install/processes.js";
import { info, warn } from "@/cli/logger.js";
import { promptConfirm } from "@/cli/prompt.js";
import { getHomeDir, pathExists } from "@/utils/path.js";

import type { Config } from "@/cli/config.js";
import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type { HostPlatform } from "@/cli/features/platform/platform.js";

export const PATH_PROMPT_TIMEOUT_MS = 120_000;
const REGISTRY_KEY = "HKCU\\Environment";

export type ShellKind = "fish" | "bash" | "zsh" | "other";

export type PathIntegrationResult =
  | { type: "already-on-path" }
  | { type: "disabled" }
  | { type: "declined" }
  | { type: "timed-out" }
  | { type: "added"; files: Array<string> };

/**
 * Reads and writes the current user's Path value
 */
export type RegistryAdapter = {
  readUserPath: () => Promise<string | null>;
  writeUserPath: (value: string) => Promise<void>;
};

export type ConfirmFn = (args: {
  prompt: string;
  timeoutMs?: number | null;
}) => Promise<boolean | null>;

const normalizeWindowsEntry = (entry: string): string =>
  entry.replace(/\//g, "\\").replace(/\\+$/, "").toLowerCase();

const normalizePosixEntry = (entry: string): string =>
  entry.length > 1 ? entry.replace(/\/+$/, "") : entry;

/**
 * @param args - Check arguments
 * @param args.dir - Directory to look for
 * @param args.pathValue - A PATH-style list
 * @param args.platform - Platform whose separator and comparison rules apply
 *
 * @returns True if the directory is one of the entries
 */
export const isDirOnPath = (args: {
  dir: string;
  pathValue: string | null | undefined;
  platform: HostPlatform;
}): boolean => {
  const { dir, pathValue, platform } = args;
  if (pathValue == null || pathValue === "") {
    return false;
  }

  if (platform.os === "windows") {
    const wanted = normalizeWindowsEntry(dir);
    return pathValue
      .split(";")
      .some((entry) => normalizeWindowsEntry(entry) === wanted);
  }

  const wanted = normalizePosixEntry(dir);
  return pathValue.split(":").some((entry) => normalizePosixEntry(entry) === wanted);
};

/**
 * Append a directory to a Windows Path value unless it is already there
 * @param args - Arguments
 * @param args.current - Current value
 * @param args.dir - Directory to add
 *
 * @returns The new value
 */
export const appendToPathValue = (args: { current: string; dir: string }): string => {
  const { current, dir } = args;
  if (isDirOnPath({ dir, pathValue: current, platform: { os: "windows", arch: "x86_64" } })) {
    return current;
  }
  if (current === "") {
    return dir;
  }
  return current.endsWith(";") ? `${current}${dir}` : `${current};${dir}`;
};

/**
 * Remove every occurrence of a directory from a Windows Path value
 * @param args - Arguments
 * @param args.current - Current value
 * @param args.dir - Directory to remove
 *
 * @returns The new value
 */
export const removeFromPathValue = (args: { current: string; dir: string }): string => {
  const { current, dir } = args;
  const unwanted = normalizeWindowsEntry(dir);
  return current
    .split(";")
    .filter((entry) => entry !== "" && normalizeWindowsEntry(entry) !== unwanted)
    .join(";");
};

/**
 * Registry access through reg.exe
 * @param args - Arguments
 * @param args.runner - Process runner
 *
 * @returns A registry adapter for HKCU\Environment
 */
export const createRegistryAdapter = (args: { runner: ProcessRunner }): RegistryAdapter => {
  const { runner } = args;

  return {
    readUserPath: async () => {
      const result = await runner.run({
        command: "reg",
        args: ["query", REGISTRY_KEY, "/v", "Path"],
        capture: true,
      });
      if (result.exitCode !== 0) {
        return null;
      }
      const match = /^\s*Path\s+REG_(?:EXPAND_)?SZ\s+(.*)$/im.exec(result.stdout);
      return match == null ? "" : match[1].trim();
    },
    writeUserPath: async (value) => {
      await runChecked({
        runner,
        options: {
          command: "reg",
          args: ["add", REGISTRY_KEY, "/v", "Path", "/t", "REG_EXPAND_SZ", "/d", value, "/f"],
          capture: true,
        },
      });
    },
  };
};

/**
 * @param shell - Value of $SHELL
 *
 * @returns The shell family
 */
export const detectShell = (shell: string | null | undefined): ShellKind => {
  const name = path.basename(shell ?? "");
  switch (name) {
    case "fish":
    case "bash":
    case "zsh":
      return name;
    default:
      return "other";
  }
};

/**
 * @param args - Arguments
 * @param args.dir - Installation directory
 *
 * @returns Contents of env/env.sh
 */
export const renderEnvSh = (args: { dir: string }): string => {
  const { dir } = args;
  return [
    "#!/bin/sh",
    'case ":${PATH}:" in',
    `    *:"${dir}":*)`,
    "        ;;",
    "    *)",
    `        export PATH="${dir}:$PATH"`,
    "        ;;",
    "esac",
    "",
  ].join("\n");
};

/**
 * @param args - Arguments
 * @param args.dir - Installation directory
 *
 * @returns Contents of env/env.fish
 */
export const renderEnvFish = (args: { dir: string }): string => {
  const { dir } = args;
  return [
    `if not contains "${dir}" $PATH`,
    `    set -gx PATH "${dir}" $PATH`,
    "end",
    "",
  ].join("\n");
};

/**
 * @param envSh - Path to env.sh
 *
 * @returns The line appended to rc files
 */
export const sourceLine = (envSh: string): string => `. "${envSh}"`;

/**
 * @param args - Arguments
 * @param args.shell - Shell family
 * @param args.env - Environment
 *
 * @returns rc files that should source env.sh
 */
export const getRcFiles = (args: {
  shell: ShellKind;
  env: NodeJS.ProcessEnv;
}): Array<string> => {
  const { shell, env } = args;
  const home = getHomeDir({ env });

  switch (shell) {
    case "bash":
      return [path.join(home, ".bashrc"), path.join(home, ".bash_profile")];
    case "zsh":
      return [path.join(env.ZDOTDIR ?? home, ".zshrc")];
    case "other":
      return [path.join(home, ".profile")];
    case "fish":
      return [];
  }
};

/**
 * @param args - Arguments
 * @param args.env - Environment
 *
 * @returns Path of bob's fish conf.d snippet
 */
export const getFishConfigFile = (args: { env: NodeJS.ProcessEnv }): string => {
  const { env } = args;
  const configHome =
    env.XDG_CONFIG_HOME != null && env.XDG_CONFIG_HOME !== ""
      ? env.XDG_CONFIG_HOME
      : path.join(getHomeDir({ env }), ".config");
  return path.join(configHome, "fish", "conf.d", "bob.fish");
};

const readIfExists = async (file: string): Promise<string | null> => {
  return (await pathExists(file)) ? fs.readFile(file, "utf-8") : null;
};

const addToShellPath = async (args: {
  root: string;
  installDir: string;
  env: NodeJS.ProcessEnv;
}): Promise<Array<string>> => {
  const { root, installDir, env } = args;
  const envDir = path.join(root, "env");
  const envSh = path.join(envDir, "env.sh");
  const envFish = path.join(envDir, "env.fish");

  await fs.mkdir(envDir, { recursive: true });
  await fs.writeFile(envSh, renderEnvSh({ dir: installDir }));
  await fs.writeFile(envFish, renderEnvFish({ dir: installDir }));

  const changed: Array<string> = [];
  const shell = detectShell(env.SHELL);

  if (shell === "fish") {
    const fishFile = getFishConfigFile({ env });
    if (!(await pathExists(fishFile))) {
      await fs.mkdir(path.dirname(fishFile), { recursive: true });
      await fs.writeFile(fishFile, `source "${envFish}"\n`);
      changed.push(fishFile);
    }
    return changed;
  }

  const line = sourceLine(envSh);
  for (const rcFile of getRcFiles({ shell, env })) {
    const content = await readIfExists(rcFile);
    if (content != null && content.split(/\r?\n/).some((l) => l.trim() === line)) {
      continue;
    }
    const prefix = content == null || content === "" || content.endsWith("\n") ? "" : "\n";
    await fs.appendFile(rcFile, `${prefix}${line}\n`);
    changed.push(rcFile);
  }

  return changed;
};

const printGuidance = (args: { installDir: string }): void => {
  info({
    message: `Add ${args.installDir} to your PATH to launch nvim through bob`,
  });
};

/**
 * Put the installation directory on the user's PATH
 * @param args - Arguments
 * @param args.root - Downloads root
 * @param args.installDir - Installation directory
 * @param args.config - Loaded config (the decision is persisted into its file)
 * @param args.platform - Target platform
 * @param args.env - Environment
 * @param args.interactive - Whether the user can be prompted
 * @param args.registry - Windows registry access
 * @param args.confirm - Yes/no prompt (defaults to stdin)
 *
 * @returns What was done
 */
export const addToPath = async (args: {
  root: string;
  installDir: string;
  config: Config;
  platform: HostPlatform;
  env: NodeJS.ProcessEnv;
  interactive: boolean;
  registry: RegistryAdapter;
  confirm?: ConfirmFn | null;
}): Promise<PathIntegrationResult> => {
  const { root, installDir, config, platform, env, interactive, registry } = args;
  const confirm = args.confirm ?? promptConfirm;

  if (isDirOnPath({ dir: installDir, pathValue: env.PATH ?? env.Path, platform })) {
    return { type: "already-on-path" };
  }

  if (config.addNeovimBinaryToPath === false) {
    printGuidance({ installDir });
    return { type: "disabled" };
  }

  if (config.addNeovimBinaryToPath == null) {
    let decision: boolean | null = true;
    if (interactive) {
      decision = await confirm({
        prompt: `Add ${installDir} to your PATH?`,
        timeoutMs: PATH_PROMPT_TIMEOUT_MS,
      });
    }

    if (decision == null) {
      warn({ message: "No answer given, skipping PATH setup" });
      return { type: "timed-out" };
    }

    await saveConfigValue({
      configPath: config.configPath,
      key: "add_neovim_binary_to_path",
      value: decision,
    });

    if (!decision) {
      printGuidance({ installDir });
      return { type: "declined" };
    }
  }

  if (platform.os === "windows") {
    const current = (await registry.readUserPath()) ?? "";
    const next = appendToPathValue({ current, dir: installDir });
    if (next !== current) {
      await registry.writeUserPath(next);
    }
    info({ message: `Added ${installDir} to your PATH, restart your terminal to use it` });
    return { type: "added", files: [] };
  }

  const files = await addToShellPath({ root, installDir, env });
  info({
    message: `Added ${installDir} to your PATH, restart your shell or source ${path.join(root, "env", "env.sh")}`,
  });
  return { type: "added", files };
};

/**
 * Undo addToPath
 * @param args - Arguments
 * @param args.root - Downloads root
 * @param args.installDir - Installation directory
 * @param args.platform - Target platform
 * @param args.env - Environment
 * @param args.registry - Windows registry access
 *
 * @returns Files that were modified or removed
 */
export const removeFromPath = async (args: {
  root: string;
  installDir: string;
  platform: HostPlatform;
  env: NodeJS.ProcessEnv;
  registry: RegistryAdapter;
}): Promise<Array<string>> => {
  const { root, installDir, platform, env, registry } = args;

  if (platform.os === "windows") {
    const current = await registry.readUserPath();
    if (current != null) {
      const next = removeFromPathValue({ current, dir: installDir });
      if (next !== current) {
        await registry.writeUserPath(next);
      }
    }
    return [];
  }

  const changed: Array<string> = [];

  const fishFile = getFishConfigFile({ env });
  if (await pathExists(fishFile)) {
    await fs.rm(fishFile, { force: true });
    changed.push(fishFile);
  }

  const line = sourceLine(path.join(root, "env", "env.sh"));
  const rcFiles = new Set([
    ...getRcFiles({ shell: "bash", env }),
    ...getRcFiles({ shell: "zsh", env }),
    ...getRcFiles({ shell: "other", env }),
  ]);
  for (const rcFile of rcFiles) {
    const content = await readIfExists(rcFile);
    if (content == null) {
      continue;
    }
    const lines = content.split("\n");
    const kept = lines.filter((l) => l.trim() !== line);
    if (kept.length !== lines.length) {
      await fs.writeFile(rcFile, kept.join("\n"));
      changed.push(rcFile);
    }
  }

  await fs.rm(path.join(root, "env"), { recursive: true, force: true });
  return changed;
};

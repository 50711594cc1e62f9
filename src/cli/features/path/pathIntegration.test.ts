/**
 * Tests for PATH integration
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { configFromDocument } from "@/cli/config.js";
import {
  PATH_PROMPT_TIMEOUT_MS,
  addToPath,
  appendToPathValue,
  detectShell,
  isDirOnPath,
  removeFromPath,
  removeFromPathValue,
  renderEnvSh,
} from "@/cli/features/path/pathIntegration.js";
import { setSilentMode } from "@/cli/logger.js";
import { pathExists } from "@/utils/path.js";

import type { Config } from "@/cli/config.js";
import type { RegistryAdapter } from "@/cli/features/path/pathIntegration.js";
import type { HostPlatform } from "@/cli/features/platform/platform.js";

const linux: HostPlatform = { os: "linux", arch: "x86_64" };
const windows: HostPlatform = { os: "windows", arch: "x86_64" };

type FakeRegistry = RegistryAdapter & { value: string | null; writes: number };

const createRegistry = (initial: string | null): FakeRegistry => {
  const registry: FakeRegistry = {
    value: initial,
    writes: 0,
    readUserPath: async () => registry.value,
    writeUserPath: async (value: string) => {
      registry.value = value;
      registry.writes += 1;
    },
  };
  return registry;
};

describe("PATH value helpers", () => {
  it("should match POSIX entries with or without a trailing slash", () => {
    expect(
      isDirOnPath({ dir: "/home/test/bin", pathValue: "/usr/bin:/home/test/bin/", platform: linux }),
    ).toBe(true);
    expect(
      isDirOnPath({ dir: "/home/test/bin", pathValue: "/usr/bin:/home/test/binx", platform: linux }),
    ).toBe(false);
    expect(isDirOnPath({ dir: "/home/test/bin", pathValue: undefined, platform: linux })).toBe(
      false,
    );
  });

  it("should match Windows entries case-insensitively", () => {
    expect(
      isDirOnPath({
        dir: "C:\\Users\\test\\bob\\nvim-bin",
        pathValue: "C:\\Windows;c:/users/TEST/bob/nvim-bin\\",
        platform: windows,
      }),
    ).toBe(true);
  });

  it("should append without doubling separators", () => {
    expect(appendToPathValue({ current: "", dir: "C:\\bob" })).toBe("C:\\bob");
    expect(appendToPathValue({ current: "C:\\Windows;", dir: "C:\\bob" })).toBe(
      "C:\\Windows;C:\\bob",
    );
    expect(appendToPathValue({ current: "C:\\Windows", dir: "C:\\bob" })).toBe(
      "C:\\Windows;C:\\bob",
    );
    expect(appendToPathValue({ current: "C:\\BOB;C:\\Windows", dir: "C:\\bob" })).toBe(
      "C:\\BOB;C:\\Windows",
    );
  });

  it("should remove every occurrence", () => {
    expect(
      removeFromPathValue({ current: "C:\\bob;C:\\Windows;;c:\\BOB\\", dir: "C:\\bob" }),
    ).toBe("C:\\Windows");
  });

  it("should detect shells from $SHELL", () => {
    expect(detectShell("/usr/bin/fish")).toBe("fish");
    expect(detectShell("/bin/zsh")).toBe("zsh");
    expect(detectShell("/bin/bash")).toBe("bash");
    expect(detectShell("/bin/dash")).toBe("other");
    expect(detectShell(undefined)).toBe("other");
  });

  it("should render env.sh", () => {
    expect(renderEnvSh({ dir: "/data/bob/nvim-bin" })).toBe(
      [
        "#!/bin/sh",
        'case ":${PATH}:" in',
        '    *:"/data/bob/nvim-bin":*)',
        "        ;;",
        "    *)",
        '        export PATH="/data/bob/nvim-bin:$PATH"',
        "        ;;",
        "esac",
        "",
      ].join("\n"),
    );
  });
});

describe("addToPath and removeFromPath", () => {
  let tempDir: string;
  let home: string;
  let root: string;
  let installDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bob-path-"));
    home = path.join(tempDir, "home");
    root = path.join(tempDir, "data", "bob");
    installDir = path.join(root, "nvim-bin");
    configPath = path.join(tempDir, "config.json");
    await fs.mkdir(home, { recursive: true });
    await fs.mkdir(root, { recursive: true });
    setSilentMode({ silent: true });
  });

  afterEach(async () => {
    setSilentMode({ silent: false });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const makeConfig = (document: Record<string, unknown>): Config =>
    configFromDocument({ document, configPath, env: {} });

  it("should do nothing when the directory is already on PATH", async () => {
    const result = await addToPath({
      root,
      installDir,
      config: makeConfig({}),
      platform: linux,
      env: { HOME: home, PATH: `/usr/bin:${installDir}`, SHELL: "/bin/bash" },
      interactive: false,
      registry: createRegistry(null),
    });

    expect(result).toEqual({ type: "already-on-path" });
    expect(await pathExists(path.join(root, "env"))).toBe(false);
  });

  it("should only print guidance when disabled", async () => {
    const result = await addToPath({
      root,
      installDir,
      config: makeConfig({ add_neovim_binary_to_path: false }),
      platform: linux,
      env: { HOME: home, PATH: "/usr/bin", SHELL: "/bin/bash" },
      interactive: true,
      registry: createRegistry(null),
    });

    expect(result).toEqual({ type: "disabled" });
    expect(await pathExists(path.join(home, ".bashrc"))).toBe(false);
  });

  it("should update bash rc files once and persist the decision", async () => {
    await fs.writeFile(path.join(home, ".bashrc"), "alias ll='ls -l'");
    const env = { HOME: home, PATH: "/usr/bin", SHELL: "/bin/bash" };
    const args = {
      root,
      installDir,
      platform: linux,
      env,
      interactive: false,
      registry: createRegistry(null),
    };

    const first = await addToPath({ ...args, config: makeConfig({}) });
    const second = await addToPath({ ...args, config: makeConfig({ add_neovim_binary_to_path: true }) });

    const line = `. "${path.join(root, "env", "env.sh")}"`;
    expect(first).toEqual({
      type: "added",
      files: [path.join(home, ".bashrc"), path.join(home, ".bash_profile")],
    });
    expect(second).toEqual({ type: "added", files: [] });
    expect(await fs.readFile(path.join(home, ".bashrc"), "utf-8")).toBe(
      `alias ll='ls -l'\n${line}\n`,
    );
    expect(await fs.readFile(path.join(home, ".bash_profile"), "utf-8")).toBe(`${line}\n`);
    expect(JSON.parse(await fs.readFile(configPath, "utf-8"))).toEqual({
      add_neovim_binary_to_path: true,
    });
  });

  it("should ask interactively and remember a refusal", async () => {
    const prompts: Array<{ prompt: string; timeoutMs?: number | null }> = [];

    const result = await addToPath({
      root,
      installDir,
      config: makeConfig({}),
      platform: linux,
      env: { HOME: home, PATH: "/usr/bin", SHELL: "/bin/zsh" },
      interactive: true,
      registry: createRegistry(null),
      confirm: async (args) => {
        prompts.push(args);
        return false;
      },
    });

    expect(result).toEqual({ type: "declined" });
    expect(prompts).toEqual([
      { prompt: `Add ${installDir} to your PATH?`, timeoutMs: PATH_PROMPT_TIMEOUT_MS },
    ]);
    expect(JSON.parse(await fs.readFile(configPath, "utf-8"))).toEqual({
      add_neovim_binary_to_path: false,
    });
    expect(await pathExists(path.join(home, ".zshrc"))).toBe(false);
  });

  it("should not persist anything when the prompt times out", async () => {
    const result = await addToPath({
      root,
      installDir,
      config: makeConfig({}),
      platform: linux,
      env: { HOME: home, PATH: "/usr/bin", SHELL: "/bin/zsh" },
      interactive: true,
      registry: createRegistry(null),
      confirm: async () => null,
    });

    expect(result).toEqual({ type: "timed-out" });
    expect(await pathExists(configPath)).toBe(false);
  });

  it("should write a fish conf.d snippet", async () => {
    const configHome = path.join(tempDir, "xdg");
    const env = { HOME: home, PATH: "/usr/bin", SHELL: "/usr/bin/fish", XDG_CONFIG_HOME: configHome };

    const result = await addToPath({
      root,
      installDir,
      config: makeConfig({ add_neovim_binary_to_path: true }),
      platform: linux,
      env,
      interactive: false,
      registry: createRegistry(null),
    });

    const fishFile = path.join(configHome, "fish", "conf.d", "bob.fish");
    expect(result).toEqual({ type: "added", files: [fishFile] });
    expect(await fs.readFile(fishFile, "utf-8")).toBe(
      `source "${path.join(root, "env", "env.fish")}"\n`,
    );
  });

  it("should use the registry on Windows", async () => {
    const registry = createRegistry("C:\\Windows");

    await addToPath({
      root,
      installDir: "C:\\bob\\nvim-bin",
      config: makeConfig({ add_neovim_binary_to_path: true }),
      platform: windows,
      env: { Path: "C:\\Windows" },
      interactive: false,
      registry,
    });
    await removeFromPath({
      root,
      installDir: "C:\\bob\\nvim-bin",
      platform: windows,
      env: {},
      registry,
    });

    expect(registry.writes).toBe(2);
    expect(registry.value).toBe("C:\\Windows");
  });

  it("should undo shell changes", async () => {
    await fs.writeFile(path.join(home, ".profile"), "export EDITOR=nvim\n");
    const env = { HOME: home, PATH: "/usr/bin", SHELL: "/bin/sh" };
    await addToPath({
      root,
      installDir,
      config: makeConfig({ add_neovim_binary_to_path: true }),
      platform: linux,
      env,
      interactive: false,
      registry: createRegistry(null),
    });

    const changed = await removeFromPath({
      root,
      installDir,
      platform: linux,
      env,
      registry: createRegistry(null),
    });

    expect(changed).toEqual([path.join(home, ".profile")]);
    expect(await fs.readFile(path.join(home, ".profile"), "utf-8")).toBe(
      "export EDITOR=nvim\n",
    );
    expect(await pathExists(path.join(root, "env"))).toBe(false);
  });
});

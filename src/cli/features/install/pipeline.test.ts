/**
 * End-to-end tests for the install pipeline against a fake upstream
 */

import { createHash } from "crypto";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import semver from "semver";
import { c as createTar } from "tar";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { configFromDocument } from "@/cli/config.js";
import { ChecksumMismatchError, SubprocessError } from "@/cli/errors.js";
import { GitHubClient } from "@/cli/features/github/client.js";
import {
  checksumFileName,
  installVersion,
  releaseBaseUrl,
} from "@/cli/features/install/pipeline.js";
import { listRollbacks, readNightlyInfo } from "@/cli/features/rollback/ring.js";
import { writeActivePointer } from "@/cli/features/version/active.js";
import { setSilentMode } from "@/cli/logger.js";
import { pathExists } from "@/utils/path.js";

import type { InstallContext } from "@/cli/features/install/pipeline.js";
import type { ProcessRunner, RunOptions } from "@/cli/features/install/processes.js";
import type { ResolvedVersion, UpstreamRelease } from "@/cli/features/version/types.js";

const DOWNLOAD_BASE = "https://github.com/neovim/neovim/releases/download";
const API_BASE = "https://api.github.com/repos/neovim/neovim";

const tagged = (version: string): ResolvedVersion => ({
  tag: `v${version}`,
  kind: "tagged",
  raw: version,
  semver: semver.parse(version),
});

const nightly: ResolvedVersion = { tag: "nightly", kind: "nightly", raw: "nightly", semver: null };

const nightlyRelease = (commitish: string, day: number): UpstreamRelease => ({
  tag_name: "nightly",
  target_commitish: commitish,
  published_at: `2024-01-0${day}T00:00:00Z`,
});

const sha256 = (data: Buffer): string => createHash("sha256").update(data).digest("hex");

type Route = () => Response;

const FULL_SHA = `abc1234${"0".repeat(33)}`;

const commit: ResolvedVersion = { tag: "abc1234", kind: "hash", raw: "abc1234", semver: null };

/**
 * Toolchain stand-in: every tool exists and `make` installs into its prefix
 */
const createBuildRunner = (args?: {
  failBuild?: boolean;
}): { runner: ProcessRunner; calls: Array<RunOptions> } => {
  const calls: Array<RunOptions> = [];

  const runner: ProcessRunner = {
    run: async (options) => {
      calls.push(options);
      if (options.command === "git" && options.args[0] === "rev-parse") {
        return { exitCode: 0, signal: null, stdout: `${FULL_SHA}\n` };
      }
      const prefixArg = options.args.find((arg) => arg.startsWith("CMAKE_INSTALL_PREFIX="));
      if (options.command === "make" && prefixArg != null) {
        const prefix = prefixArg.slice("CMAKE_INSTALL_PREFIX=".length);
        await fs.mkdir(path.join(prefix, "bin"), { recursive: true });
        if (args?.failBuild === true) {
          return { exitCode: 2, signal: null, stdout: "" };
        }
        await fs.writeFile(path.join(prefix, "bin", "nvim"), "");
      }
      return { exitCode: 0, signal: null, stdout: "" };
    },
  };

  return { runner, calls };
};

describe("installVersion", () => {
  let tempDir: string;
  let root: string;
  let routes: Map<string, Route>;
  let requested: Array<string>;
  let tarball: Buffer;

  const createContext = (args?: {
    document?: Record<string, unknown>;
    runner?: ProcessRunner;
  }): InstallContext => ({
    config: configFromDocument({
      document: { downloads_location: root, ...(args?.document ?? {}) },
      configPath: path.join(tempDir, "config.json"),
      env: {},
    }),
    client: new GitHubClient({
      fetchFn: async (url) => {
        requested.push(url);
        const route = routes.get(url.split("?")[0]);
        return route == null ? new Response("Not Found", { status: 404 }) : route();
      },
    }),
    platform: { os: "linux", arch: "x86_64" },
    runner: args?.runner ?? {
      run: async () => {
        throw new Error("no subprocess expected");
      },
    },
    env: {},
  });

  const serveBytes = (url: string, data: Buffer | string): void => {
    routes.set(url, () => new Response(typeof data === "string" ? data : new Uint8Array(data)));
  };

  const serveNightly = (release: UpstreamRelease): void => {
    routes.set(`${API_BASE}/releases/tags/nightly`, () => new Response(JSON.stringify(release)));
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bob-pipeline-"));
    root = path.join(tempDir, "downloads");
    await fs.mkdir(root);
    routes = new Map();
    requested = [];
    setSilentMode({ silent: true });

    const source = path.join(tempDir, "source");
    await fs.mkdir(path.join(source, "nvim-linux-x86_64", "bin"), { recursive: true });
    await fs.writeFile(path.join(source, "nvim-linux-x86_64", "bin", "nvim"), "#!/bin/sh\n");
    const tarPath = path.join(tempDir, "fixture.tar.gz");
    await createTar({ gzip: true, file: tarPath, cwd: source }, ["nvim-linux-x86_64"]);
    tarball = await fs.readFile(tarPath);
  });

  afterEach(async () => {
    setSilentMode({ silent: false });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should install a release verified by shasum.txt", async () => {
    const base = `${DOWNLOAD_BASE}/v0.11.0`;
    serveBytes(`${base}/nvim-linux-x86_64.tar.gz`, tarball);
    serveBytes(
      `${base}/shasum.txt`,
      `${"0".repeat(64)}  nvim-macos-arm64.tar.gz\n${sha256(tarball)}  nvim-linux-x86_64.tar.gz\n`,
    );

    const result = await installVersion({ resolved: tagged("0.11.0"), context: createContext() });

    expect(result).toEqual({ type: "installed", path: path.join(root, "v0.11.0") });
    expect(await pathExists(path.join(root, "v0.11.0", "bin", "nvim"))).toBe(true);
    expect(await fs.readdir(root)).toEqual(["v0.11.0"]);
  });

  it("should report an existing install without downloading", async () => {
    await fs.mkdir(path.join(root, "v0.9.5"));

    const result = await installVersion({ resolved: tagged("0.9.5"), context: createContext() });

    expect(result).toEqual({ type: "already-installed" });
    expect(requested).toEqual([]);
  });

  it("should reject 0.2.2 and older", async () => {
    await expect(
      installVersion({ resolved: tagged("0.2.2"), context: createContext() }),
    ).rejects.toThrow("Versions 0.2.2 and below are not supported");
    expect(requested).toEqual([]);
  });

  it("should accept 0.2.3, which publishes no checksum", async () => {
    serveBytes(`${DOWNLOAD_BASE}/v0.2.3/nvim-linux64.tar.gz`, tarball);

    const result = await installVersion({ resolved: tagged("0.2.3"), context: createContext() });

    expect(result).toEqual({ type: "installed", path: path.join(root, "v0.2.3") });
    expect(requested).toEqual([`${DOWNLOAD_BASE}/v0.2.3/nvim-linux64.tar.gz`]);
  });

  it("should remove everything on a checksum mismatch", async () => {
    const base = `${DOWNLOAD_BASE}/v0.11.0`;
    serveBytes(`${base}/nvim-linux-x86_64.tar.gz`, tarball);
    serveBytes(`${base}/shasum.txt`, `${"0".repeat(64)}  nvim-linux-x86_64.tar.gz\n`);

    await expect(
      installVersion({ resolved: tagged("0.11.0"), context: createContext() }),
    ).rejects.toBeInstanceOf(ChecksumMismatchError);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it("should install without verification when the checksum file is missing", async () => {
    serveBytes(`${DOWNLOAD_BASE}/v0.9.5/nvim-linux64.tar.gz`, tarball);

    const result = await installVersion({ resolved: tagged("0.9.5"), context: createContext() });

    expect(result.type).toBe("installed");
    expect(requested).toEqual([
      `${DOWNLOAD_BASE}/v0.9.5/nvim-linux64.tar.gz`,
      `${DOWNLOAD_BASE}/v0.9.5/nvim-linux64.tar.gz.sha256sum`,
    ]);
  });

  it("should fall back to the AppImage when there is no tarball", async () => {
    const appImage = Buffer.from("appimage bytes");
    const base = `${DOWNLOAD_BASE}/v0.9.5`;
    serveBytes(`${base}/nvim.appimage`, appImage);
    serveBytes(`${base}/nvim.appimage.sha256sum`, `${sha256(appImage)}  nvim.appimage\n`);
    const runner: ProcessRunner = {
      run: async (options) => {
        const cwd = options.cwd ?? tempDir;
        await fs.mkdir(path.join(cwd, "squashfs-root", "usr", "bin"), { recursive: true });
        await fs.writeFile(path.join(cwd, "squashfs-root", "usr", "bin", "nvim"), "");
        return { exitCode: 0, signal: null, stdout: "" };
      },
    };

    const result = await installVersion({
      resolved: tagged("0.9.5"),
      context: createContext({ runner }),
    });

    expect(result).toEqual({ type: "installed", path: path.join(root, "v0.9.5") });
    expect(await pathExists(path.join(root, "v0.9.5", "bin", "nvim"))).toBe(true);
  });

  it("should fail when the release has no asset for the platform", async () => {
    await expect(
      installVersion({ resolved: tagged("0.9.5"), context: createContext() }),
    ).rejects.toThrow(
      "Please provide an existing neovim version, v0.9.5 has no release for this platform",
    );
  });

  it("should update nightly and keep a bounded ring of snapshots", async () => {
    const context = createContext({ document: { rollback_limit: 2 } });
    const serveNightlyAsset = (): void => {
      serveBytes(`${DOWNLOAD_BASE}/nightly/nvim-linux-x86_64.tar.gz`, tarball);
      serveBytes(
        `${DOWNLOAD_BASE}/nightly/shasum.txt`,
        `${sha256(tarball)}  nvim-linux-x86_64.tar.gz\n`,
      );
    };
    routes.set(`${API_BASE}/commits`, () => new Response("[]"));
    serveNightlyAsset();

    serveNightly(nightlyRelease("1111111aaa", 1));
    expect((await installVersion({ resolved: nightly, context })).type).toBe("installed");
    await writeActivePointer({ root, payload: "nightly" });

    expect(await installVersion({ resolved: nightly, context })).toEqual({
      type: "nightly-up-to-date",
    });

    for (const [commitish, day] of [
      ["2222222bbb", 2],
      ["3333333ccc", 3],
      ["4444444ddd", 4],
    ] as const) {
      serveNightly(nightlyRelease(commitish, day));
      expect((await installVersion({ resolved: nightly, context })).type).toBe("installed");
    }

    const rollbacks = await listRollbacks({ root });
    expect(rollbacks.map((entry) => entry.name)).toEqual(["nightly-3333333", "nightly-2222222"]);
    expect((await readNightlyInfo({ dir: path.join(root, "nightly") }))?.target_commitish).toBe(
      "4444444ddd",
    );
    expect(requested).toContain(
      `${API_BASE}/commits?since=${encodeURIComponent("2024-01-03T00:00:00Z")}&until=${encodeURIComponent("2024-01-04T00:00:00Z")}&per_page=100`,
    );
  });

  it("should not snapshot a nightly that is not in use", async () => {
    const context = createContext({ document: { enable_nightly_info: false } });
    serveBytes(`${DOWNLOAD_BASE}/nightly/nvim-linux-x86_64.tar.gz`, tarball);
    serveBytes(
      `${DOWNLOAD_BASE}/nightly/shasum.txt`,
      `${sha256(tarball)}  nvim-linux-x86_64.tar.gz\n`,
    );

    serveNightly(nightlyRelease("1111111aaa", 1));
    await installVersion({ resolved: nightly, context });
    serveNightly(nightlyRelease("2222222bbb", 2));
    await installVersion({ resolved: nightly, context });

    expect(await listRollbacks({ root })).toEqual([]);
    expect(requested.some((url) => url.startsWith(`${API_BASE}/commits`))).toBe(false);
  });
});

describe("installVersion from source", () => {
  let tempDir: string;
  let root: string;
  let requested: Array<string>;
  let nightlyBody: string;

  const createContext = (args: {
    runner: ProcessRunner;
    document?: Record<string, unknown>;
  }): InstallContext => ({
    config: configFromDocument({
      document: { downloads_location: root, ...(args.document ?? {}) },
      configPath: path.join(tempDir, "config.json"),
      env: {},
    }),
    client: new GitHubClient({
      fetchFn: async (url) => {
        requested.push(url);
        return url === `${API_BASE}/releases/tags/nightly`
          ? new Response(nightlyBody)
          : new Response("Not Found", { status: 404 });
      },
    }),
    platform: { os: "linux", arch: "x86_64" },
    runner: args.runner,
    env: {},
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bob-pipeline-build-"));
    root = path.join(tempDir, "downloads");
    await fs.mkdir(root);
    requested = [];
    nightlyBody = JSON.stringify(nightlyRelease("5555555eee", 5));
    setSilentMode({ silent: true });
  });

  afterEach(async () => {
    setSilentMode({ silent: false });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should build a commit and record its full hash", async () => {
    const { runner, calls } = createBuildRunner();

    const result = await installVersion({ resolved: commit, context: createContext({ runner }) });

    expect(result).toEqual({ type: "installed", path: path.join(root, "abc1234") });
    expect(await fs.readFile(path.join(root, "abc1234", "full-hash.txt"), "utf-8")).toBe(FULL_SHA);
    expect(calls.find((call) => call.args[0] === "fetch")?.args).toEqual([
      "fetch",
      "--depth=1",
      "origin",
      "abc1234",
    ]);
    expect(calls.find((call) => call.command === "make")?.args).toEqual([
      "CMAKE_BUILD_TYPE=RelWithDebInfo",
      `CMAKE_INSTALL_PREFIX=${path.join(root, "abc1234")}`,
    ]);
    expect(requested).toEqual([]);
  });

  it("should build nightly from HEAD when release builds are enabled", async () => {
    const { runner, calls } = createBuildRunner();
    const context = createContext({ runner, document: { enable_release_build: true } });

    const result = await installVersion({ resolved: nightly, context });

    expect(result).toEqual({ type: "installed", path: path.join(root, "nightly") });
    expect(calls.find((call) => call.args[0] === "fetch")?.args).toEqual([
      "fetch",
      "--depth=1",
      "origin",
      "HEAD",
    ]);
    expect(calls.find((call) => call.command === "make")?.args[0]).toBe(
      "CMAKE_BUILD_TYPE=Release",
    );
    expect(await pathExists(path.join(root, "nightly", "full-hash.txt"))).toBe(false);
    expect(await readNightlyInfo({ dir: path.join(root, "nightly") })).toEqual(
      nightlyRelease("5555555eee", 5),
    );
    expect(requested).toEqual([`${API_BASE}/releases/tags/nightly`]);
  });

  it("should remove a half-built install when the build fails", async () => {
    const { runner } = createBuildRunner({ failBuild: true });

    await expect(
      installVersion({ resolved: commit, context: createContext({ runner }) }),
    ).rejects.toBeInstanceOf(SubprocessError);
    expect(await fs.readdir(root)).toEqual(["neovim-git"]);
  });
});

describe("checksumFileName", () => {
  const asset = { name: "nvim-linux64", format: "tar.gz" } as const;

  it("should follow the upstream publishing history", () => {
    expect(checksumFileName({ resolved: tagged("0.4.4"), asset })).toBeNull();
    expect(checksumFileName({ resolved: tagged("0.5.0"), asset })).toBe(
      "nvim-linux64.tar.gz.sha256sum",
    );
    expect(checksumFileName({ resolved: tagged("0.10.4"), asset })).toBe(
      "nvim-linux64.tar.gz.sha256sum",
    );
    expect(checksumFileName({ resolved: tagged("0.10.5"), asset })).toBe("shasum.txt");
    expect(checksumFileName({ resolved: nightly, asset })).toBe("shasum.txt");
  });
});

describe("releaseBaseUrl", () => {
  it("should honour a mirror with a trailing slash", () => {
    const config = configFromDocument({
      document: { github_mirror: "https://mirror.example.com/" },
      configPath: "/c/config.json",
      env: {},
    });

    expect(releaseBaseUrl({ config, tag: "v0.9.5" })).toBe(
      "https://mirror.example.com/neovim/neovim/releases/download/v0.9.5",
    );
  });
});

/**
 * Tests for the rollback command
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { humanizeDuration, rollbackTo } from "@/cli/commands/rollback/rollback.js";
import { configFromDocument } from "@/cli/config.js";
import { GitHubClient } from "@/cli/features/github/client.js";
import { listRollbacks, writeNightlyInfo } from "@/cli/features/rollback/ring.js";
import { readActivePointer, writeActivePointer } from "@/cli/features/version/active.js";
import { setSilentMode } from "@/cli/logger.js";

import type { CommandContext } from "@/cli/commands/context.js";

const HOUR = 60 * 60 * 1000;

describe("humanizeDuration", () => {
  it("should join weeks, days and hours", () => {
    expect(humanizeDuration(9 * 24 * HOUR + 3 * HOUR)).toBe("1 week, 2 days, 3 hours");
    expect(humanizeDuration(2 * 7 * 24 * HOUR)).toBe("2 weeks");
    expect(humanizeDuration(HOUR + 59 * 60 * 1000)).toBe("1 hour");
  });

  it("should say less than an hour for short or negative durations", () => {
    expect(humanizeDuration(30 * 60 * 1000)).toBe("less than an hour");
    expect(humanizeDuration(-HOUR)).toBe("less than an hour");
  });
});

describe("rollbackTo", () => {
  let tempDir: string;
  let root: string;
  let context: CommandContext;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bob-rollback-"));
    root = path.join(tempDir, "downloads");
    await fs.mkdir(path.join(root, "nightly-abc1234", "bin"), { recursive: true });
    await writeNightlyInfo({
      dir: path.join(root, "nightly-abc1234"),
      release: {
        tag_name: "nightly-abc1234",
        target_commitish: "abc1234fff",
        published_at: "2024-01-01T00:00:00Z",
      },
    });
    setSilentMode({ silent: true });

    context = {
      config: configFromDocument({
        document: { downloads_location: root, add_neovim_binary_to_path: false },
        configPath: path.join(tempDir, "config.json"),
        env: {},
      }),
      client: new GitHubClient({
        fetchFn: async () => {
          throw new Error("no network expected");
        },
      }),
      platform: { os: "linux", arch: "x86_64" },
      runner: { run: async () => ({ exitCode: 0, signal: null, stdout: "1.0.0" }) },
      env: { HOME: tempDir, PATH: "/usr/bin" },
      interactive: false,
      registry: { readUserPath: async () => null, writeUserPath: async () => undefined },
      bobVersion: "1.0.0",
      shimTarget: { nodePath: "/usr/bin/node", entry: "/opt/bob/cli.js" },
    };
  });

  afterEach(async () => {
    setSilentMode({ silent: false });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should make the snapshot the active version", async () => {
    await writeActivePointer({ root, payload: "nightly" });
    const [entry] = await listRollbacks({ root });

    await rollbackTo({ entry, context, now: Date.parse("2024-01-02T05:00:00Z") });

    expect(await readActivePointer({ root })).toBe("nightly-abc1234");
  });

  it("should leave an active snapshot alone", async () => {
    await writeActivePointer({ root, payload: "nightly-abc1234" });
    const [entry] = await listRollbacks({ root });

    await rollbackTo({ entry, context, now: Date.now() });

    expect(await readActivePointer({ root })).toBe("nightly-abc1234");
    expect(await fs.readdir(root)).not.toContain("nvim-bin");
  });
});

/**
 * Switcher: make a version the active one
 */

import * as fs from "fs/promises";
import * as path from "path";

import { BobError, isErrnoException } from "@/cli/errors.js";
import { addToPath } from "@/cli/features/path/pathIntegration.js";
import { ensureShim } from "@/cli/features/switch/shim.js";
import { resolvePayload, writeActivePointer } from "@/cli/features/version/active.js";
import { info } from "@/cli/logger.js";
import { getDownloadsDir, getInstallationDir, normalizePath } from "@/utils/path.js";

import type { Config } from "@/cli/config.js";
import type { ProcessRunner } from "@/cli/features/install/processes.js";
import type {
  ConfirmFn,
  PathIntegrationResult,
  RegistryAdapter,
} from "@/cli/features/path/pathIntegration.js";
import type { HostPlatform } from "@/cli/features/platform/platform.js";
import type { ShimTarget } from "@/cli/features/switch/shim.js";
import type { ResolvedVersion } from "@/cli/features/version/types.js";

/**
 * Everything switching touches besides the downloads root
 */
export type SwitchContext = {
  config: Config;
  platform: HostPlatform;
  runner: ProcessRunner;
  env: NodeJS.ProcessEnv;
  interactive: boolean;
  registry: RegistryAdapter;
  bobVersion: string;
  shimTarget: ShimTarget;
  confirm?: ConfirmFn | null;
};

/**
 * Read the version recorded in the sync file
 * @param args - Arguments
 * @param args.file - Sync file path
 *
 * @returns First non-blank line, or null when the file is empty or missing
 */
export const readSyncFile = async (args: { file: string }): Promise<string | null> => {
  const { file } = args;
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  const line = content
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l !== "");
  return line ?? null;
};

/**
 * Record a version in the sync file, writing only when it changed
 * @param args - Arguments
 * @param args.file - Sync file path
 * @param args.value - Version to record
 *
 * @returns True if the file was written
 */
export const updateSyncFile = async (args: {
  file: string;
  value: string;
}): Promise<boolean> => {
  const { file, value } = args;

  try {
    await fs.access(path.dirname(file));
  } catch {
    throw new BobError({
      kind: "filesystem",
      message: `Cannot write the version sync file, ${path.dirname(file)} does not exist`,
    });
  }

  if ((await readSyncFile({ file })) === value) {
    return false;
  }

  await fs.writeFile(file, value);
  info({ message: `Written version to ${file}` });
  return true;
};

/**
 * Make the shim ready, using the configured installation directory
 * @param args - Arguments
 * @param args.context - Switch context
 *
 * @returns True if the shim was (re)written
 */
export const ensureShimForConfig = async (args: {
  context: SwitchContext;
}): Promise<boolean> => {
  const { config, env, bobVersion, shimTarget, platform, runner } = args.context;
  const installDir = await getInstallationDir({ config, env });
  return ensureShim({
    installDir,
    version: bobVersion,
    target: shimTarget,
    platform,
    runner,
  });
};

/**
 * Activate an installed version
 * @param args - Arguments
 * @param args.resolved - Version to activate
 * @param args.context - Switch context
 *
 * @returns The outcome of PATH integration
 */
export const switchVersion = async (args: {
  resolved: ResolvedVersion;
  context: SwitchContext;
}): Promise<PathIntegrationResult> => {
  const { resolved, context } = args;
  const { config, env, platform, interactive, registry, confirm } = context;

  const root = await getDownloadsDir({ config, env });
  const payload = await resolvePayload({ resolved, root });

  await writeActivePointer({ root, payload });
  await ensureShimForConfig({ context });

  if (config.versionSyncFileLocation != null) {
    await updateSyncFile({
      file: normalizePath({ target: config.versionSyncFileLocation, env }),
      value: resolved.tag,
    });
  }

  const installDir = await getInstallationDir({ config, env });
  return addToPath({
    root,
    installDir,
    config,
    platform,
    env,
    interactive,
    registry,
    confirm,
  });
};

/**
 * bob update: refresh stable and nightly installs
 */

import * as path from "path";

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { reportInstall } from "@/cli/commands/install/install.js";
import { installVersion } from "@/cli/features/install/pipeline.js";
import { NIGHTLY_DIR } from "@/cli/features/rollback/ring.js";
import { listInstalledVersions } from "@/cli/features/version/installed.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { installName } from "@/cli/features/version/types.js";
import { info, warn } from "@/cli/logger.js";
import { getDownloadsDir, pathExists } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { Command } from "commander";

const RELEASE_DIR_PATTERN = /^v[0-9]+\.[0-9]+\.[0-9]+$/;

/**
 * Update stable (when a release is installed) and nightly (when installed)
 * @param args - Arguments
 * @param args.context - Command context
 *
 * @returns True if anything was installed
 */
export const updateAll = async (args: { context: CommandContext }): Promise<boolean> => {
  const { context } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const installed = await listInstalledVersions({ root });
  let didUpdate = false;

  if (installed.some((version) => RELEASE_DIR_PATTERN.test(version.name))) {
    const stable = await resolveVersion({ input: "stable", client: context.client });
    const result = await installVersion({ resolved: stable, context });
    if (result.type === "installed") {
      reportInstall({ resolved: stable, result });
      didUpdate = true;
    }
  }

  if (installed.some((version) => version.name === NIGHTLY_DIR)) {
    const nightly = await resolveVersion({ input: "nightly", client: context.client });
    const result = await installVersion({ resolved: nightly, context });
    if (result.type === "installed") {
      reportInstall({ resolved: nightly, result });
      didUpdate = true;
    }
  }

  if (!didUpdate) {
    warn({ message: "There was nothing to update." });
  }
  return didUpdate;
};

/**
 * Update a single installed version
 * @param args - Arguments
 * @param args.input - Version string
 * @param args.context - Command context
 *
 * @returns True if anything was installed
 */
export const updateOne = async (args: {
  input: string;
  context: CommandContext;
}): Promise<boolean> => {
  const { input, context } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const resolved = await resolveVersion({ input, client: context.client });

  if (!(await pathExists(path.join(root, installName(resolved))))) {
    warn({ message: `${input} is not installed.` });
    return false;
  }

  const result = await installVersion({ resolved, context });
  switch (result.type) {
    case "nightly-up-to-date":
      info({ message: "Nightly is already updated!" });
      return false;
    case "already-installed":
    case "given-nightly-rollback":
      info({ message: `${resolved.tag} is already updated!` });
      return false;
    case "installed":
      reportInstall({ resolved, result });
      return true;
  }
};

/**
 * Main entry point for `bob update`
 * @param args - Arguments
 * @param args.version - Version to update, or null for all
 * @param args.all - Update stable and nightly
 * @param args.globals - Global options
 */
export const main = async (args: {
  version: string | null;
  all: boolean;
  globals: GlobalOptions;
}): Promise<void> => {
  const { version, all, globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      if (version == null || all) {
        await updateAll({ context });
        return;
      }
      await updateOne({ input: version, context });
    },
  });
};

/**
 * Register the 'update' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerUpdateCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("update")
    .description("Update an installed version, or stable and nightly")
    .argument("[version]", "Installed version to update (stable or nightly)")
    .option("-a, --all", "Update stable and nightly if installed")
    .action(async (version: string | undefined, options: { all?: boolean }) => {
      await main({
        version: version ?? null,
        all: options.all === true,
        globals: getGlobalOptions({ program }),
      });
    });
};

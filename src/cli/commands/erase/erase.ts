/**
 * bob erase: remove everything bob put on the machine
 */

import * as fs from "fs/promises";
import * as path from "path";

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { UserInputError } from "@/cli/errors.js";
import { removeFromPath } from "@/cli/features/path/pathIntegration.js";
import { shimFileName } from "@/cli/features/switch/shim.js";
import { info, success } from "@/cli/logger.js";
import { getDataDir, normalizePath, pathExists } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Remove PATH integration, the shim and the downloads root
 * @param args - Arguments
 * @param args.context - Command context
 *
 * @returns Paths that were removed
 */
export const eraseAll = async (args: {
  context: CommandContext;
}): Promise<Array<string>> => {
  const { config, env, platform, registry } = args.context;

  const root =
    config.downloadsLocation != null
      ? normalizePath({ target: config.downloadsLocation, env })
      : path.join(getDataDir({ env }), "bob");
  const customLocation = config.installationLocation;
  const installDir =
    customLocation != null
      ? normalizePath({ target: customLocation, env })
      : path.join(root, "nvim-bin");

  const removed: Array<string> = [];
  const rootExists = await pathExists(root);

  const changed = await removeFromPath({ root, installDir, platform, env, registry });
  for (const file of changed) {
    info({ message: `Removed bob from ${file}` });
  }

  const shim = path.join(installDir, shimFileName(platform));
  const installTarget = customLocation != null ? shim : installDir;
  if (await pathExists(installTarget)) {
    await fs.rm(installTarget, { recursive: true, force: true });
    removed.push(installTarget);
  }

  if (rootExists) {
    await fs.rm(root, { recursive: true, force: true });
    removed.push(root);
  }

  if (removed.length === 0 && changed.length === 0) {
    throw new UserInputError("There's nothing to erase");
  }

  for (const target of removed) {
    success({ message: `Successfully removed ${target}` });
  }
  return removed;
};

/**
 * Main entry point for `bob erase`
 * @param args - Arguments
 * @param args.globals - Global options
 */
export const main = async (args: { globals: GlobalOptions }): Promise<void> => {
  const { globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      await eraseAll({ context });
    },
  });
};

/**
 * Register the 'erase' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerEraseCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("erase")
    .description("Remove every installed version, the shim and bob's PATH changes")
    .action(async () => {
      await main({ globals: getGlobalOptions({ program }) });
    });
};

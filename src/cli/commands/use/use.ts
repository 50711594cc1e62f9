/**
 * bob use: install (if needed) and activate a version
 */

import * as path from "path";

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { UserInputError } from "@/cli/errors.js";
import { installVersion } from "@/cli/features/install/pipeline.js";
import { ensureShimForConfig, switchVersion } from "@/cli/features/switch/switcher.js";
import { isVersionActive } from "@/cli/features/version/active.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { installName } from "@/cli/features/version/types.js";
import { info, success } from "@/cli/logger.js";
import { getDownloadsDir, pathExists } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { ResolvedVersion } from "@/cli/features/version/types.js";
import type { Command } from "commander";

export type UseResult =
  | { type: "already-used" }
  | { type: "nightly-already-used" }
  | { type: "switched" };

/**
 * Install and activate an already-resolved version
 * @param args - Arguments
 * @param args.resolved - Version to use
 * @param args.install - Install the version when missing
 * @param args.context - Command context
 *
 * @returns What happened
 */
export const useVersion = async (args: {
  resolved: ResolvedVersion;
  install: boolean;
  context: CommandContext;
}): Promise<UseResult> => {
  const { resolved, install, context } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const isUsed = await isVersionActive({ resolved, root });

  await ensureShimForConfig({ context });

  if (isUsed && resolved.kind !== "nightly") {
    info({ message: `${resolved.tag} is already installed and used!` });
    return { type: "already-used" };
  }

  const installed = await pathExists(path.join(root, installName(resolved)));
  if (install && resolved.kind !== "nightly-rollback") {
    const result = await installVersion({ resolved, context });
    if (isUsed && result.type === "nightly-up-to-date") {
      info({ message: "Nightly is already updated and used!" });
      return { type: "nightly-already-used" };
    }
    if (result.type === "installed") {
      success({ message: `Successfully installed ${resolved.tag}` });
    }
  } else if (!installed) {
    throw new UserInputError(
      resolved.kind === "nightly-rollback"
        ? `Rollback ${resolved.tag} does not exist, see \`bob list\``
        : `${resolved.tag} is not installed, install it with \`bob install ${resolved.raw}\``,
    );
  }

  await switchVersion({ resolved, context });
  success({ message: `You can now use ${resolved.tag}!` });
  return { type: "switched" };
};

/**
 * Main entry point for `bob use`
 * @param args - Arguments
 * @param args.version - Version string from the command line
 * @param args.install - Whether to install the version when missing
 * @param args.globals - Global options
 */
export const main = async (args: {
  version: string;
  install: boolean;
  globals: GlobalOptions;
}): Promise<void> => {
  const { version, install, globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      const resolved = await resolveVersion({ input: version, client: context.client });
      await useVersion({ resolved, install, context });
    },
  });
};

/**
 * Register the 'use' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerUseCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("use")
    .description("Switch to the specified version, installing it if needed")
    .argument("<version>", "nightly, stable, latest, head, [v]x.x.x, a commit hash or nightly-<hash>")
    .option("--no-install", "Do not install the version when it is missing")
    .action(async (version: string, options: { install: boolean }) => {
      await main({
        version,
        install: options.install,
        globals: getGlobalOptions({ program }),
      });
    });
};

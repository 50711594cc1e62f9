/**
 * bob install: download or build a version without activating it
 */

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { installVersion } from "@/cli/features/install/pipeline.js";
import { ensureShimForConfig } from "@/cli/features/switch/switcher.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { info, success } from "@/cli/logger.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { InstallResult } from "@/cli/features/install/pipeline.js";
import type { ResolvedVersion } from "@/cli/features/version/types.js";
import type { Command } from "commander";

/**
 * Print the outcome of an install
 * @param args - Arguments
 * @param args.resolved - Installed version
 * @param args.result - Pipeline result
 */
export const reportInstall = (args: {
  resolved: ResolvedVersion;
  result: InstallResult;
}): void => {
  const { resolved, result } = args;

  switch (result.type) {
    case "installed":
      success({ message: `Successfully installed ${resolved.tag}` });
      return;
    case "already-installed":
    case "given-nightly-rollback":
      info({ message: `${resolved.tag} is already installed!` });
      return;
    case "nightly-up-to-date":
      info({ message: "Nightly up to date!" });
      return;
  }
};

/**
 * Install one version string
 * @param args - Arguments
 * @param args.input - Version string
 * @param args.context - Command context
 *
 * @returns The pipeline result
 */
export const installInput = async (args: {
  input: string;
  context: CommandContext;
}): Promise<InstallResult> => {
  const { input, context } = args;
  const resolved = await resolveVersion({ input, client: context.client });

  await ensureShimForConfig({ context });
  const result = await installVersion({ resolved, context });
  reportInstall({ resolved, result });
  return result;
};

/**
 * Main entry point for `bob install`
 * @param args - Arguments
 * @param args.version - Version string from the command line
 * @param args.globals - Global options
 */
export const main = async (args: {
  version: string;
  globals: GlobalOptions;
}): Promise<void> => {
  const { version, globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      await installInput({ input: version, context });
    },
  });
};

/**
 * Register the 'install' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerInstallCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("install")
    .description("Install the specified version without switching to it")
    .argument("<version>", "nightly, stable, latest, head, [v]x.x.x or a commit hash")
    .action(async (version: string) => {
      await main({ version, globals: getGlobalOptions({ program }) });
    });
};

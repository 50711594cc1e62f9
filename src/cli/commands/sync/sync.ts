/**
 * bob sync: use the version named in the sync file
 */

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { useVersion } from "@/cli/commands/use/use.js";
import { UserInputError } from "@/cli/errors.js";
import { readSyncFile } from "@/cli/features/switch/switcher.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { info } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Read the sync file and use the version it names
 * @param args - Arguments
 * @param args.context - Command context
 */
export const syncVersion = async (args: { context: CommandContext }): Promise<void> => {
  const { context } = args;
  const location = context.config.versionSyncFileLocation;

  if (location == null) {
    throw new UserInputError(
      "version_sync_file_location needs to be set to use bob sync",
    );
  }

  const file = normalizePath({ target: location, env: context.env });
  const version = await readSyncFile({ file });
  if (version == null) {
    throw new UserInputError("Sync file is empty");
  }

  if (version.startsWith("nightly-")) {
    info({ message: "Cannot sync nightly rollbacks." });
    return;
  }

  const resolved = await resolveVersion({ input: version, client: context.client });
  await useVersion({ resolved, install: true, context });
};

/**
 * Main entry point for `bob sync`
 * @param args - Arguments
 * @param args.globals - Global options
 */
export const main = async (args: { globals: GlobalOptions }): Promise<void> => {
  const { globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      await syncVersion({ context });
    },
  });
};

/**
 * Register the 'sync' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerSyncCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("sync")
    .description("Use the version written in version_sync_file_location")
    .action(async () => {
      await main({ globals: getGlobalOptions({ program }) });
    });
};

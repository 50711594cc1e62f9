/**
 * bob uninstall: remove installed versions
 */

import * as fs from "fs/promises";
import * as path from "path";

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { UserInputError } from "@/cli/errors.js";
import {
  isVersionActive,
  payloadDirName,
  readActivePointer,
} from "@/cli/features/version/active.js";
import { listInstalledVersions } from "@/cli/features/version/installed.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { installName } from "@/cli/features/version/types.js";
import { info, success } from "@/cli/logger.js";
import { promptConfirm, promptMultiSelect } from "@/cli/prompt.js";
import { getDownloadsDir, pathExists } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { InstalledVersion } from "@/cli/features/version/installed.js";
import type { Command } from "commander";

/**
 * @param args - Arguments
 * @param args.root - Downloads root
 *
 * @returns Installed versions other than the active one
 */
export const listRemovableVersions = async (args: {
  root: string;
}): Promise<Array<InstalledVersion>> => {
  const { root } = args;
  const active = await readActivePointer({ root });
  const activeDir = active == null ? null : payloadDirName(active);
  const installed = await listInstalledVersions({ root });
  return installed.filter((version) => version.name !== activeDir);
};

/**
 * Remove one version given on the command line
 * @param args - Arguments
 * @param args.input - Version string
 * @param args.context - Command context
 */
export const uninstallVersion = async (args: {
  input: string;
  context: CommandContext;
}): Promise<void> => {
  const { input, context } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const resolved = await resolveVersion({ input, client: context.client });

  if (await isVersionActive({ resolved, root })) {
    throw new UserInputError(
      `${resolved.tag} is currently in use. Switch to a different version before proceeding`,
    );
  }

  const dir = path.join(root, installName(resolved));
  if (!(await pathExists(dir))) {
    throw new UserInputError(`${resolved.tag} is not installed`);
  }

  await fs.rm(dir, { recursive: true, force: true });
  success({ message: `Successfully uninstalled version: ${resolved.tag}` });
};

/**
 * Let the user pick versions to remove
 * @param args - Arguments
 * @param args.context - Command context
 */
export const uninstallSelection = async (args: {
  context: CommandContext;
}): Promise<void> => {
  const { context } = args;

  if (!context.interactive) {
    throw new UserInputError(
      "No version given. Pass one to uninstall when running non-interactively",
    );
  }

  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const removable = await listRemovableVersions({ root });
  if (removable.length === 0) {
    info({ message: "You have no versions that can be uninstalled" });
    return;
  }

  const selection = await promptMultiSelect({
    message: "Select the versions to uninstall",
    choices: removable.map((version) => version.name),
  });
  if (selection == null || selection.length === 0) {
    info({ message: "Uninstall cancelled" });
    return;
  }

  const chosen = selection.map((index) => removable[index]);
  const names = chosen.map((version) => version.name).join(", ");
  const confirmed = await promptConfirm({
    prompt: `Uninstall ${names}?`,
  });
  if (confirmed !== true) {
    info({ message: "Uninstall cancelled" });
    return;
  }

  for (const version of chosen) {
    await fs.rm(version.path, { recursive: true, force: true });
    success({ message: `Successfully uninstalled version: ${version.name}` });
  }
};

/**
 * Main entry point for `bob uninstall`
 * @param args - Arguments
 * @param args.version - Version string, or null to choose interactively
 * @param args.globals - Global options
 */
export const main = async (args: {
  version: string | null;
  globals: GlobalOptions;
}): Promise<void> => {
  const { version, globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      if (version == null) {
        await uninstallSelection({ context });
        return;
      }
      await uninstallVersion({ input: version, context });
    },
  });
};

/**
 * Register the 'uninstall' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerUninstallCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("uninstall")
    .alias("rm")
    .alias("remove")
    .description("Uninstall a version, or choose versions to uninstall")
    .argument("[version]", "Version to uninstall")
    .action(async (version: string | undefined) => {
      await main({
        version: version ?? null,
        globals: getGlobalOptions({ program }),
      });
    });
};

/**
 * bob run: launch an installed version without switching to it
 */

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { UserInputError } from "@/cli/errors.js";
import { findEditorBinary, spawnEditor } from "@/cli/features/switch/shim.js";
import { resolveVersion } from "@/cli/features/version/resolve.js";
import { installName } from "@/cli/features/version/types.js";
import { getDownloadsDir } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Run an installed version with the given arguments
 * @param args - Arguments
 * @param args.input - Version string
 * @param args.editorArgs - Arguments passed to nvim
 * @param args.context - Command context
 *
 * @returns The editor's exit code
 */
export const runVersion = async (args: {
  input: string;
  editorArgs: Array<string>;
  context: CommandContext;
}): Promise<number> => {
  const { input, editorArgs, context } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const resolved = await resolveVersion({ input, client: context.client });

  const binary = await findEditorBinary({
    root,
    dirName: installName(resolved),
    platform: context.platform,
  });
  if (binary == null) {
    throw new UserInputError(
      `Version ${resolved.tag} is not installed. Install it first with: bob install ${input}`,
    );
  }

  return spawnEditor({ binary, args: editorArgs, env: context.env });
};

/**
 * Main entry point for `bob run`
 * @param args - Arguments
 * @param args.version - Version string from the command line
 * @param args.editorArgs - Arguments passed to nvim
 * @param args.globals - Global options
 */
export const main = async (args: {
  version: string;
  editorArgs: Array<string>;
  globals: GlobalOptions;
}): Promise<void> => {
  const { version, editorArgs, globals } = args;
  let exitCode = 0;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      exitCode = await runVersion({ input: version, editorArgs, context });
    },
  });

  process.exit(exitCode);
};

/**
 * Register the 'run' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerRunCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("run")
    .description("Run a specific installed version, passing the remaining arguments to nvim")
    .argument("<version>", "Installed version to run")
    .argument("[args...]", "Arguments for nvim")
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (version: string, editorArgs: Array<string>) => {
      // passThroughOptions keeps the `--` separator in the variadic args
      const passed = editorArgs[0] === "--" ? editorArgs.slice(1) : editorArgs;
      await main({ version, editorArgs: passed, globals: getGlobalOptions({ program }) });
    });
};

/**
 * Shared wiring for command handlers
 */

import { loadConfig } from "@/cli/config.js";
import { errorMessage } from "@/cli/errors.js";
import { GitHubClient } from "@/cli/features/github/client.js";
import { nodeProcessRunner } from "@/cli/features/install/processes.js";
import { createRegistryAdapter } from "@/cli/features/path/pathIntegration.js";
import { detectPlatform } from "@/cli/features/platform/platform.js";
import { currentShimTarget } from "@/cli/features/switch/shim.js";
import { error, setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

import type { InstallContext } from "@/cli/features/install/pipeline.js";
import type { SwitchContext } from "@/cli/features/switch/switcher.js";
import type { Command } from "commander";

/**
 * Options every command accepts
 */
export type GlobalOptions = {
  nonInteractive?: boolean | null;
  silent?: boolean | null;
};

export type CommandContext = InstallContext & SwitchContext;

/**
 * @param args - Arguments
 * @param args.program - Commander program instance
 *
 * @returns The global options the user passed
 */
export const getGlobalOptions = (args: { program: Command }): GlobalOptions => {
  const opts = args.program.opts<{ nonInteractive?: boolean; silent?: boolean }>();
  return {
    nonInteractive: opts.nonInteractive ?? null,
    silent: opts.silent ?? null,
  };
};

/**
 * Build the collaborators a command needs from config and environment
 * @param args - Arguments
 * @param args.globals - Global options
 *
 * @returns The command context
 */
export const createCommandContext = async (args: {
  globals: GlobalOptions;
}): Promise<CommandContext> => {
  const { globals } = args;
  const env = process.env;
  const config = await loadConfig({ env });
  const runner = nodeProcessRunner;

  return {
    config,
    client: GitHubClient.fromEnv({ env }),
    platform: detectPlatform(),
    runner,
    env,
    interactive:
      globals.nonInteractive !== true &&
      globals.silent !== true &&
      process.stdin.isTTY === true,
    registry: createRegistryAdapter({ runner }),
    bobVersion: getCurrentPackageVersion() ?? "unknown",
    shimTarget: currentShimTarget(),
  };
};

/**
 * Run a command body with silent mode applied and errors reported
 * Any error is printed on one line and exits with code 1
 * @param args - Arguments
 * @param args.globals - Global options
 * @param args.action - Command body
 */
export const runCommand = async (args: {
  globals: GlobalOptions;
  action: () => Promise<void>;
}): Promise<void> => {
  const { globals, action } = args;

  if (globals.silent === true) {
    setSilentMode({ silent: true });
  }

  try {
    await action();
  } catch (err) {
    error({ message: errorMessage(err) });
    process.exit(1);
  } finally {
    if (globals.silent === true) {
      setSilentMode({ silent: false });
    }
  }
};

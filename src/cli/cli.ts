#!/usr/bin/env node

/**
 * bob CLI Router
 *
 * Routes commands to their handlers using commander.js. When launched
 * through the nvim shim it runs the active editor instead.
 */

import { Command } from "commander";

import { registerEraseCommand } from "@/cli/commands/erase/erase.js";
import { registerInstallCommand } from "@/cli/commands/install/install.js";
import { registerListCommand } from "@/cli/commands/list/list.js";
import { registerListRemoteCommand } from "@/cli/commands/list-remote/listRemote.js";
import { registerRollbackCommand } from "@/cli/commands/rollback/rollback.js";
import { registerRunCommand } from "@/cli/commands/run/run.js";
import { registerSyncCommand } from "@/cli/commands/sync/sync.js";
import { registerUninstallCommand } from "@/cli/commands/uninstall/uninstall.js";
import { registerUpdateCommand } from "@/cli/commands/update/update.js";
import { registerUseCommand } from "@/cli/commands/use/use.js";
import { loadConfig } from "@/cli/config.js";
import { errorMessage } from "@/cli/errors.js";
import { detectPlatform } from "@/cli/features/platform/platform.js";
import { SHIM_VERSION_FLAG, runShim, shimArguments } from "@/cli/features/switch/shim.js";
import { error, raw } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";
import { getDownloadsDir } from "@/utils/path.js";

const version = getCurrentPackageVersion() ?? "unknown";

/**
 * Run as the nvim shim: everything after the flag belongs to nvim
 * @param argv - Arguments after --bob-shim
 */
const runAsShim = async (argv: Array<string>): Promise<void> => {
  if (argv[0] === SHIM_VERSION_FLAG) {
    raw({ message: version });
    return;
  }

  let exitCode: number;
  try {
    const env = process.env;
    const config = await loadConfig({ env });
    const root = await getDownloadsDir({ config, env });
    exitCode = await runShim({ root, argv, env, platform: detectPlatform() });
  } catch (err) {
    error({ message: errorMessage(err) });
    exitCode = 1;
  }
  process.exit(exitCode);
};

const runCli = async (): Promise<void> => {
  const program = new Command();

  program
    .name("bob")
    .version(version)
    .description(`bob - Neovim version manager v${version}`)
    .enablePositionalOptions()
    .option("-n, --non-interactive", "Run without interactive prompts")
    .option("-s, --silent", "Suppress all output (implies --non-interactive)")
    .addHelpText(
      "after",
      `
Examples:
  $ bob use stable
  $ bob install nightly
  $ bob use v0.9.5
  $ bob list
  $ bob rollback
  $ bob run nightly -- --clean
  $ bob update --all
`,
    );

  registerUseCommand({ program });
  registerInstallCommand({ program });
  registerSyncCommand({ program });
  registerUninstallCommand({ program });
  registerRollbackCommand({ program });
  registerEraseCommand({ program });
  registerListCommand({ program });
  registerListRemoteCommand({ program });
  registerRunCommand({ program });
  registerUpdateCommand({ program });

  if (process.argv.length < 3) {
    program.help();
  }

  await program.parseAsync(process.argv);
};

const shimArgv = shimArguments(process.argv);
if (shimArgv != null) {
  await runAsShim(shimArgv);
} else {
  await runCli();
}

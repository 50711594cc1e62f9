/**
 * bob rollback: switch to a previous nightly snapshot
 */

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { UserInputError } from "@/cli/errors.js";
import { listRollbacks } from "@/cli/features/rollback/ring.js";
import { switchVersion } from "@/cli/features/switch/switcher.js";
import { isVersionActive } from "@/cli/features/version/active.js";
import { info, success } from "@/cli/logger.js";
import { promptSelect } from "@/cli/prompt.js";
import { getDownloadsDir } from "@/utils/path.js";

import type { CommandContext, GlobalOptions } from "@/cli/commands/context.js";
import type { RollbackEntry } from "@/cli/features/rollback/ring.js";
import type { ResolvedVersion } from "@/cli/features/version/types.js";
import type { Command } from "commander";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

const plural = (count: number, unit: string): string =>
  `${count} ${unit}${count === 1 ? "" : "s"}`;

/**
 * @param ms - Duration in milliseconds
 *
 * @returns e.g. "1 week, 2 days, 3 hours"
 */
export const humanizeDuration = (ms: number): string => {
  const clamped = Math.max(0, ms);
  const weeks = Math.floor(clamped / WEEK_MS);
  const days = Math.floor((clamped % WEEK_MS) / DAY_MS);
  const hours = Math.floor((clamped % DAY_MS) / HOUR_MS);

  const parts: Array<string> = [];
  if (weeks > 0) {
    parts.push(plural(weeks, "week"));
  }
  if (days > 0) {
    parts.push(plural(days, "day"));
  }
  if (hours > 0) {
    parts.push(plural(hours, "hour"));
  }

  return parts.length === 0 ? "less than an hour" : parts.join(", ");
};

const toResolved = (entry: RollbackEntry): ResolvedVersion => ({
  tag: entry.name,
  kind: "nightly-rollback",
  raw: entry.name,
  semver: null,
});

/**
 * Switch to a snapshot
 * @param args - Arguments
 * @param args.entry - Snapshot to switch to
 * @param args.context - Command context
 * @param args.now - Current time in milliseconds
 */
export const rollbackTo = async (args: {
  entry: RollbackEntry;
  context: CommandContext;
  now: number;
}): Promise<void> => {
  const { entry, context, now } = args;
  const root = await getDownloadsDir({ config: context.config, env: context.env });
  const resolved = toResolved(entry);

  if (await isVersionActive({ resolved, root })) {
    info({ message: `${entry.name} is already in use!` });
    return;
  }

  await switchVersion({ resolved, context });

  const age = humanizeDuration(now - Date.parse(entry.release.published_at));
  success({
    message: `Successfully rolled back to version '${entry.name}' from ${age} ago`,
  });
};

/**
 * Main entry point for `bob rollback`
 * @param args - Arguments
 * @param args.globals - Global options
 */
export const main = async (args: { globals: GlobalOptions }): Promise<void> => {
  const { globals } = args;

  await runCommand({
    globals,
    action: async () => {
      const context = await createCommandContext({ globals });
      const root = await getDownloadsDir({ config: context.config, env: context.env });
      const rollbacks = await listRollbacks({ root });

      if (rollbacks.length === 0) {
        throw new UserInputError("You don't have any rollbacks");
      }
      if (!context.interactive) {
        throw new UserInputError("bob rollback needs an interactive terminal");
      }

      const index = await promptSelect({
        message: "Choose which rollback to use",
        choices: rollbacks.map(
          (entry) => `${entry.name} (${entry.release.published_at})`,
        ),
      });
      if (index == null) {
        info({ message: "Rollback cancelled" });
        return;
      }

      await rollbackTo({ entry: rollbacks[index], context, now: Date.now() });
    },
  });
};

/**
 * Register the 'rollback' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerRollbackCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("rollback")
    .description("Switch to a previous nightly")
    .action(async () => {
      await main({ globals: getGlobalOptions({ program }) });
    });
};

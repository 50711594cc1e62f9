/**
 * bob list: show installed versions
 */

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { payloadDirName, readActivePointer } from "@/cli/features/version/active.js";
import { listInstalledVersions } from "@/cli/features/version/installed.js";
import { green, info, raw, yellow } from "@/cli/logger.js";
import { getDownloadsDir } from "@/utils/path.js";

import type { GlobalOptions } from "@/cli/commands/context.js";
import type { Command } from "commander";

export type VersionStatus = "Used" | "Installed";

export type VersionRow = {
  version: string;
  status: VersionStatus;
};

const PADDING = 2;

const paintStatus = (status: VersionStatus): string =>
  status === "Used" ? green({ text: status }) : yellow({ text: status });

/**
 * Draw the installed versions as a box table
 * @param args - Arguments
 * @param args.rows - One row per installed version
 * @param args.paint - Colours a status cell (defaults to green/yellow)
 *
 * @returns Table lines
 */
export const renderVersionTable = (args: {
  rows: Array<VersionRow>;
  paint?: ((status: VersionStatus) => string) | null;
}): Array<string> => {
  const { rows } = args;
  const paint = args.paint ?? paintStatus;
  const pad = " ".repeat(PADDING);

  const versionWidth = Math.max("Version".length, ...rows.map((r) => r.version.length));
  const statusWidth = Math.max("Status".length, ...rows.map((r) => r.status.length));
  const rule = (left: string, middle: string, right: string): string =>
    `${left}${"─".repeat(versionWidth + PADDING * 2)}${middle}${"─".repeat(statusWidth + PADDING * 2)}${right}`;
  const cell = (text: string, width: number, painted?: string): string =>
    `${pad}${painted ?? text}${" ".repeat(width - text.length)}${pad}`;

  return [
    rule("┌", "┬", "┐"),
    `│${cell("Version", versionWidth)}│${cell("Status", statusWidth)}│`,
    rule("├", "┼", "┤"),
    ...rows.map(
      (row) =>
        `│${cell(row.version, versionWidth)}│${cell(row.status, statusWidth, paint(row.status))}│`,
    ),
    rule("└", "┴", "┘"),
  ];
};

/**
 * @param args - Arguments
 * @param args.root - Downloads root
 *
 * @returns A row per installed version
 */
export const collectVersionRows = async (args: {
  root: string;
}): Promise<Array<VersionRow>> => {
  const { root } = args;
  const active = await readActivePointer({ root });
  const activeDir = active == null ? null : payloadDirName(active);
  const installed = await listInstalledVersions({ root });

  return installed.map((version) => ({
    version: version.name,
    status: version.name === activeDir ? "Used" : "Installed",
  }));
};

/**
 * Main entry point for `bob list`
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
      const rows = await collectVersionRows({ root });

      if (rows.length === 0) {
        info({ message: "There are no versions installed" });
        return;
      }

      for (const line of renderVersionTable({ rows })) {
        raw({ message: line });
      }
    },
  });
};

/**
 * Register the 'list' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerListCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("list")
    .alias("ls")
    .description("List installed versions")
    .action(async () => {
      await main({ globals: getGlobalOptions({ program }) });
    });
};

/**
 * bob list-remote: show upstream release tags
 */

import * as path from "path";

import {
  createCommandContext,
  getGlobalOptions,
  runCommand,
} from "@/cli/commands/context.js";
import { payloadDirName, readActivePointer } from "@/cli/features/version/active.js";
import { green, raw, yellow } from "@/cli/logger.js";
import { getDownloadsDir, pathExists } from "@/utils/path.js";

import type { GlobalOptions } from "@/cli/commands/context.js";
import type { RemoteTag } from "@/cli/features/github/client.js";
import type { Command } from "commander";

export type RemoteVersionState = "used" | "installed" | "available";

export type RemoteVersionLine = {
  tag: string;
  state: RemoteVersionState;
  stable: boolean;
};

/**
 * @param args - Arguments
 * @param args.tags - Upstream tags, newest first
 * @param args.stableTag - Tag of the latest stable release
 * @param args.activeDir - Directory of the active version, if any
 * @param args.isInstalled - Whether a tag has an install directory
 *
 * @returns Release tags with their local state
 */
export const describeRemoteTags = async (args: {
  tags: Array<RemoteTag>;
  stableTag: string | null;
  activeDir: string | null;
  isInstalled: (tag: string) => Promise<boolean>;
}): Promise<Array<RemoteVersionLine>> => {
  const { tags, stableTag, activeDir, isInstalled } = args;
  const lines: Array<RemoteVersionLine> = [];

  for (const { name } of tags) {
    if (!name.startsWith("v")) {
      continue;
    }
    let state: RemoteVersionState = "available";
    if (name === activeDir) {
      state = "used";
    } else if (await isInstalled(name)) {
      state = "installed";
    }
    lines.push({ tag: name, state, stable: name === stableTag });
  }

  return lines;
};

/**
 * @param line - A described tag
 *
 * @returns The tag coloured by state, with a stable marker
 */
export const formatRemoteLine = (line: RemoteVersionLine): string => {
  const suffix = line.stable ? " (stable)" : "";
  switch (line.state) {
    case "used":
      return green({ text: `${line.tag}${suffix}` });
    case "installed":
      return yellow({ text: `${line.tag}${suffix}` });
    case "available":
      return `${line.tag}${suffix}`;
  }
};

/**
 * Main entry point for `bob list-remote`
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
      const active = await readActivePointer({ root });

      const [tags, stable] = await Promise.all([
        context.client.listTags(),
        context.client.getUpstreamStable(),
      ]);

      const lines = await describeRemoteTags({
        tags,
        stableTag: stable.tag_name,
        activeDir: active == null ? null : payloadDirName(active),
        isInstalled: (tag) => pathExists(path.join(root, tag)),
      });

      for (const line of lines) {
        raw({ message: formatRemoteLine(line) });
      }
    },
  });
};

/**
 * Register the 'list-remote' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerListRemoteCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("list-remote")
    .alias("ls-remote")
    .description("List the versions available upstream")
    .action(async () => {
      await main({ globals: getGlobalOptions({ program }) });
    });
};

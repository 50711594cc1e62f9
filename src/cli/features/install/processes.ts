/**
 * Subprocess execution for builds, probes and AppImage extraction
 */

import { spawn } from "child_process";

import { SubprocessError } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

export type ProcessResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
};

export type RunOptions = {
  command: string;
  args: Array<string>;
  cwd?: string | null;
  /** Capture stdout instead of showing it to the user */
  capture?: boolean | null;
};

/**
 * Runs external programs
 * Injected everywhere a subprocess is started so tests can fake it
 */
export type ProcessRunner = {
  run: (options: RunOptions) => Promise<ProcessResult>;
};

/**
 * Runner backed by child_process.spawn
 */
export const nodeProcessRunner: ProcessRunner = {
  run: (options) => {
    const { command, args, cwd, capture } = options;
    debug({ message: `$ ${command} ${args.join(" ")}` });

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: cwd ?? undefined,
        stdio: capture === true ? ["ignore", "pipe", "inherit"] : "inherit",
        shell: false,
      });

      const chunks: Array<Buffer> = [];
      child.stdout?.on("data", (chunk: Buffer) => chunks.push(chunk));

      child.on("error", reject);
      child.on("close", (exitCode, signal) => {
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(chunks).toString("utf-8"),
        });
      });
    });
  },
};

/**
 * Run a command and fail unless it exits with code 0
 * @param args - Run arguments
 * @param args.runner - Process runner
 * @param args.options - Command to run
 *
 * @returns Captured stdout (empty unless capture is set)
 */
export const runChecked = async (args: {
  runner: ProcessRunner;
  options: RunOptions;
}): Promise<string> => {
  const { runner, options } = args;
  const rendered = [options.command, ...options.args].join(" ");

  const result = await runner.run(options);
  if (result.exitCode !== 0) {
    throw new SubprocessError({
      command: rendered,
      exitCode: result.exitCode,
      signal: result.signal,
    });
  }
  return result.stdout;
};

/**
 * Probe whether a program can be started and exits cleanly
 * @param args - Probe arguments
 * @param args.runner - Process runner
 * @param args.command - Program to probe
 *
 * @returns True if `<command> --version` exits with code 0
 */
export const commandExists = async (args: {
  runner: ProcessRunner;
  command: string;
}): Promise<boolean> => {
  const { runner, command } = args;
  try {
    const result = await runner.run({ command, args: ["--version"], capture: true });
    return result.exitCode === 0;
  } catch (err) {
    debug({ message: `${command} is not available: ${String(err)}` });
    return false;
  }
};

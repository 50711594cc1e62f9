/**
 * Console logger for bob
 * All user-facing output goes through here so silent mode can mute it
 */

import chalk from "chalk";

let silentMode = false;

/**
 * Enable or disable silent mode
 * @param args - Configuration arguments
 * @param args.silent - Whether to suppress all output
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  const { silent } = args;
  silentMode = silent;
};

/**
 * Print an informational message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const info = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.log(args.message);
};

/**
 * Print a success message in green
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const success = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.log(chalk.green(args.message));
};

/**
 * Print a warning to stderr
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const warn = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.error(chalk.yellow(args.message));
};

/**
 * Print an error to stderr
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const error = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.error(chalk.red(`Error: ${args.message}`));
};

/**
 * Print a debug message when BOB_DEBUG is set
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const debug = (args: { message: string }): void => {
  if (silentMode || process.env.BOB_DEBUG == null) {
    return;
  }
  console.error(chalk.gray(`[debug] ${args.message}`));
};

/**
 * Print a message without any decoration
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const raw = (args: { message: string }): void => {
  if (silentMode) {
    return;
  }
  console.log(args.message);
};

export const newline = (): void => {
  if (silentMode) {
    return;
  }
  console.log();
};

export const brightCyan = (args: { text: string }): string =>
  chalk.cyanBright(args.text);

export const boldWhite = (args: { text: string }): string =>
  chalk.bold.white(args.text);

export const green = (args: { text: string }): string => chalk.green(args.text);

export const yellow = (args: { text: string }): string =>
  chalk.yellow(args.text);

export const blue = (args: { text: string }): string =>
  chalk.bold.blue(args.text);

/**
 * Interactive prompts on top of node:readline
 */

import { createInterface } from "readline";

import { info, newline, raw, brightCyan, boldWhite } from "@/cli/logger.js";

/**
 * Ask the user a question on stdin
 * @param args - Prompt arguments
 * @param args.prompt - Question to show
 * @param args.timeoutMs - Give up after this many milliseconds (optional)
 * @param args.input - Stream to read the answer from (defaults to stdin)
 * @param args.output - Stream to write the prompt to (defaults to stdout)
 *
 * @returns The trimmed answer, or null when the timeout elapsed or input closed first
 */
export const promptUser = async (args: {
  prompt: string;
  timeoutMs?: number | null;
  input?: NodeJS.ReadableStream | null;
  output?: NodeJS.WritableStream | null;
}): Promise<string | null> => {
  const { prompt, timeoutMs } = args;
  const output = args.output ?? process.stdout;
  const rl = createInterface({ input: args.input ?? process.stdin, output });

  return new Promise<string | null>((resolve) => {
    let timer: NodeJS.Timeout | null = null;
    let settled = false;

    const settle = (answer: string | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer != null) {
        clearTimeout(timer);
      }
      resolve(answer);
      rl.close();
    };

    if (timeoutMs != null) {
      timer = setTimeout(() => {
        output.write("\n");
        settle(null);
      }, timeoutMs);
    }

    // stdin closing (Ctrl+D) never answers the question
    rl.on("close", () => {
      settle(null);
    });

    rl.question(prompt, (answer) => {
      settle(answer.trim());
    });
  });
};

/**
 * Ask a yes/no question
 * @param args - Prompt arguments
 * @param args.prompt - Question to show
 * @param args.timeoutMs - Timeout in milliseconds (optional)
 *
 * @returns true/false, or null on timeout
 */
export const promptConfirm = async (args: {
  prompt: string;
  timeoutMs?: number | null;
}): Promise<boolean | null> => {
  const answer = await promptUser({
    prompt: `${args.prompt} (y/n): `,
    timeoutMs: args.timeoutMs,
  });
  if (answer == null) {
    return null;
  }
  return /^[Yy]/.test(answer);
};

const printChoices = (choices: Array<string>): void => {
  choices.forEach((choice, i) => {
    const number = brightCyan({ text: `${i + 1}.` });
    raw({ message: `${number} ${boldWhite({ text: choice })}` });
  });
  newline();
};

/**
 * Numbered single-choice selection
 * @param args - Prompt arguments
 * @param args.message - Heading shown above the choices
 * @param args.choices - Items to choose from
 *
 * @returns Index of the chosen item, or null if the user cancels with 'q'
 */
export const promptSelect = async (args: {
  message: string;
  choices: Array<string>;
}): Promise<number | null> => {
  const { message, choices } = args;

  info({ message });
  newline();
  printChoices(choices);

  while (true) {
    const response = await promptUser({
      prompt: `Select (1-${choices.length}) or 'q' to cancel: `,
    });

    if (response == null || response.toLowerCase() === "q") {
      return null;
    }

    const index = parseInt(response, 10) - 1;
    if (index >= 0 && index < choices.length) {
      return index;
    }

    info({
      message: `Invalid selection "${response}". Please enter a number between 1 and ${choices.length}.`,
    });
  }
};

/**
 * Parse a comma separated list of 1-based selections
 * @param args - Parse arguments
 * @param args.input - Raw user input, e.g. "1, 3"
 * @param args.count - Number of available choices
 *
 * @returns Sorted unique 0-based indices, or null if any entry is invalid
 */
export const parseMultiSelection = (args: {
  input: string;
  count: number;
}): Array<number> | null => {
  const { input, count } = args;
  const parts = input
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  const indices = new Set<number>();
  for (const part of parts) {
    if (!/^[0-9]+$/.test(part)) {
      return null;
    }
    const index = parseInt(part, 10) - 1;
    if (index < 0 || index >= count) {
      return null;
    }
    indices.add(index);
  }

  return [...indices].sort((a, b) => a - b);
};

/**
 * Numbered multi-choice selection
 * @param args - Prompt arguments
 * @param args.message - Heading shown above the choices
 * @param args.choices - Items to choose from
 *
 * @returns Chosen indices (possibly empty), or null if the user cancels
 */
export const promptMultiSelect = async (args: {
  message: string;
  choices: Array<string>;
}): Promise<Array<number> | null> => {
  const { message, choices } = args;

  info({ message });
  newline();
  printChoices(choices);

  while (true) {
    const response = await promptUser({
      prompt: "Enter numbers separated by commas, or 'q' to cancel: ",
    });

    if (response == null || response.toLowerCase() === "q") {
      return null;
    }

    const selection = parseMultiSelection({
      input: response,
      count: choices.length,
    });
    if (selection != null) {
      return selection;
    }

    info({ message: `Invalid selection "${response}".` });
  }
};

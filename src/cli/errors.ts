/**
 * Error taxonomy for bob
 *
 * Every failure a user can reach is one of these kinds. Command handlers
 * print the message on a single line and exit non-zero.
 */

export type BobErrorKind =
  | "user-input"
  | "network"
  | "rate-limit"
  | "integrity"
  | "filesystem"
  | "file-busy"
  | "toolchain"
  | "subprocess";

export class BobError extends Error {
  readonly kind: BobErrorKind;

  constructor(args: { kind: BobErrorKind; message: string; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "BobError";
    this.kind = args.kind;
  }
}

export class UserInputError extends BobError {
  constructor(message: string) {
    super({ kind: "user-input", message });
    this.name = "UserInputError";
  }
}

export class NetworkError extends BobError {
  constructor(message: string, cause?: unknown) {
    super({ kind: "network", message, cause });
    this.name = "NetworkError";
  }
}

export class RateLimitError extends BobError {
  constructor() {
    super({
      kind: "rate-limit",
      message:
        "GitHub API rate limit has been reached, either wait an hour or set a GITHUB_TOKEN environment variable to authenticate",
    });
    this.name = "RateLimitError";
  }
}

export class ChecksumMismatchError extends BobError {
  constructor(args: { file: string; expected: string; actual: string }) {
    super({
      kind: "integrity",
      message: `Checksum mismatch for ${args.file}: expected ${args.expected}, got ${args.actual}`,
    });
    this.name = "ChecksumMismatchError";
  }
}

export class FileBusyError extends BobError {
  constructor(file: string) {
    super({
      kind: "file-busy",
      message: `The file ${file} is busy. Close every running Neovim instance and try again`,
    });
    this.name = "FileBusyError";
  }
}

export class ToolchainError extends BobError {
  constructor(message: string) {
    super({ kind: "toolchain", message });
    this.name = "ToolchainError";
  }
}

export class SubprocessError extends BobError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(args: {
    command: string;
    exitCode: number | null;
    signal: string | null;
  }) {
    const { command, exitCode, signal } = args;
    super({
      kind: "subprocess",
      message:
        signal != null
          ? `${command} was terminated by signal ${signal}`
          : `${command} exited with code ${exitCode}`,
    });
    this.name = "SubprocessError";
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Extract a printable message from anything thrown
 * @param err - The thrown value
 *
 * @returns A single-line message
 */
export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) {
    return err.message.split("\n")[0];
  }
  return String(err);
};

/**
 * Narrow an unknown error to a Node system error with a code
 * @param err - The thrown value
 *
 * @returns True if the error carries an errno code
 */
export const isErrnoException = (
  err: unknown,
): err is NodeJS.ErrnoException => {
  return err instanceof Error && "code" in err;
};

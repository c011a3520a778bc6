export interface CliErrorOptions {
  isUserError?: boolean;
  cause?: unknown;
}

/** An error whose message is meant for the person at the terminal. */
export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? true;
  }
}

/** Ends the process with the current exit code and prints nothing further. */
export class SilentError extends CliError {
  constructor(message = "", options: CliErrorOptions = {}) {
    super(message, { isUserError: false, ...options });
    this.name = "SilentError";
  }
}

export interface CliErrorOptions {
  /** User errors are shown without a pointer to the error log. */
  isUserError?: boolean;
  cause?: unknown;
}

export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? false;
  }
}

export class ValidationError extends CliError {
  constructor(message: string, options: Omit<CliErrorOptions, "isUserError"> = {}) {
    super(message, { ...options, isUserError: true });
    this.name = "ValidationError";
  }
}

/**
 * Ends the command without any further output. `exitCode` becomes the
 * process exit code.
 */
export class SilentError extends CliError {
  readonly exitCode: number;

  constructor(message = "", options: CliErrorOptions & { exitCode?: number } = {}) {
    super(message, options);
    this.name = "SilentError";
    this.exitCode = options.exitCode ?? 0;
  }
}

export class OperationCancelledError extends SilentError {
  constructor() {
    super("Operation cancelled.", { isUserError: true });
    this.name = "OperationCancelledError";
  }
}

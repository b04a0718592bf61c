import {
  intro as designIntro,
  introPlain,
  log,
  resolveOutputFormat,
  symbols
} from "@stagecheck/design-system";
import chalk from "chalk";
import type { LoggerFn } from "./types.js";
import type { ErrorLogger, ErrorContext } from "./error-logger.js";

export interface LoggerContext {
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "verbose">> & Pick<LoggerContext, "scope">;
  info(message: string): void;
  /** Machine-readable output: no scope prefix, no styling. */
  data(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  errorResolved(label: string, value: string): void;
  errorWithStack(error: Error, context?: ErrorContext): void;
  logException(error: Error, operation: string, context?: ErrorContext): void;
  verbose(message: string): void;
  intro(title: string): void;
  resolved(label: string, value: string): void;
  child(context: Partial<LoggerContext>): ScopedLogger;
}

export interface LoggerFactory {
  base: LoggerFn;
  create(context?: LoggerContext): ScopedLogger;
  setErrorLogger(errorLogger: ErrorLogger): void;
}

export interface LoggerTheme {
  intro?: (text: string) => string;
  resolvedSymbol?: string;
  errorSymbol?: string;
}

export function createLoggerFactory(emitter?: LoggerFn, theme?: LoggerTheme): LoggerFactory {
  let errorLogger: ErrorLogger | undefined;

  const infoSymbol = symbols.info;
  const successSymbol = symbols.success;

  const emit = (level: "info" | "success" | "warn" | "error", message: string): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      process.stdout.write(message + "\n");
      return;
    }
    if (level === "success") {
      log.message(message, { symbol: successSymbol });
      return;
    }
    if (level === "warn") {
      log.warn(message);
      return;
    }
    if (level === "error") {
      log.error(message);
      return;
    }
    log.message(message, { symbol: infoSymbol });
  };

  const emitPair = (label: string, value: string, symbol: string): void => {
    if (emitter) {
      emitter(`${label}: ${value}`);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      process.stdout.write(`${label}: ${value}\n`);
      return;
    }
    log.message(`${label}\n   ${value}`, { symbol });
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    const scoped: ScopedLogger = {
      context: { verbose, scope },
      info(message) {
        emit("info", formatMessage(message));
      },
      data(message) {
        if (emitter) {
          emitter(message);
          return;
        }
        process.stdout.write(message + "\n");
      },
      success(message) {
        emit("success", message);
      },
      warn(message) {
        emit("warn", formatMessage(message));
      },
      error(message) {
        emit("error", formatMessage(message));
      },
      errorResolved(label, value) {
        emitPair(label, value, theme?.errorSymbol ?? chalk.red("■"));
      },
      errorWithStack(error, errorContext) {
        emit("error", formatMessage(error.message));
        errorLogger?.logError(error, {
          ...errorContext,
          scope,
          component: scope
        });
      },
      logException(error, operation, errorContext) {
        emit("error", formatMessage(`Error during ${operation}: ${error.message}`));
        errorLogger?.logErrorWithStackTrace(error, operation, {
          ...errorContext,
          scope,
          component: scope
        });
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        // stdout carries only the document in json mode
        if (resolveOutputFormat() === "json") {
          process.stderr.write(formatMessage(message) + "\n");
          return;
        }
        if (emitter) {
          emitter(formatMessage(message));
          return;
        }
        if (resolveOutputFormat() !== "terminal") {
          process.stdout.write(formatMessage(message) + "\n");
          return;
        }
        log.message(formatMessage(message), { symbol: chalk.gray("│") });
      },
      intro(title) {
        if (resolveOutputFormat() === "json") {
          return;
        }
        if (emitter) {
          emitter(title);
          return;
        }
        if (theme?.intro) {
          introPlain(theme.intro(title));
          return;
        }
        designIntro(title);
      },
      resolved(label, value) {
        emitPair(label, value, theme?.resolvedSymbol ?? chalk.cyan("◇"));
      },
      child(next) {
        return create({
          verbose: next.verbose ?? verbose,
          scope: next.scope ?? scope
        });
      }
    };

    return scoped;
  };

  return {
    base: emitter ?? ((message) => log.message(message, { symbol: infoSymbol })),
    create,
    setErrorLogger(logger: ErrorLogger) {
      errorLogger = logger;
    }
  };
}

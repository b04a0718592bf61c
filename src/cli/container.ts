import type { FileSystem } from "../utils/file-system.js";
import {
  createCliEnvironment,
  type CliEnvironment,
  type CliEnvironmentInit
} from "./environment.js";
import type { ErrorLogger } from "./error-logger.js";
import { createLoggerFactory, type LoggerFactory } from "./logger.js";
import type { LoggerFn } from "./types.js";
import { createCliDesignLanguage } from "./ui/design-language.js";

export interface CliDependencies {
  fs: FileSystem;
  env: CliEnvironmentInit;
  logger?: LoggerFn;
  errorLogger?: ErrorLogger;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  env: CliEnvironment;
  fs: FileSystem;
  loggerFactory: LoggerFactory;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);
  const design = createCliDesignLanguage(env);
  const loggerFactory = createLoggerFactory(dependencies.logger, {
    intro: design.text.intro,
    resolvedSymbol: design.symbols.resolved,
    errorSymbol: design.symbols.errorResolved
  });
  if (dependencies.errorLogger) {
    loggerFactory.setErrorLogger(dependencies.errorLogger);
  }

  return {
    env,
    fs: dependencies.fs,
    loggerFactory
  };
}

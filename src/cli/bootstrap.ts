import * as nodeFsSync from "node:fs";
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { join } from "node:path";
import { log } from "@stagecheck/design-system";
import { nodeFileSystem } from "@stagecheck/plan-validator";
import chalk from "chalk";
import type { Command } from "commander";
import { createCliEnvironment } from "./environment.js";
import { ErrorLogger } from "./error-logger.js";
import { CliError, SilentError } from "./errors.js";
import type { CliDependencies } from "./program.js";

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const env = createCliEnvironment({
      cwd: process.cwd(),
      homeDir: homedir(),
      platform: process.platform,
      variables: process.env
    });

    const errorLogger = new ErrorLogger({
      fs: nodeFsSync,
      logDir: env.logDir,
      logToStderr: env.logToStderr
    });

    const program = programFactory({
      fs: nodeFileSystem,
      env: {
        cwd: env.cwd,
        homeDir: env.homeDir,
        platform: env.platform,
        variables: env.variables
      },
      errorLogger,
      exitOverride: false
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof SilentError) {
        if (error.exitCode !== 0) {
          process.exitCode = error.exitCode;
        }
        return;
      }
      if (error instanceof Error) {
        errorLogger.logErrorWithStackTrace(error, "CLI execution", {
          component: "main",
          argv: process.argv
        });

        if (error instanceof CliError && error.isUserError) {
          log.error(error.message);
        } else {
          log.error(`Error: ${error.message}`);
          log.message(`See logs at ${join(env.logDir, "errors.log")} for more details.`, {
            symbol: chalk.cyan("●")
          });
        }

        process.exit(1);
      }
      throw error;
    }
  };
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Unresolvable entry; compare the raw path only.
  }

  return candidates.includes(moduleUrl);
}

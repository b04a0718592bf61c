import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import type { ScopedLogger } from "../logger.js";

export interface CommandFlags {
  verbose: boolean;
}

export interface ExecutionResources {
  logger: ScopedLogger;
}

export function resolveCommandFlags(program: Command): CommandFlags {
  const opts = program.optsWithGlobals();
  return {
    verbose: Boolean(opts.verbose)
  };
}

export function createExecutionResources(
  container: CliContainer,
  flags: CommandFlags,
  scope: string
): ExecutionResources {
  return {
    logger: container.loggerFactory.create({
      verbose: flags.verbose,
      scope
    })
  };
}

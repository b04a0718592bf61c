import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { VersionExit } from "../exit-signals.js";

export function registerVersionOption(
  program: Command,
  container: CliContainer,
  currentVersion: string
): void {
  program.option("-V, --version", "output the version number");

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.version) {
      const logger = container.loggerFactory.create({ scope: "version" });
      logger.info(`stagecheck ${currentVersion}`);
      throw new VersionExit();
    }
  });
}

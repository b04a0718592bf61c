import { Command, Help } from "commander";
import { createRequire } from "node:module";
import {
  createCliContainer,
  type CliContainer,
  type CliDependencies
} from "./container.js";
import {
  createCliDesignLanguage,
  type CliDesignLanguage
} from "./ui/design-language.js";
import { registerValidateCommand } from "./commands/validate.js";
import { registerRulesCommand } from "./commands/rules.js";
import { registerVersionOption } from "./commands/version.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

function readVersion(manifest: unknown): string {
  if (manifest && typeof manifest === "object" && "version" in manifest) {
    return String(manifest.version);
  }
  return "0.0.0";
}

function formatHelpText(design: CliDesignLanguage): string {
  const { text } = design;

  const commandWidth = 9;
  const cmd = (name: string, args: string) => {
    const padded = name.padEnd(commandWidth);
    const argument = args ? ` ${text.argument(args)}` : "";
    return `  ${text.command(padded)}${argument}`;
  };
  const example = (value: string) =>
    `                              ${text.example(value)}`;
  const opt = (flag: string, desc: string) =>
    `  ${text.option(flag.padEnd(28))}${desc}`;

  return [
    text.heading(design.copy.tagline),
    "",
    `${text.section("Usage:")} ${text.usageCommand("stagecheck")} ${text.argument("<command> [...options]")}`,
    "",
    text.section("Commands:"),
    cmd("validate", "[plan]") + "           Check stage ordering and completion criteria",
    example("stagecheck validate .agents/plans/plan.yaml"),
    example("stagecheck validate --output json"),
    "",
    cmd("rules", "") + "                    List the violation kinds a plan is checked for",
    "",
    text.section("Options:"),
    opt("--verbose", "Show verbose logs"),
    opt("-V, --version", "Output the version number"),
    opt("-h, --help", "Display help for command"),
    "",
    opt("<command> --help", "Print help text for command")
  ].join("\n");
}

function formatSubcommandHelp(
  cmd: Command,
  helper: Help,
  design: CliDesignLanguage
): string {
  const { text } = design;
  const termWidth = helper.padWidth(cmd, helper);
  const itemIndentWidth = 2;
  const itemSeparatorWidth = 2;
  const padWidth = termWidth + itemSeparatorWidth;
  const indent = " ".repeat(itemIndentWidth);

  const formatItem = (
    term: string,
    description: string,
    style: (value: string) => string
  ): string => {
    const padding = " ".repeat(Math.max(0, padWidth - term.length));
    const styledTerm = `${style(term)}${padding}`;
    if (!description) {
      return style(term);
    }
    return `${styledTerm}${description}`;
  };

  const indentBlock = (value: string): string =>
    value
      .split("\n")
      .map((line) => `${indent}${line}`)
      .join("\n");

  const formatList = (items: string[]): string =>
    items.map(indentBlock).join("\n");

  const output: string[] = [];
  output.push(text.heading(`stagecheck - ${cmd.name()}`), "");
  output.push(
    `${text.section("Usage:")} ${text.usageCommand(helper.commandUsage(cmd))}`,
    ""
  );

  const commandDescription = helper.commandDescription(cmd);
  if (commandDescription.length > 0) {
    output.push(commandDescription, "");
  }

  const argumentList = helper.visibleArguments(cmd).map((argument) =>
    formatItem(
      helper.argumentTerm(argument),
      helper.argumentDescription(argument),
      text.argument
    )
  );
  if (argumentList.length > 0) {
    output.push(text.section("Arguments:"), formatList(argumentList), "");
  }

  const optionList = helper.visibleOptions(cmd).map((option) =>
    formatItem(
      helper.optionTerm(option),
      helper.optionDescription(option),
      text.option
    )
  );
  if (optionList.length > 0) {
    output.push(text.section("Options:"), formatList(optionList), "");
  }

  if (helper.showGlobalOptions) {
    const globalOptionList = helper.visibleGlobalOptions(cmd).map((option) =>
      formatItem(
        helper.optionTerm(option),
        helper.optionDescription(option),
        text.option
      )
    );
    if (globalOptionList.length > 0) {
      output.push(
        text.section("Global Options:"),
        formatList(globalOptionList),
        ""
      );
    }
  }

  const commandList = helper.visibleCommands(cmd).map((subcommand) =>
    formatItem(
      helper.subcommandTerm(subcommand),
      helper.subcommandDescription(subcommand),
      text.command
    )
  );
  if (commandList.length > 0) {
    output.push(text.section("Commands:"), formatList(commandList), "");
  }

  return output.join("\n");
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  const design = createCliDesignLanguage(container.env);
  program
    .name("stagecheck")
    .description(design.copy.tagline)
    .option("--verbose", "Show verbose logs.")
    .helpOption("-h, --help", "Display help for command")
    .configureHelp({
      formatHelp: (cmd, helper) => {
        if (cmd.name() === "stagecheck") {
          return formatHelpText(design);
        }
        return formatSubcommandHelp(cmd, helper, design);
      }
    });

  registerVersionOption(program, container, readVersion(packageJson));
  registerValidateCommand(program, container);
  registerRulesCommand(program, container);

  program.action(() => {
    program.outputHelp();
  });

  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}

import { getTheme, symbols, text } from "@stagecheck/design-system";
import type { CliEnvironment } from "../environment.js";

export interface CliTextStyles {
  intro(text: string): string;
  heading(text: string): string;
  section(text: string): string;
  command(text: string): string;
  argument(text: string): string;
  option(text: string): string;
  example(text: string): string;
  usageCommand(text: string): string;
  muted(text: string): string;
}

export interface CliCopy {
  tagline: string;
}

export interface CliDesignLanguage {
  text: CliTextStyles;
  symbols: {
    resolved: string;
    errorResolved: string;
  };
  copy: CliCopy;
}

export function createCliCopy(): CliCopy {
  return {
    tagline: "Check staged implementation plans before anyone builds them."
  };
}

export function createCliDesignLanguage(env: CliEnvironment): CliDesignLanguage {
  const theme = getTheme(env.variables);

  return {
    text: {
      intro: theme.intro,
      heading: theme.header,
      section: text.section,
      command: theme.accent,
      argument: theme.muted,
      option: text.option,
      example: theme.muted,
      usageCommand: text.usageCommand,
      muted: theme.muted
    },
    symbols: {
      resolved: symbols.resolved,
      errorResolved: symbols.errorResolved
    },
    copy: createCliCopy()
  };
}

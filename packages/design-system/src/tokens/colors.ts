import chalk from "chalk";

export const brand = "#0f9d8a";

export const dark = {
  header: (text: string) => chalk.cyanBright.bold(text),
  divider: (text: string) => chalk.dim(text),
  intro: (text: string) => chalk.bgCyan.black(` stagecheck - ${text} `),
  resolvedSymbol: chalk.cyan("◇"),
  errorSymbol: chalk.red("■"),
  accent: (text: string) => chalk.cyan(text),
  muted: (text: string) => chalk.dim(text),
  success: (text: string) => chalk.green(text),
  warning: (text: string) => chalk.yellow(text),
  error: (text: string) => chalk.red(text),
  info: (text: string) => chalk.cyan(text)
};

export const light = {
  header: (text: string) => chalk.hex(brand).bold(text),
  divider: (text: string) => chalk.hex("#666666")(text),
  intro: (text: string) => chalk.bgHex(brand).white(` stagecheck - ${text} `),
  resolvedSymbol: chalk.hex(brand)("◇"),
  errorSymbol: chalk.hex("#cc0000")("■"),
  accent: (text: string) => chalk.hex("#006699").bold(text),
  muted: (text: string) => chalk.hex("#666666")(text),
  success: (text: string) => chalk.hex("#008800")(text),
  warning: (text: string) => chalk.hex("#cc6600")(text),
  error: (text: string) => chalk.hex("#cc0000")(text),
  info: (text: string) => chalk.hex(brand)(text)
};

export type ThemeName = "dark" | "light";
export type ThemePalette = typeof dark;

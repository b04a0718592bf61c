import chalk from "chalk";
import { getTheme } from "../internal/theme-detect.js";

export const text = {
  intro(content: string): string {
    return getTheme().intro(content);
  },
  heading(content: string): string {
    return getTheme().header(content);
  },
  section(content: string): string {
    return chalk.bold(content);
  },
  command(content: string): string {
    return getTheme().accent(content);
  },
  argument(content: string): string {
    return getTheme().muted(content);
  },
  option(content: string): string {
    return chalk.yellow(content);
  },
  example(content: string): string {
    return getTheme().muted(content);
  },
  usageCommand(content: string): string {
    return chalk.green(content);
  },
  muted(content: string): string {
    return getTheme().muted(content);
  },
  kind(content: string): string {
    return getTheme().warning(content);
  }
} as const;

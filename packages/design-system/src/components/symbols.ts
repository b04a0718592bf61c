import chalk from "chalk";
import { getTheme } from "../internal/theme-detect.js";

export const symbols = {
  get info(): string {
    return chalk.cyan("●");
  },
  get success(): string {
    return chalk.green("◆");
  },
  get resolved(): string {
    return getTheme().resolvedSymbol;
  },
  get errorResolved(): string {
    return getTheme().errorSymbol;
  }
} as const;

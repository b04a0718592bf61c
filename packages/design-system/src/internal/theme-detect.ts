import { dark, light, type ThemeName, type ThemePalette } from "../tokens/colors.js";

export interface ThemeEnv {
  STAGECHECK_THEME?: string;
  APPLE_INTERFACE_STYLE?: string;
  VSCODE_COLOR_THEME_KIND?: string;
  COLORFGBG?: string;
}

function detectThemeFromEnv(env: ThemeEnv): ThemeName | undefined {
  const apple = env.APPLE_INTERFACE_STYLE;
  if (typeof apple === "string") {
    return apple.toLowerCase() === "dark" ? "dark" : "light";
  }

  const vscodeKind = env.VSCODE_COLOR_THEME_KIND;
  if (typeof vscodeKind === "string") {
    const normalized = vscodeKind.toLowerCase();
    if (normalized.includes("light")) {
      return "light";
    }
    if (normalized.includes("dark")) {
      return "dark";
    }
  }

  const colorFGBG = env.COLORFGBG;
  if (typeof colorFGBG === "string") {
    const background = Number.parseInt(colorFGBG.split(";").at(-1) ?? "", 10);
    if (Number.isFinite(background)) {
      return background >= 8 ? "light" : "dark";
    }
  }

  return undefined;
}

export function resolveThemeName(env: ThemeEnv = process.env): ThemeName {
  const raw = env.STAGECHECK_THEME?.toLowerCase();
  if (raw === "light" || raw === "dark") {
    return raw;
  }
  return detectThemeFromEnv(env) ?? "dark";
}

let cachedTheme: ThemePalette | undefined;

export function getTheme(env?: ThemeEnv): ThemePalette {
  if (cachedTheme) {
    return cachedTheme;
  }
  cachedTheme = resolveThemeName(env) === "light" ? light : dark;
  return cachedTheme;
}

export function resetThemeCache(): void {
  cachedTheme = undefined;
}

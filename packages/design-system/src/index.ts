// Tokens
export { brand, dark, light } from "./tokens/colors.js";
export type { ThemeName, ThemePalette } from "./tokens/colors.js";

// Components
export { text } from "./components/text.js";
export { symbols } from "./components/symbols.js";
export { renderTable, stripAnsi } from "./components/table.js";
export type { TableColumn, RenderTableOptions } from "./components/table.js";

// Prompts
export { intro, introPlain, select, isCancel, log } from "./prompts/index.js";
export type { SelectOptions } from "./prompts/index.js";

// Internal utilities (for advanced use)
export { getTheme, resolveThemeName, resetThemeCache } from "./internal/theme-detect.js";
export type { ThemeEnv } from "./internal/theme-detect.js";
export {
  resolveOutputFormat,
  setOutputFormat,
  isOutputFormat,
  resetOutputFormatCache
} from "./internal/output-format.js";
export type { OutputFormat } from "./internal/output-format.js";

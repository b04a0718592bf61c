import { describe, it, expect, beforeEach } from "vitest";
import { resolveThemeName, getTheme, resetThemeCache } from "./theme-detect.js";
import { dark, light } from "../tokens/colors.js";

describe("theme-detect", () => {
  beforeEach(() => {
    resetThemeCache();
  });

  describe("resolveThemeName", () => {
    it("returns dark by default", () => {
      expect(resolveThemeName({})).toBe("dark");
    });

    it("respects STAGECHECK_THEME case-insensitively", () => {
      expect(resolveThemeName({ STAGECHECK_THEME: "LIGHT" })).toBe("light");
      expect(resolveThemeName({ STAGECHECK_THEME: "Dark" })).toBe("dark");
    });

    it("detects the theme from APPLE_INTERFACE_STYLE", () => {
      expect(resolveThemeName({ APPLE_INTERFACE_STYLE: "Dark" })).toBe("dark");
      expect(resolveThemeName({ APPLE_INTERFACE_STYLE: "Light" })).toBe("light");
    });

    it("detects the theme from VSCODE_COLOR_THEME_KIND", () => {
      expect(resolveThemeName({ VSCODE_COLOR_THEME_KIND: "vscode-light" })).toBe("light");
      expect(resolveThemeName({ VSCODE_COLOR_THEME_KIND: "vscode-dark" })).toBe("dark");
    });

    it("reads the background colour from COLORFGBG", () => {
      expect(resolveThemeName({ COLORFGBG: "15;0" })).toBe("dark");
      expect(resolveThemeName({ COLORFGBG: "0;15" })).toBe("light");
    });

    it("ignores an unparsable COLORFGBG", () => {
      expect(resolveThemeName({ COLORFGBG: "default" })).toBe("dark");
    });

    it("gives STAGECHECK_THEME precedence over detection", () => {
      expect(
        resolveThemeName({ STAGECHECK_THEME: "light", APPLE_INTERFACE_STYLE: "Dark" })
      ).toBe("light");
    });
  });

  describe("getTheme", () => {
    it("returns the palette for the resolved name", () => {
      expect(getTheme({ STAGECHECK_THEME: "light" })).toBe(light);
    });

    it("caches the theme until reset", () => {
      const first = getTheme({ STAGECHECK_THEME: "light" });
      expect(getTheme({ STAGECHECK_THEME: "dark" })).toBe(first);
      resetThemeCache();
      expect(getTheme({ STAGECHECK_THEME: "dark" })).toBe(dark);
    });
  });
});

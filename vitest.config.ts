import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";
import fs from "node:fs";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

function getPackageAliases(): Record<string, string> {
  const packagesDir = path.resolve(rootDir, "packages");
  const packages = fs
    .readdirSync(packagesDir, { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name);

  const mainAliases: Record<string, string> = {};
  const subpathAliases: Record<string, string> = {};

  for (const pkg of packages) {
    mainAliases[`@stagecheck/${pkg}`] = path.resolve(packagesDir, pkg, "src/index.ts");

    const testingIndexPath = path.resolve(packagesDir, pkg, "src/testing/index.ts");
    if (fs.existsSync(testingIndexPath)) {
      subpathAliases[`@stagecheck/${pkg}/testing`] = testingIndexPath;
    }
  }

  // Subpath aliases must come first for correct resolution
  return { ...subpathAliases, ...mainAliases };
}

export default defineConfig({
  resolve: {
    // Resolve workspace packages to source for tests (no build required)
    alias: getPackageAliases()
  },
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts", "packages/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"]
  }
});

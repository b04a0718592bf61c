import type { PlanFileSystem } from "@stagecheck/plan-validator";

/**
 * File access the commands need. Tests pass a memfs volume; the CLI passes
 * `node:fs/promises`.
 */
export type FileSystem = PlanFileSystem;

import path from "node:path";
import { isCancel, select } from "@stagecheck/design-system";
import { DEFAULT_PLANS_DIR } from "../config/loader.js";
import { PlanNotFoundError, PlanSelectionCancelledError } from "../errors.js";
import { isNotFound, nodeFileSystem, type PlanFileSystem } from "../internal/fs.js";

export type PlanResolverFileSystem = Pick<PlanFileSystem, "readdir" | "stat">;

export type ResolvePlanPathOptions = {
  /**
   * Working directory used to resolve relative paths and locate the plans directory.
   */
  cwd: string;
  /**
   * Explicit plan path (e.g. from `--plan`). When provided, no discovery/prompting
   * is performed.
   */
  plan?: string;
  /**
   * Directory searched for `plan*.yaml|yml|json` files, relative to `cwd`.
   */
  plansDir?: string;
  fs?: PlanResolverFileSystem;
};

const PLAN_EXTENSIONS = new Set([".yml", ".yaml", ".json"]);

function isPlanCandidateFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.startsWith("plan") && PLAN_EXTENSIONS.has(path.extname(lower));
}

async function listPlanCandidates(
  fs: PlanResolverFileSystem,
  cwd: string,
  plansDir: string
): Promise<string[]> {
  const dir = path.resolve(cwd, plansDir);
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const candidates: string[] = [];
  for (const entry of entries) {
    if (!isPlanCandidateFile(entry)) {
      continue;
    }
    const absPath = path.join(dir, entry);
    const stats = await fs.stat(absPath);
    if (stats.isFile()) {
      candidates.push(path.relative(cwd, absPath));
    }
  }

  candidates.sort((a, b) => a.localeCompare(b));
  return candidates;
}

/**
 * Resolves which plan file to check. Returns null when discovery finds
 * nothing.
 *
 * @throws PlanSelectionCancelledError when the user cancels the selection prompt.
 */
export async function resolvePlanPath(
  options: ResolvePlanPathOptions
): Promise<string | null> {
  const fs = options.fs ?? nodeFileSystem;
  const cwd = options.cwd;

  const provided = options.plan?.trim();
  if (provided) {
    const absPath = path.resolve(cwd, provided);
    const notFound = new PlanNotFoundError(provided);
    try {
      const stats = await fs.stat(absPath);
      if (!stats.isFile()) {
        throw notFound;
      }
    } catch (error) {
      if (isNotFound(error)) {
        throw notFound;
      }
      throw error;
    }
    return provided;
  }

  const candidates = await listPlanCandidates(fs, cwd, options.plansDir ?? DEFAULT_PLANS_DIR);
  const [first] = candidates;
  if (first === undefined) {
    return null;
  }
  if (candidates.length === 1) {
    return first;
  }

  const selection = await select({
    message: "Select a plan file to validate",
    options: candidates.map((candidate) => ({
      label: candidate,
      value: candidate
    }))
  });

  if (isCancel(selection) || typeof selection !== "string") {
    throw new PlanSelectionCancelledError();
  }
  return selection;
}

import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import { isNotFound, nodeFileSystem, type PlanFileSystem } from "../internal/fs.js";
import { DEFAULT_VAGUE_TERMS } from "../validate/vague.js";

export const CONFIG_DIR = ".stagecheck";
export const DEFAULT_PLANS_DIR = path.join(".agents", "plans");

export type StagecheckConfig = {
  vagueTerms?: string[];
  extraVagueTerms?: string[];
  plansDir?: string;
  hints?: boolean;
};

type ConfigLoaderFileSystem = Pick<PlanFileSystem, "readFile">;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function pickOptionalString(
  config: Record<string, unknown>,
  key: keyof StagecheckConfig
): string | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid "${key}": expected a string.`);
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function pickOptionalBoolean(
  config: Record<string, unknown>,
  key: keyof StagecheckConfig
): boolean | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid "${key}": expected a boolean.`);
  }
  return value;
}

function pickOptionalStringList(
  config: Record<string, unknown>,
  key: keyof StagecheckConfig
): string[] | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`Invalid "${key}": expected a list of strings.`);
  }
  return value.filter((item): item is string => typeof item === "string");
}

export async function loadConfig(
  cwd: string,
  deps?: { fs?: ConfigLoaderFileSystem }
): Promise<StagecheckConfig> {
  const fs = deps?.fs ?? nodeFileSystem;
  const configDir = path.join(cwd, CONFIG_DIR);
  const candidates = [
    { format: "yaml", sourcePath: path.join(configDir, "config.yaml") },
    { format: "json", sourcePath: path.join(configDir, "config.json") }
  ] as const;

  let found: { raw: string; format: "yaml" | "json"; sourcePath: string } | null = null;
  for (const candidate of candidates) {
    try {
      const raw = await fs.readFile(candidate.sourcePath, "utf8");
      found = { raw, ...candidate };
      break;
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  if (!found) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = found.format === "yaml" ? YAML.parse(found.raw) : JSON.parse(found.raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Invalid stagecheck config ${found.format.toUpperCase()} at ${found.sourcePath}: ${detail}`,
      { sourcePath: found.sourcePath, cause: error }
    );
  }

  if (parsed == null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Invalid stagecheck config at ${found.sourcePath}: expected an object.`, {
      sourcePath: found.sourcePath
    });
  }

  const result: StagecheckConfig = {};

  const vagueTerms = pickOptionalStringList(parsed, "vagueTerms");
  if (vagueTerms) result.vagueTerms = vagueTerms;
  const extraVagueTerms = pickOptionalStringList(parsed, "extraVagueTerms");
  if (extraVagueTerms) result.extraVagueTerms = extraVagueTerms;
  const plansDir = pickOptionalString(parsed, "plansDir");
  if (plansDir) result.plansDir = plansDir;
  const hints = pickOptionalBoolean(parsed, "hints");
  if (hints != null) result.hints = hints;

  return result;
}

/**
 * Builds the vague-term denylist: the config's `vagueTerms` (or the defaults),
 * then `extraVagueTerms`, then terms given on the command line.
 */
export function resolveVagueTerms(
  config: StagecheckConfig,
  extraTerms: readonly string[] = []
): string[] {
  const terms = [
    ...(config.vagueTerms ?? DEFAULT_VAGUE_TERMS),
    ...(config.extraVagueTerms ?? []),
    ...extraTerms
  ];
  const normalized = terms
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0);
  return Array.from(new Set(normalized));
}

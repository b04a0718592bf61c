import path from "node:path";
import { parse } from "yaml";
import { InvalidPlanError } from "../errors.js";
import type { Plan, Stage } from "./types.js";

export type PlanFormat = "yaml" | "json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  throw new InvalidPlanError("expected string", { field });
}

function asRequiredName(value: unknown, field: string): string {
  const str = asOptionalString(value, field)?.trim();
  if (!str) throw new InvalidPlanError("required", { field });
  return str;
}

function asInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

function asStageId(value: unknown, field: string): number {
  if (value === undefined || value === null) {
    throw new InvalidPlanError("required", { field });
  }
  const id = asInteger(value);
  if (id === undefined || id < 1) {
    throw new InvalidPlanError("expected a positive integer", { field });
  }
  return id;
}

function asDependencyIds(value: unknown, field: string): number[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  const ids: number[] = [];
  items.forEach((item, i) => {
    const id = asInteger(item);
    if (id === undefined) {
      throw new InvalidPlanError("expected an integer stage id", { field: `${field}[${i}]` });
    }
    if (!ids.includes(id)) ids.push(id);
  });
  return ids;
}

function asStringArray(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) {
    return value.map((v, i) => {
      if (typeof v !== "string") {
        throw new InvalidPlanError("expected string", { field: `${field}[${i}]` });
      }
      return v;
    });
  }
  throw new InvalidPlanError("expected string[]", { field });
}

function asOptionalVersion(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num === "number" && Number.isFinite(num)) return num;
  throw new InvalidPlanError("expected number", { field: "version" });
}

function parseStage(value: unknown, index: number): Stage {
  const field = `stages[${index}]`;
  if (!isRecord(value)) throw new InvalidPlanError("expected object", { field });

  const criteriaKey = value.completionCriteria !== undefined ? "completionCriteria" : "criteria";
  const stage: Stage = {
    id: asStageId(value.id, `${field}.id`),
    name: asRequiredName(value.name, `${field}.name`),
    dependsOn: asDependencyIds(value.dependsOn, `${field}.dependsOn`),
    completionCriteria: asStringArray(value[criteriaKey], `${field}.${criteriaKey}`)
  };
  const description = asOptionalString(value.description, `${field}.description`);
  if (description !== undefined) stage.description = description;
  return stage;
}

/**
 * Builds a {@link Plan} from already-decoded data: either an object with a
 * `stages` list or a bare list of stage records.
 *
 * @throws InvalidPlanError when a required field is missing or mistyped.
 */
export function createPlan(value: unknown): Plan {
  if (Array.isArray(value)) {
    return { stages: value.map((s, i) => parseStage(s, i)) };
  }
  if (!isRecord(value)) {
    throw new InvalidPlanError("expected a plan object or a list of stages");
  }

  const stagesValue = value.stages ?? [];
  if (!Array.isArray(stagesValue)) {
    throw new InvalidPlanError("expected array", { field: "stages" });
  }

  const plan: Plan = { stages: stagesValue.map((s, i) => parseStage(s, i)) };
  const project = asOptionalString(value.project, "project");
  if (project !== undefined) plan.project = project;
  const version = asOptionalVersion(value.version);
  if (version !== undefined) plan.version = version;
  return plan;
}

export function detectPlanFormat(filePath: string): PlanFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

export function parsePlan(
  content: string,
  options: { format?: PlanFormat } = {}
): Plan {
  const format = options.format ?? "yaml";
  let doc: unknown;
  try {
    doc = format === "json" ? JSON.parse(content) : parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidPlanError(`Invalid plan ${format.toUpperCase()}: ${message}`, {
      cause: error
    });
  }

  if (doc === undefined || doc === null) {
    throw new InvalidPlanError("Plan document is empty");
  }
  return createPlan(doc);
}

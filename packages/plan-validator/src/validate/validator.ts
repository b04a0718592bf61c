import type { Plan, Report, Stage, Violation, ViolationKind } from "../plan/types.js";
import { createVagueMatcher, DEFAULT_VAGUE_TERMS } from "./vague.js";

export type ValidateOptions = {
  /** Subjective terms that may not serve as a completion criterion on their own. */
  vagueTerms?: readonly string[];
};

const PASS_ORDER: Record<ViolationKind, number> = {
  DuplicateId: 1,
  DuplicateName: 1,
  UnknownDependency: 2,
  ForwardOrSelfDependency: 2,
  CyclicDependency: 3,
  MissingCriteria: 4,
  VagueCriteria: 4
};

/**
 * Checks a plan against the stage-ordering rules and lists every breach.
 * Violations are ordered by stage declaration, then by rule, then by the
 * order they were found in.
 */
export function validate(plan: Plan, options: ValidateOptions = {}): Report {
  const { stages } = plan;
  const violations: Violation[] = [];

  const firstIndexById = checkUniqueness(stages, violations);
  checkReferences(stages, firstIndexById, violations);
  checkCycles(stages, firstIndexById, violations);
  checkCriteria(stages, options.vagueTerms ?? DEFAULT_VAGUE_TERMS, violations);

  // Array#sort is stable, so discovery order survives within a stage and pass.
  violations.sort(
    (a, b) => a.stageIndex - b.stageIndex || PASS_ORDER[a.kind] - PASS_ORDER[b.kind]
  );

  return {
    valid: violations.length === 0,
    violations
  };
}

function label(stage: Stage): string {
  return `stage ${stage.id} ("${stage.name}")`;
}

function checkUniqueness(stages: Stage[], violations: Violation[]): Map<number, number> {
  const firstIndexById = new Map<number, number>();
  const firstIdByName = new Map<string, number>();

  stages.forEach((stage, stageIndex) => {
    const existingIndex = firstIndexById.get(stage.id);
    if (existingIndex === undefined) {
      firstIndexById.set(stage.id, stageIndex);
    } else {
      violations.push({
        kind: "DuplicateId",
        stageId: stage.id,
        stageIndex,
        relatedStageId: stage.id,
        detail: `Stage id ${stage.id} is already used by the stage at position ${existingIndex + 1}.`
      });
    }

    const existingId = firstIdByName.get(stage.name);
    if (existingId === undefined) {
      firstIdByName.set(stage.name, stage.id);
    } else {
      violations.push({
        kind: "DuplicateName",
        stageId: stage.id,
        stageIndex,
        relatedStageId: existingId,
        detail: `Stage name "${stage.name}" is already defined by stage ${existingId}.`
      });
    }
  });

  return firstIndexById;
}

function checkReferences(
  stages: Stage[],
  firstIndexById: Map<number, number>,
  violations: Violation[]
): void {
  stages.forEach((stage, stageIndex) => {
    for (const dependency of stage.dependsOn) {
      const targetIndex = firstIndexById.get(dependency);
      const target = targetIndex === undefined ? undefined : stages[targetIndex];
      if (!target) {
        violations.push({
          kind: "UnknownDependency",
          stageId: stage.id,
          stageIndex,
          relatedStageId: dependency,
          detail: `Depends on stage ${dependency}, which is not defined in the plan.`
        });
        continue;
      }
      if (dependency >= stage.id) {
        violations.push({
          kind: "ForwardOrSelfDependency",
          stageId: stage.id,
          stageIndex,
          relatedStageId: dependency,
          detail:
            dependency === stage.id
              ? "Depends on itself."
              : `Depends on ${label(target)}, which comes later in the plan.`
        });
      }
    }
  });
}

type VisitState = "new" | "active" | "done";

/**
 * Depth-first search over every known reference, independent of the id
 * ordering rule so plans with unordered ids are still caught. Nodes are
 * declaration positions; a reference resolves to the first stage with that id.
 */
function checkCycles(
  stages: Stage[],
  firstIndexById: Map<number, number>,
  violations: Violation[]
): void {
  const edges = stages.map((stage) => {
    const targets: number[] = [];
    for (const dependency of stage.dependsOn) {
      const targetIndex = firstIndexById.get(dependency);
      if (dependency !== stage.id && targetIndex !== undefined) {
        targets.push(targetIndex);
      }
    }
    return targets;
  });

  const states: VisitState[] = stages.map(() => "new");
  const path: number[] = [];

  const reportCycle = (fromIndex: number, toIndex: number): void => {
    const from = stages[fromIndex];
    const to = stages[toIndex];
    if (!from || !to) return;
    const cycle = [...path.slice(path.indexOf(toIndex)), toIndex]
      .map((index) => stages[index]?.id)
      .join(" -> ");
    violations.push({
      kind: "CyclicDependency",
      stageId: from.id,
      stageIndex: fromIndex,
      relatedStageId: to.id,
      detail: `Depending on ${label(to)} closes a dependency cycle: ${cycle}.`
    });
  };

  const visit = (index: number): void => {
    states[index] = "active";
    path.push(index);
    for (const targetIndex of edges[index] ?? []) {
      if (states[targetIndex] === "active") {
        reportCycle(index, targetIndex);
      } else if (states[targetIndex] === "new") {
        visit(targetIndex);
      }
    }
    path.pop();
    states[index] = "done";
  };

  stages.forEach((_stage, index) => {
    if (states[index] === "new") {
      visit(index);
    }
  });
}

function checkCriteria(
  stages: Stage[],
  vagueTerms: readonly string[],
  violations: Violation[]
): void {
  const isVague = createVagueMatcher(vagueTerms);

  stages.forEach((stage, stageIndex) => {
    if (stage.completionCriteria.length === 0) {
      violations.push({
        kind: "MissingCriteria",
        stageId: stage.id,
        stageIndex,
        detail: "Declares no completion criteria."
      });
      return;
    }
    for (const criterion of stage.completionCriteria) {
      if (isVague(criterion)) {
        violations.push({
          kind: "VagueCriteria",
          stageId: stage.id,
          stageIndex,
          criterion,
          detail: `Completion criterion "${criterion}" is not verifiable.`
        });
      }
    }
  });
}

export type Stage = {
  id: number;
  name: string;
  dependsOn: number[];
  completionCriteria: string[];
  description?: string;
};

export type Plan = {
  version?: number;
  project?: string;
  stages: Stage[];
};

export const VIOLATION_KINDS = [
  "DuplicateId",
  "DuplicateName",
  "UnknownDependency",
  "ForwardOrSelfDependency",
  "CyclicDependency",
  "MissingCriteria",
  "VagueCriteria"
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

export type Violation = {
  kind: ViolationKind;
  stageId: number;
  /** Declaration position of the offending stage; disambiguates repeated ids. */
  stageIndex: number;
  /** The referenced, duplicated or cycle-closing stage for cross-stage violations. */
  relatedStageId?: number;
  criterion?: string;
  detail: string;
};

export type Report = {
  valid: boolean;
  violations: Violation[];
};

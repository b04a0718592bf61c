import type { ViolationKind } from "../plan/types.js";

export type ViolationKindInfo = {
  title: string;
  hint: string;
};

const KIND_INFO: Record<ViolationKind, ViolationKindInfo> = {
  DuplicateId: {
    title: "Duplicate stage id",
    hint: "Give every stage its own id; renumber the later stage and update references to it."
  },
  DuplicateName: {
    title: "Duplicate stage name",
    hint: "Define each component in exactly one stage; merge the stages or rename one of them."
  },
  UnknownDependency: {
    title: "Unknown dependency",
    hint: "Reference only stages declared in this plan, or add the missing stage."
  },
  ForwardOrSelfDependency: {
    title: "Forward or self dependency",
    hint: "Dependencies point down: depend only on earlier stages, or move this stage after the one it needs."
  },
  CyclicDependency: {
    title: "Dependency cycle",
    hint: "Break the cycle by extracting the shared part into an earlier stage both can depend on."
  },
  MissingCriteria: {
    title: "Missing completion criteria",
    hint: "List at least one verifiable condition that marks the stage as complete."
  },
  VagueCriteria: {
    title: "Vague completion criterion",
    hint: "Replace subjective wording with something checkable, such as a command that passes or a measurable threshold."
  }
};

export function describeViolationKind(kind: ViolationKind): ViolationKindInfo {
  return KIND_INFO[kind];
}

#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

export {
  validate,
  formatReport,
  summarizeReport,
  createPlan,
  parsePlan,
  describeViolationKind,
  InvalidPlanError,
  VIOLATION_KINDS,
  DEFAULT_VAGUE_TERMS
} from "@stagecheck/plan-validator";
export type { Plan, Stage, Report, Violation, ViolationKind } from "@stagecheck/plan-validator";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main, isCliInvocation };

export type { Plan, Stage, Report, Violation, ViolationKind } from "./plan/types.js";
export { VIOLATION_KINDS } from "./plan/types.js";
export {
  ConfigError,
  InvalidPlanError,
  PlanNotFoundError,
  PlanSelectionCancelledError
} from "./errors.js";
export { createPlan, parsePlan, detectPlanFormat } from "./plan/parser.js";
export type { PlanFormat } from "./plan/parser.js";
export { resolvePlanPath } from "./plan/resolver.js";
export type { ResolvePlanPathOptions, PlanResolverFileSystem } from "./plan/resolver.js";
export { validate } from "./validate/validator.js";
export type { ValidateOptions } from "./validate/validator.js";
export { DEFAULT_VAGUE_TERMS, createVagueMatcher, isVagueCriterion } from "./validate/vague.js";
export { describeViolationKind } from "./validate/kinds.js";
export type { ViolationKindInfo } from "./validate/kinds.js";
export { formatReport, summarizeReport } from "./validate/format.js";
export type { FormatReportOptions, ViolationSummary } from "./validate/format.js";
export { loadConfig, resolveVagueTerms, CONFIG_DIR, DEFAULT_PLANS_DIR } from "./config/loader.js";
export type { StagecheckConfig } from "./config/loader.js";
export { isNotFound, nodeFileSystem } from "./internal/fs.js";
export type { PlanFileSystem } from "./internal/fs.js";

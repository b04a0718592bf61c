import { VIOLATION_KINDS, type Report, type ViolationKind } from "../plan/types.js";
import { describeViolationKind } from "./kinds.js";

export type FormatReportOptions = {
  /** Add a corrective hint under each violation. */
  hints?: boolean;
};

export function formatReport(report: Report, options: FormatReportOptions = {}): string {
  if (report.violations.length === 0) {
    return "Plan is valid.";
  }

  const count = report.violations.length;
  const lines = [`Plan has ${count} violation${count === 1 ? "" : "s"}:`];
  for (const violation of report.violations) {
    lines.push(`- [${violation.kind}] stage ${violation.stageId}: ${violation.detail}`);
    if (options.hints) {
      lines.push(`  hint: ${describeViolationKind(violation.kind).hint}`);
    }
  }
  return lines.join("\n");
}

export type ViolationSummary = {
  kind: ViolationKind;
  count: number;
};

/**
 * Counts violations per kind, listing only kinds that occur, in rule order.
 */
export function summarizeReport(report: Report): ViolationSummary[] {
  return VIOLATION_KINDS.map((kind) => ({
    kind,
    count: report.violations.filter((violation) => violation.kind === kind).length
  })).filter((entry) => entry.count > 0);
}

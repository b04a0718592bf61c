import { describe, it, expect } from "vitest";
import { formatReport, summarizeReport } from "./format.js";
import { describeViolationKind } from "./kinds.js";
import { VIOLATION_KINDS, type Report } from "../plan/types.js";

const report: Report = {
  valid: false,
  violations: [
    {
      kind: "ForwardOrSelfDependency",
      stageId: 1,
      stageIndex: 0,
      relatedStageId: 2,
      detail: 'Depends on stage 2 ("DB"), which comes later in the plan.'
    },
    {
      kind: "VagueCriteria",
      stageId: 1,
      stageIndex: 0,
      criterion: "works",
      detail: 'Completion criterion "works" is not verifiable.'
    }
  ]
};

describe("formatReport", () => {
  it("reports a valid plan in one line", () => {
    expect(formatReport({ valid: true, violations: [] })).toBe("Plan is valid.");
  });

  it("lists each violation with its kind and stage", () => {
    expect(formatReport(report)).toBe(
      [
        "Plan has 2 violations:",
        '- [ForwardOrSelfDependency] stage 1: Depends on stage 2 ("DB"), which comes later in the plan.',
        '- [VagueCriteria] stage 1: Completion criterion "works" is not verifiable.'
      ].join("\n")
    );
  });

  it("uses the singular for a single violation and can add hints", () => {
    const single: Report = { valid: false, violations: report.violations.slice(1) };

    expect(formatReport(single, { hints: true }).split("\n")).toEqual([
      "Plan has 1 violation:",
      '- [VagueCriteria] stage 1: Completion criterion "works" is not verifiable.',
      `  hint: ${describeViolationKind("VagueCriteria").hint}`
    ]);
  });
});

describe("summarizeReport", () => {
  it("counts occurring kinds in rule order", () => {
    const withDuplicate: Report = {
      valid: false,
      violations: [
        ...report.violations,
        { kind: "DuplicateName", stageId: 3, stageIndex: 2, relatedStageId: 1, detail: "" },
        { kind: "VagueCriteria", stageId: 3, stageIndex: 2, criterion: "done", detail: "" }
      ]
    };

    expect(summarizeReport(withDuplicate)).toEqual([
      { kind: "DuplicateName", count: 1 },
      { kind: "ForwardOrSelfDependency", count: 1 },
      { kind: "VagueCriteria", count: 2 }
    ]);
  });
});

describe("describeViolationKind", () => {
  it("has a title and hint for every kind", () => {
    for (const kind of VIOLATION_KINDS) {
      const info = describeViolationKind(kind);
      expect(info.title.length).toBeGreaterThan(0);
      expect(info.hint.length).toBeGreaterThan(0);
    }
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resetOutputFormatCache } from "@stagecheck/design-system";
import { createMemFs } from "@stagecheck/plan-validator/testing";
import { createProgram } from "../program.js";
import { OperationCancelledError, ValidationError } from "../errors.js";
import { PlanViolationsExit } from "../exit-signals.js";

const designSelect = vi.hoisted(() => vi.fn());

vi.mock("@stagecheck/design-system", async () => {
  const actual = await vi.importActual<Record<string, unknown>>("@stagecheck/design-system");
  return {
    ...actual,
    select: designSelect,
    isCancel: (value: unknown) => typeof value === "symbol"
  };
});

const forwardPlan = [
  "stages:",
  "  - id: 1",
  "    name: API",
  "    dependsOn: [2]",
  "    completionCriteria: [works]",
  "  - id: 2",
  "    name: DB",
  "    completionCriteria: [Migrations pass]",
  ""
].join("\n");

const validPlan = JSON.stringify({
  stages: [
    { id: 1, name: "Infra", completionCriteria: ["Config loaded"] },
    { id: 2, name: "Domain", dependsOn: [1], completionCriteria: ["Unit tests >80%"] }
  ]
});

function setup(files: Record<string, string>) {
  const logs: string[] = [];
  const program = createProgram({
    fs: createMemFs(files),
    env: { cwd: "/repo", homeDir: "/home/test", variables: {} },
    logger: (message) => {
      logs.push(message);
    },
    suppressCommanderOutput: true
  });
  const run = (...args: string[]) => program.parseAsync(["node", "stagecheck", ...args]);
  return { logs, run };
}

describe("validate command", () => {
  beforeEach(() => {
    resetOutputFormatCache();
    designSelect.mockReset();
  });

  afterEach(() => {
    resetOutputFormatCache();
  });

  it("lists violations with hints and exits with code 1", async () => {
    const { logs, run } = setup({ "/repo/plan.yaml": forwardPlan });

    const result = run("validate", "plan.yaml", "--output", "markdown");

    await expect(result).rejects.toBeInstanceOf(PlanViolationsExit);
    await expect(result).rejects.toMatchObject({ exitCode: 1, violationCount: 2 });
    expect(logs).toEqual([
      "validate plan.yaml",
      [
        "| Stage | Kind | Detail |",
        "| ---: | :--- | :--- |",
        '| 1 | ForwardOrSelfDependency | Depends on stage 2 ("DB"), which comes later in the plan. |',
        '| 1 | VagueCriteria | Completion criterion "works" is not verifiable. |'
      ].join("\n"),
      "Forward or self dependency (1): Dependencies point down: depend only on earlier stages, or move this stage after the one it needs.",
      "Vague completion criterion (1): Replace subjective wording with something checkable, such as a command that passes or a measurable threshold.",
      "Plan has 2 violations."
    ]);
  });

  it("hides hints with --no-hints", async () => {
    const { logs, run } = setup({ "/repo/plan.yaml": forwardPlan });

    await expect(
      run("validate", "plan.yaml", "--output", "markdown", "--no-hints")
    ).rejects.toBeInstanceOf(PlanViolationsExit);

    expect(logs).toHaveLength(3);
    expect(logs.at(-1)).toBe("Plan has 2 violations.");
  });

  it("reports a valid plan and resolves", async () => {
    const { logs, run } = setup({ "/repo/plans/plan.json": validPlan });

    await run("validate", "--plan", "plans/plan.json", "--output", "markdown");

    expect(logs).toEqual(["validate plans/plan.json", "Plan is valid."]);
  });

  it("prints the report as JSON", async () => {
    const { logs, run } = setup({ "/repo/plan.yaml": forwardPlan });

    await expect(run("validate", "plan.yaml", "--output", "json")).rejects.toBeInstanceOf(
      PlanViolationsExit
    );

    expect(JSON.parse(logs.at(-1) ?? "")).toEqual({
      plan: "plan.yaml",
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
    });
  });

  it("keeps stdout parseable as JSON with --verbose", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const { logs, run } = setup({ "/repo/plan.json": validPlan });

    try {
      await run("--verbose", "validate", "plan.json", "--output", "json");
      expect(stderr).toHaveBeenCalledWith("[validate] Loaded 2 stage(s).\n");
    } finally {
      stderr.mockRestore();
    }

    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0] ?? "")).toEqual({ plan: "plan.json", valid: true, violations: [] });
  });

  it("discovers the only plan in the plans directory", async () => {
    const { logs, run } = setup({ "/repo/.agents/plans/plan-auth.json": validPlan });

    await run("validate", "--output", "markdown");

    expect(logs[0]).toBe("validate .agents/plans/plan-auth.json");
  });

  it("validates the plan picked from several candidates", async () => {
    designSelect.mockResolvedValueOnce(".agents/plans/plan-b.json");
    const { logs, run } = setup({
      "/repo/.agents/plans/plan-a.yaml": forwardPlan,
      "/repo/.agents/plans/plan-b.json": validPlan
    });

    await run("validate", "--output", "markdown");

    expect(designSelect).toHaveBeenCalledWith({
      message: "Select a plan file to validate",
      options: [
        { label: ".agents/plans/plan-a.yaml", value: ".agents/plans/plan-a.yaml" },
        { label: ".agents/plans/plan-b.json", value: ".agents/plans/plan-b.json" }
      ]
    });
    expect(logs).toEqual(["validate .agents/plans/plan-b.json", "Plan is valid."]);
  });

  it("ends silently when the plan selection is cancelled", async () => {
    designSelect.mockResolvedValueOnce(Symbol("cancel"));
    const { logs, run } = setup({
      "/repo/.agents/plans/plan-a.yaml": forwardPlan,
      "/repo/.agents/plans/plan-b.json": validPlan
    });

    await expect(run("validate")).rejects.toBeInstanceOf(OperationCancelledError);
    expect(logs).toEqual([]);
  });

  it("applies extra vague terms from config and the command line", async () => {
    const plan = JSON.stringify({
      stages: [{ id: 1, name: "Infra", completionCriteria: ["shipped", "polished", "npm test passes"] }]
    });
    const { logs, run } = setup({
      "/repo/plan.json": plan,
      "/repo/.stagecheck/config.yaml": "extraVagueTerms: [shipped]\nhints: false\n"
    });

    await expect(
      run("validate", "plan.json", "--output", "json", "--vague-term", "polished")
    ).rejects.toMatchObject({ violationCount: 2 });

    const report: { violations: { criterion?: string }[] } = JSON.parse(logs.at(-1) ?? "");
    expect(report.violations.map((violation) => violation.criterion)).toEqual([
      "shipped",
      "polished"
    ]);
  });

  it("takes the hints setting from config", async () => {
    const { logs, run } = setup({
      "/repo/plan.yaml": forwardPlan,
      "/repo/.stagecheck/config.yaml": "hints: false\n"
    });

    await expect(run("validate", "plan.yaml", "--output", "markdown")).rejects.toBeInstanceOf(
      PlanViolationsExit
    );

    expect(logs).toHaveLength(3);
  });

  it("turns construction failures into a user error", async () => {
    const { run } = setup({ "/repo/plan.yaml": "stages:\n  - id: 1\n" });

    const result = run("validate", "plan.yaml");

    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toThrow("Invalid plan plan.yaml: stages[0].name: required");
  });

  it("reports a missing plan file as a user error", async () => {
    const { run } = setup({});

    await expect(run("validate", "missing.yaml")).rejects.toThrow(
      'Plan not found at "missing.yaml". Provide a path to an existing plan file.'
    );
  });

  it("asks for a plan when discovery finds none", async () => {
    const { run } = setup({ "/repo/README.md": "# repo\n" });

    await expect(run("validate")).rejects.toThrow(
      "No plan found in .agents/plans. Pass a plan file: stagecheck validate <plan>"
    );
  });

  it("rejects an unknown output format", async () => {
    const { run } = setup({ "/repo/plan.yaml": forwardPlan });

    await expect(run("validate", "plan.yaml", "--output", "html")).rejects.toThrow(
      'Unknown output format "html". Use terminal, markdown or json.'
    );
  });

  it("surfaces invalid config as a user error", async () => {
    const { run } = setup({
      "/repo/plan.yaml": forwardPlan,
      "/repo/.stagecheck/config.json": '{"hints": "no"}'
    });

    const result = run("validate", "plan.yaml");

    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toThrow('Invalid "hints": expected a boolean.');
  });
});

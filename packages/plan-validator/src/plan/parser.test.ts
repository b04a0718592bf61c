import { describe, it, expect } from "vitest";
import { createPlan, detectPlanFormat, parsePlan } from "./parser.js";
import { InvalidPlanError } from "../errors.js";

function captureError(fn: () => unknown): InvalidPlanError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidPlanError) return error;
    throw error;
  }
  throw new Error("expected an InvalidPlanError");
}

describe("parsePlan", () => {
  it("parses valid YAML into a typed plan object", () => {
    const yaml = `
version: 1
project: Storefront
stages:
  - id: 1
    name: Infra
    description: Config, logging and the database pool.
    completionCriteria:
      - Config loaded
  - id: 2
    name: Domain
    dependsOn: [1]
    completionCriteria:
      - Unit tests >80%
`;

    expect(parsePlan(yaml)).toEqual({
      version: 1,
      project: "Storefront",
      stages: [
        {
          id: 1,
          name: "Infra",
          description: "Config, logging and the database pool.",
          dependsOn: [],
          completionCriteria: ["Config loaded"]
        },
        {
          id: 2,
          name: "Domain",
          dependsOn: [1],
          completionCriteria: ["Unit tests >80%"]
        }
      ]
    });
  });

  it("parses JSON when asked to", () => {
    const json = JSON.stringify([
      { id: 1, name: "API", dependsOn: [2], criteria: ["works"] }
    ]);

    expect(parsePlan(json, { format: "json" })).toEqual({
      stages: [{ id: 1, name: "API", dependsOn: [2], completionCriteria: ["works"] }]
    });
  });

  it("throws InvalidInput for malformed YAML", () => {
    const error = captureError(() => parsePlan("stages: ["));
    expect(error.kind).toBe("InvalidInput");
    expect(error.message).toMatch(/^Invalid plan YAML: /);
  });

  it("throws InvalidInput for an empty document", () => {
    expect(() => parsePlan("")).toThrow("Plan document is empty");
  });
});

describe("createPlan", () => {
  it("accepts scalars and numeric strings and drops repeated dependencies", () => {
    const plan = createPlan({
      stages: [
        { id: "3", name: "  Web  ", dependsOn: ["1", 2, 1], completionCriteria: "E2E suite green" }
      ]
    });

    expect(plan.stages).toEqual([
      { id: 3, name: "Web", dependsOn: [1, 2], completionCriteria: ["E2E suite green"] }
    ]);
  });

  it("keeps empty criteria for the validator to report", () => {
    const plan = createPlan({ stages: [{ id: 1, name: "Infra", completionCriteria: null }] });
    expect(plan.stages[0]?.completionCriteria).toEqual([]);
  });

  it("treats a missing stages list as an empty plan", () => {
    expect(createPlan({ project: "Empty" })).toEqual({ project: "Empty", stages: [] });
  });

  it.each([
    [{ stages: [{ name: "Infra" }] }, "stages[0].id: required"],
    [{ stages: [{ id: 0, name: "Infra" }] }, "stages[0].id: expected a positive integer"],
    [{ stages: [{ id: 1.5, name: "Infra" }] }, "stages[0].id: expected a positive integer"],
    [{ stages: [{ id: 1, name: "   " }] }, "stages[0].name: required"],
    [{ stages: [{ id: 1, name: "Infra", dependsOn: ["one"] }] }, "stages[0].dependsOn[0]: expected an integer stage id"],
    [{ stages: [{ id: 1, name: "Infra", criteria: [42] }] }, "stages[0].criteria[0]: expected string"],
    [{ stages: "Infra" }, "stages: expected array"],
    [{ stages: [null] }, "stages[0]: expected object"],
    [{ version: "next", stages: [] }, "version: expected number"],
    ["Infra", "expected a plan object or a list of stages"]
  ])("rejects %j", (input, message) => {
    const error = captureError(() => createPlan(input));
    expect(error.kind).toBe("InvalidInput");
    expect(error.message).toBe(message);
  });

  it("records the failing field", () => {
    const error = captureError(() => createPlan({ stages: [{ id: 1 }] }));
    expect(error.field).toBe("stages[0].name");
  });
});

describe("detectPlanFormat", () => {
  it("treats .json as JSON and anything else as YAML", () => {
    expect(detectPlanFormat("plans/plan.JSON")).toBe("json");
    expect(detectPlanFormat("plans/plan.yml")).toBe("yaml");
    expect(detectPlanFormat("plan")).toBe("yaml");
  });
});

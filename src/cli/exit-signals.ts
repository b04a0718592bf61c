import { SilentError } from "./errors.js";

export class VersionExit extends SilentError {
  constructor() {
    super("", { isUserError: false });
    this.name = "VersionExit";
  }
}

export class PlanViolationsExit extends SilentError {
  readonly violationCount: number;

  constructor(violationCount: number) {
    super(`Plan has ${violationCount} violation(s).`, { isUserError: true, exitCode: 1 });
    this.name = "PlanViolationsExit";
    this.violationCount = violationCount;
  }
}

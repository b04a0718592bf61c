/**
 * Raised when caller data cannot be turned into a {@link Plan}. Structural
 * problems in a well-formed plan are reported as violations instead.
 */
export class InvalidPlanError extends Error {
  readonly kind = "InvalidInput";
  readonly field: string | undefined;

  constructor(message: string, options: { field?: string; cause?: unknown } = {}) {
    super(options.field ? `${options.field}: ${message}` : message, {
      cause: options.cause
    });
    this.name = "InvalidPlanError";
    this.field = options.field;
  }
}

export class PlanNotFoundError extends Error {
  readonly planPath: string;

  constructor(planPath: string) {
    super(`Plan not found at "${planPath}". Provide a path to an existing plan file.`);
    this.name = "PlanNotFoundError";
    this.planPath = planPath;
  }
}

export class PlanSelectionCancelledError extends Error {
  constructor() {
    super("Plan selection cancelled.");
    this.name = "PlanSelectionCancelledError";
  }
}

export class ConfigError extends Error {
  readonly sourcePath: string | undefined;

  constructor(message: string, options: { sourcePath?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.sourcePath = options.sourcePath;
  }
}

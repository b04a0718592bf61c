import type { Command } from "commander";
import {
  getTheme,
  isOutputFormat,
  renderTable,
  resolveOutputFormat,
  setOutputFormat,
  text
} from "@stagecheck/design-system";
import {
  ConfigError,
  DEFAULT_PLANS_DIR,
  InvalidPlanError,
  PlanNotFoundError,
  PlanSelectionCancelledError,
  describeViolationKind,
  detectPlanFormat,
  loadConfig,
  parsePlan,
  resolvePlanPath,
  resolveVagueTerms,
  summarizeReport,
  validate,
  type Report,
  type StagecheckConfig
} from "@stagecheck/plan-validator";
import path from "node:path";
import type { CliContainer } from "../container.js";
import { OperationCancelledError, ValidationError } from "../errors.js";
import { PlanViolationsExit } from "../exit-signals.js";
import type { ScopedLogger } from "../logger.js";
import { createExecutionResources, resolveCommandFlags } from "./shared.js";

interface ValidateCommandOptions {
  plan?: string;
  output?: string;
  vagueTerm?: string[];
  hints: boolean;
}

export interface ValidateRequest {
  plan?: string;
  vagueTerms: string[];
  hints?: boolean;
}

export function registerValidateCommand(program: Command, container: CliContainer): void {
  program
    .command("validate")
    .description("Check stage ordering and completion criteria of a plan.")
    .argument("[plan]", "Plan file (YAML or JSON)")
    .option("--plan <path>", "Plan file, when not given as an argument")
    .option("--output <format>", "Output format: terminal, markdown or json")
    .option("--vague-term <term...>", "Extra terms that do not count as completion criteria")
    .option("--no-hints", "Hide corrective hints")
    .action(async function (this: Command, planArg?: string) {
      const options = this.opts<ValidateCommandOptions>();
      if (options.output !== undefined) {
        const format = options.output.toLowerCase();
        if (!isOutputFormat(format)) {
          throw new ValidationError(
            `Unknown output format "${options.output}". Use terminal, markdown or json.`
          );
        }
        setOutputFormat(format);
      }

      const flags = resolveCommandFlags(program);
      const resources = createExecutionResources(container, flags, "validate");
      await executeValidate(container, resources.logger, {
        plan: planArg ?? options.plan,
        vagueTerms: options.vagueTerm ?? [],
        hints: this.getOptionValueSource("hints") === "default" ? undefined : options.hints
      });
    });
}

export async function executeValidate(
  container: CliContainer,
  logger: ScopedLogger,
  request: ValidateRequest
): Promise<Report> {
  const { cwd } = container.env;
  const config = await loadCommandConfig(container);

  const planPath = await resolvePlanPath({
    cwd,
    plan: request.plan,
    plansDir: config.plansDir,
    fs: container.fs
  }).catch((error: unknown) => {
    if (error instanceof PlanNotFoundError) {
      throw new ValidationError(error.message, { cause: error });
    }
    if (error instanceof PlanSelectionCancelledError) {
      throw new OperationCancelledError();
    }
    throw error;
  });
  if (!planPath) {
    throw new ValidationError(
      `No plan found in ${config.plansDir ?? DEFAULT_PLANS_DIR}. Pass a plan file: stagecheck validate <plan>`
    );
  }

  logger.intro(`validate ${planPath}`);

  const vagueTerms = resolveVagueTerms(config, request.vagueTerms);
  logger.verbose(`Vague terms: ${vagueTerms.join(", ")}`);

  const content = await container.fs.readFile(path.resolve(cwd, planPath), "utf8");
  let report: Report;
  try {
    const plan = parsePlan(content, { format: detectPlanFormat(planPath) });
    logger.verbose(`Loaded ${plan.stages.length} stage(s).`);
    report = validate(plan, { vagueTerms });
  } catch (error) {
    if (error instanceof InvalidPlanError) {
      throw new ValidationError(`Invalid plan ${planPath}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  renderReport(logger, planPath, report, request.hints ?? config.hints ?? true);

  if (!report.valid) {
    throw new PlanViolationsExit(report.violations.length);
  }
  return report;
}

async function loadCommandConfig(container: CliContainer): Promise<StagecheckConfig> {
  try {
    return await loadConfig(container.env.cwd, { fs: container.fs });
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ValidationError(error.message, { cause: error });
    }
    throw error;
  }
}

function renderReport(
  logger: ScopedLogger,
  planPath: string,
  report: Report,
  hints: boolean
): void {
  if (resolveOutputFormat() === "json") {
    logger.data(JSON.stringify({ plan: planPath, ...report }, null, 2));
    return;
  }

  if (report.valid) {
    logger.success("Plan is valid.");
    return;
  }

  const theme = getTheme();
  logger.info(
    renderTable({
      theme,
      columns: [
        { name: "stage", title: "Stage", alignment: "right", maxLen: 8 },
        { name: "kind", title: "Kind", alignment: "left", maxLen: 24 },
        { name: "detail", title: "Detail", alignment: "left", maxLen: 72 }
      ],
      rows: report.violations.map((violation) => ({
        stage: String(violation.stageId),
        kind: text.kind(violation.kind),
        detail: violation.detail
      }))
    })
  );

  if (hints) {
    for (const { kind, count } of summarizeReport(report)) {
      const info = describeViolationKind(kind);
      logger.resolved(`${info.title} (${count})`, info.hint);
    }
  }

  const count = report.violations.length;
  logger.error(`Plan has ${count} violation${count === 1 ? "" : "s"}.`);
}

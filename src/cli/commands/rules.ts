import type { Command } from "commander";
import { getTheme, renderTable, resolveOutputFormat } from "@stagecheck/design-system";
import { VIOLATION_KINDS, describeViolationKind } from "@stagecheck/plan-validator";
import type { CliContainer } from "../container.js";
import { createExecutionResources, resolveCommandFlags } from "./shared.js";

export function registerRulesCommand(program: Command, container: CliContainer): void {
  program
    .command("rules")
    .description("List the violation kinds a plan is checked for.")
    .action(() => {
      const flags = resolveCommandFlags(program);
      const resources = createExecutionResources(container, flags, "rules");
      const theme = getTheme();

      resources.logger.intro("rules");
      const table = renderTable({
        theme,
        columns: [
          { name: "kind", title: "Kind", alignment: "left", maxLen: 24 },
          { name: "title", title: "Title", alignment: "left", maxLen: 28 },
          { name: "hint", title: "Hint", alignment: "left", maxLen: 64 }
        ],
        rows: VIOLATION_KINDS.map((kind) => {
          const info = describeViolationKind(kind);
          return { kind: theme.accent(kind), title: info.title, hint: info.hint };
        })
      });
      if (resolveOutputFormat() === "json") {
        resources.logger.data(table);
      } else {
        resources.logger.info(table);
      }
    });
}

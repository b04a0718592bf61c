import { Table } from "console-table-printer";
import type { ThemePalette } from "../tokens/colors.js";
import { getTheme } from "../internal/theme-detect.js";
import { resolveOutputFormat } from "../internal/output-format.js";

export interface TableColumn {
  name: string;
  title: string;
  alignment: "left" | "right";
  maxLen: number;
}

export interface RenderTableOptions {
  theme?: ThemePalette;
  columns: TableColumn[];
  rows: Record<string, string>[];
}

export function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, "");
}

function renderTableTerminal(options: RenderTableOptions): string {
  const { columns, rows } = options;
  const theme = options.theme ?? getTheme();
  const line = (left: string, mid: string, right: string) => ({
    left: theme.divider(left),
    mid: theme.divider(mid),
    right: theme.divider(right),
    other: theme.divider("─")
  });

  const table = new Table({
    style: {
      headerTop: line("┌", "┬", "┐"),
      headerBottom: line("├", "┼", "┤"),
      tableBottom: line("└", "┴", "┘"),
      vertical: theme.divider("│"),
      rowSeparator: line("├", "┼", "┤")
    },
    columns: columns.map((col) => ({
      name: col.name,
      title: theme.header(col.title),
      alignment: col.alignment,
      maxLen: col.maxLen
    }))
  });

  for (const row of rows) {
    table.addRow(row);
  }

  return table.render();
}

function renderTableMarkdown(options: RenderTableOptions): string {
  const { columns, rows } = options;

  const header = `| ${columns.map((c) => c.title).join(" | ")} |`;
  const separator = `| ${columns.map((c) => (c.alignment === "right" ? "---:" : ":---")).join(" | ")} |`;

  const dataRows = rows.map(
    (row) =>
      `| ${columns.map((c) => stripAnsi(row[c.name] ?? "").replace(/\|/g, "\\|")).join(" | ")} |`
  );

  return [header, separator, ...dataRows].join("\n");
}

function renderTableJson(options: RenderTableOptions): string {
  const { columns, rows } = options;

  const cleaned = rows.map((row) => {
    const obj: Record<string, string> = {};
    for (const col of columns) {
      obj[col.name] = stripAnsi(row[col.name] ?? "");
    }
    return obj;
  });

  return JSON.stringify(cleaned, null, 2);
}

export function renderTable(options: RenderTableOptions): string {
  switch (resolveOutputFormat()) {
    case "markdown":
      return renderTableMarkdown(options);
    case "json":
      return renderTableJson(options);
    default:
      return renderTableTerminal(options);
  }
}

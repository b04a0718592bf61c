import * as clack from "@clack/prompts";
import { text } from "../components/text.js";
import { stripAnsi } from "../components/table.js";
import { resolveOutputFormat } from "../internal/output-format.js";

export { isCancel, log } from "@clack/prompts";

export function intro(title: string): void {
  const format = resolveOutputFormat();
  if (format === "markdown") {
    process.stdout.write(`# ${stripAnsi(title)}\n\n`);
    return;
  }
  if (format === "json") {
    return;
  }
  clack.intro(text.intro(title));
}

export function introPlain(title: string): void {
  const format = resolveOutputFormat();
  if (format === "markdown") {
    process.stdout.write(`# ${stripAnsi(title)}\n\n`);
    return;
  }
  if (format === "json") {
    return;
  }
  clack.intro(title);
}

export type SelectOptions<Value> = Parameters<typeof clack.select<Value>>[0];

export async function select<Value>(
  opts: SelectOptions<Value>
): Promise<Value | symbol> {
  return clack.select(opts);
}

export type OutputFormat = "terminal" | "markdown" | "json";

const VALID_FORMATS: readonly OutputFormat[] = ["terminal", "markdown", "json"];

let cached: OutputFormat | undefined;

export function isOutputFormat(value: string): value is OutputFormat {
  return (VALID_FORMATS as readonly string[]).includes(value);
}

export function resolveOutputFormat(
  env: { OUTPUT_FORMAT?: string } = process.env
): OutputFormat {
  if (cached) {
    return cached;
  }
  const raw = env.OUTPUT_FORMAT?.toLowerCase() ?? "";
  cached = isOutputFormat(raw) ? raw : "terminal";
  return cached;
}

/**
 * Pins the output format for the rest of the process, e.g. from an
 * `--output` flag. Takes precedence over `OUTPUT_FORMAT`.
 */
export function setOutputFormat(format: OutputFormat): void {
  cached = format;
}

export function resetOutputFormatCache(): void {
  cached = undefined;
}

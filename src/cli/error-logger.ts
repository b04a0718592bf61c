import path from "node:path";

export interface ErrorContext {
  operation?: string;
  component?: string;
  scope?: string;
  [key: string]: unknown;
}

/** Synchronous subset of `node:fs` used for the error log. */
export interface ErrorLogFileSystem {
  appendFileSync(filePath: string, data: string): void;
  existsSync(filePath: string): boolean;
  mkdirSync(dirPath: string, options: { recursive: true }): unknown;
  statSync(filePath: string): { size: number };
  renameSync(from: string, to: string): void;
}

export interface ErrorLoggerOptions {
  fs: ErrorLogFileSystem;
  logDir: string;
  logToStderr?: boolean;
  maxSize?: number;
  now?: () => Date;
  stderr?: (message: string) => void;
}

const DEFAULT_MAX_SIZE = 1024 * 1024;

export class ErrorLogger {
  readonly logFile: string;
  private readonly fs: ErrorLogFileSystem;
  private readonly logDir: string;
  private readonly logToStderr: boolean;
  private readonly maxSize: number;
  private readonly now: () => Date;
  private readonly stderr: (message: string) => void;

  constructor(options: ErrorLoggerOptions) {
    this.fs = options.fs;
    this.logDir = options.logDir;
    this.logFile = path.join(options.logDir, "errors.log");
    this.logToStderr = options.logToStderr ?? false;
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.now = options.now ?? (() => new Date());
    this.stderr = options.stderr ?? ((message) => process.stderr.write(message));
  }

  logError(error: Error, context: ErrorContext = {}): void {
    this.write(this.formatEntry(error, context));
  }

  logErrorWithStackTrace(error: Error, operation: string, context: ErrorContext = {}): void {
    this.write(this.formatEntry(error, { ...context, operation }));
  }

  private formatEntry(error: Error, context: ErrorContext): string {
    const lines = [`[${this.now().toISOString()}] ${error.name}: ${error.message}`];
    if (context.operation) {
      lines.push(`Operation: ${context.operation}`);
    }
    const { operation: _operation, ...rest } = context;
    if (Object.keys(rest).length > 0) {
      lines.push(`Context: ${JSON.stringify(rest)}`);
    }
    if (error.stack) {
      lines.push(`Stack: ${error.stack}`);
    }
    if (error.cause instanceof Error) {
      lines.push(`Caused by: ${error.cause.stack ?? error.cause.message}`);
    }
    return `${lines.join("\n")}\n\n`;
  }

  private write(entry: string): void {
    if (this.logToStderr) {
      this.stderr(entry);
    }
    try {
      if (!this.fs.existsSync(this.logDir)) {
        this.fs.mkdirSync(this.logDir, { recursive: true });
      }
      this.rotateIfNeeded();
      this.fs.appendFileSync(this.logFile, entry);
    } catch (error) {
      if (this.logToStderr) {
        return;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.stderr(`Failed to write ${this.logFile}: ${reason}\n${entry}`);
    }
  }

  private rotateIfNeeded(): void {
    if (!this.fs.existsSync(this.logFile)) {
      return;
    }
    if (this.fs.statSync(this.logFile).size < this.maxSize) {
      return;
    }
    this.fs.renameSync(this.logFile, `${this.logFile}.1`);
  }
}

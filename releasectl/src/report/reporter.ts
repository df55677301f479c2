import { Chalk, type ChalkInstance } from "chalk";

export type OutputFormat = "human" | "jsonl";

export type ReportLevel = "info" | "warn" | "error" | "success" | "step" | "detail";

export type Sink = { write(chunk: string): unknown };

export type ReporterOpts = {
  format?: OutputFormat;
  color?: boolean;
  out?: Sink;
  err?: Sink;
};

const TAGS: Record<Exclude<ReportLevel, "step" | "detail">, string> = {
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]",
  success: "[SUCCESS]",
};

/** True when colour should be used for the given stream. */
export function supportsColor(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  if (env.FORCE_COLOR === "0") return false;
  return Boolean(stream.isTTY);
}

/**
 * Severity-tagged progress output.
 *
 * Human format writes `[LEVEL] message` lines; info, success and step go to
 * stdout, warn and error to stderr. jsonl writes one object per line to
 * stdout so a pipeline can consume the whole run.
 */
export class Reporter {
  readonly format: OutputFormat;
  private readonly out: Sink;
  private readonly err: Sink;
  private readonly chalk: ChalkInstance;

  constructor(opts: ReporterOpts = {}) {
    this.format = opts.format ?? "human";
    this.out = opts.out ?? process.stdout;
    this.err = opts.err ?? process.stderr;
    this.chalk = new Chalk({ level: opts.color ? 1 : 0 });
  }

  info(message: string, code = "INFO"): void {
    this.emit("info", code, message);
  }

  warn(message: string, code = "WARN"): void {
    this.emit("warn", code, message);
  }

  error(message: string, code = "ERROR"): void {
    this.emit("error", code, message);
  }

  success(message: string, code = "OK"): void {
    this.emit("success", code, message);
  }

  /** Section header between phases of a chained run. */
  step(message: string): void {
    this.emit("step", "STEP", message);
  }

  /** Untagged line, e.g. a porcelain status entry. */
  detail(message: string, toStderr = false): void {
    this.emit("detail", "DETAIL", message, toStderr);
  }

  /** Text shown in front of a yes/no question; never newline-terminated. */
  promptText(question: string): string {
    return this.chalk.yellow(`[PROMPT] ${question} [y/N] `);
  }

  private emit(level: ReportLevel, code: string, message: string, toStderr = false): void {
    if (this.format === "jsonl") {
      this.out.write(JSON.stringify({ level, code, message }) + "\n");
      return;
    }

    const sink = level === "warn" || level === "error" || toStderr ? this.err : this.out;
    sink.write(this.decorate(level, message) + "\n");
  }

  private decorate(level: ReportLevel, message: string): string {
    switch (level) {
      case "info":
        return this.chalk.cyan(`${TAGS.info} ${message}`);
      case "warn":
        return this.chalk.yellow(`${TAGS.warn} ${message}`);
      case "error":
        return this.chalk.red(`${TAGS.error} ${message}`);
      case "success":
        return this.chalk.green(`${TAGS.success} ${message}`);
      case "step":
        return "\n" + this.chalk.cyan(`=== ${message} ===`);
      case "detail":
        return message;
    }
  }
}

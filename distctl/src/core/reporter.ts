export type OutputFormat = "human" | "jsonl";

export type Level = "debug" | "info" | "warn" | "error";

/** One structured line of output. `code` is a stable machine-readable tag. */
export type Diagnostic = {
  level: Level;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type Sink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const LEVEL_PRIORITY: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const processSink: Sink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/**
 * Writes diagnostics as human-readable lines or JSON lines.
 * Child reporters carry context fields (run id, variant) into every line.
 */
export class Reporter {
  constructor(
    private readonly format: OutputFormat = "human",
    private readonly minLevel: Level = "info",
    private readonly context: Record<string, string> = {},
    private readonly sink: Sink = processSink,
  ) {}

  child(context: Record<string, string>): Reporter {
    return new Reporter(this.format, this.minLevel, { ...this.context, ...context }, this.sink);
  }

  emit(diag: Diagnostic): void {
    if (LEVEL_PRIORITY[diag.level] < LEVEL_PRIORITY[this.minLevel]) return;

    if (this.format === "jsonl") {
      const line = JSON.stringify({ ts: new Date().toISOString(), ...this.context, ...diag });
      this.sink.out(line);
      return;
    }

    const prefix = this.context.variant ? `[${this.context.variant}] ` : "";
    const line = `${prefix}${diag.message}`;
    if (diag.level === "error" || diag.level === "warn") this.sink.err(line);
    else this.sink.out(line);
  }

  debug(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "debug", code, message, details });
  }

  info(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "info", code, message, details });
  }

  warn(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "warn", code, message, details });
  }

  error(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "error", code, message, details });
  }
}

/** A reporter that drops everything; handy for library callers and tests. */
export function silentReporter(): Reporter {
  return new Reporter("jsonl", "error", {}, { out: () => {}, err: () => {} });
}

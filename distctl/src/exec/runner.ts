import { execFile } from "node:child_process";
import { CancelledError, PipelineError, type ErrorKind } from "../core/errors.js";

export type CommandSpec = {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration_ms: number;
};

/**
 * Runs external commands. Non-zero exits resolve with their exit code; only
 * cancellation rejects.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/** Command runner over `execFile`: no shell, arguments passed through verbatim. */
export class ExecFileRunner implements CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult> {
    const start = Date.now();
    return new Promise((resolve, reject) => {
      execFile(
        spec.command,
        spec.args,
        {
          cwd: spec.cwd,
          env: spec.env ? { ...process.env, ...spec.env } : process.env,
          timeout: spec.timeoutMs ?? 0,
          signal: spec.signal,
          maxBuffer: MAX_BUFFER,
          encoding: "utf8",
        },
        (err, stdout, stderr) => {
          const duration_ms = Date.now() - start;
          if (!err) {
            resolve({ exitCode: 0, stdout, stderr, duration_ms });
            return;
          }
          if (spec.signal?.aborted) {
            reject(new CancelledError(`Command cancelled: ${formatCommand(spec)}`));
            return;
          }
          // Spawn failures (ENOENT, EACCES) carry a string code; exits carry a number.
          const exitCode = typeof err.code === "number" ? err.code : 127;
          const spawnError = typeof err.code === "string" ? `${err.message}\n` : "";
          resolve({ exitCode, stdout, stderr: spawnError + stderr, duration_ms });
        },
      );
    });
  }
}

export function formatCommand(spec: Pick<CommandSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a)).join(" ");
}

/** Split `["cmd", ...args]` from config into a spec. */
export function commandFrom(argv: string[], rest: Omit<CommandSpec, "command" | "args"> = {}): CommandSpec {
  const [command, ...args] = argv;
  if (!command) throw new PipelineError("config", "Empty command");
  return { command, args, ...rest };
}

/**
 * Run a command and throw a `PipelineError` of the given kind on non-zero exit.
 */
export async function runChecked(runner: CommandRunner, spec: CommandSpec, kind: ErrorKind): Promise<CommandResult> {
  const result = await runner.run(spec);
  if (result.exitCode !== 0) {
    const tail = lastLines(result.stderr || result.stdout, 20);
    throw new PipelineError(kind, `Command failed with exit code ${result.exitCode}: ${formatCommand(spec)}${tail ? `\n${tail}` : ""}`, {
      command: formatCommand(spec),
      exit_code: result.exitCode,
    });
  }
  return result;
}

function lastLines(text: string, n: number): string {
  return text.trimEnd().split("\n").slice(-n).join("\n");
}

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";

export const OUTPUTS_FILE = "outputs.env";
export const SUMMARY_FILE = "summary.md";

/**
 * Named string values passed from one step to the next. Stored in
 * `<jobDir>/outputs.env` using the `GITHUB_OUTPUT` line format, and mirrored
 * to `$GITHUB_OUTPUT` when running inside Actions.
 */
export class JobOutputs {
  constructor(
    private readonly jobDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  set(name: string, value: string): void {
    if (!/^[A-Za-z_][A-Za-z0-9_-]*$/.test(name)) {
      throw new Error(`Invalid output name: ${name}`);
    }
    const entry = formatOutput(name, value);
    appendLine(path.join(this.jobDir, OUTPUTS_FILE), entry);
    const mirror = this.env.GITHUB_OUTPUT;
    if (mirror) appendLine(mirror, entry);
  }

  /** Append markdown to the job summary (and `$GITHUB_STEP_SUMMARY`). */
  appendSummary(markdown: string): void {
    const text = markdown.endsWith("\n") ? markdown : markdown + "\n";
    fs.mkdirSync(this.jobDir, { recursive: true });
    fs.appendFileSync(path.join(this.jobDir, SUMMARY_FILE), text, "utf8");
    const mirror = this.env.GITHUB_STEP_SUMMARY;
    if (mirror) fs.appendFileSync(mirror, text, "utf8");
  }
}

/** Single-line values as `name=value`; multi-line values in heredoc form. */
export function formatOutput(name: string, value: string, delimiter?: string): string {
  if (!value.includes("\n")) return `${name}=${value}`;
  const eof = delimiter ?? `ghadelimiter_${crypto.randomUUID()}`;
  if (value.includes(eof)) throw new Error(`Output value for ${name} contains its delimiter`);
  return `${name}<<${eof}\n${value}\n${eof}`;
}

/** Parse an outputs file back into a record. Later entries win. */
export function parseOutputs(content: string): Record<string, string> {
  const lines = content.split("\n");
  const out: Record<string, string> = {};

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === "") continue;

    const heredoc = /^([^=<]+)<<(.+)$/.exec(line);
    if (heredoc) {
      const [, name, eof] = heredoc;
      const body: string[] = [];
      i++;
      while (i < lines.length && lines[i] !== eof) {
        body.push(lines[i]);
        i++;
      }
      out[name] = body.join("\n");
      continue;
    }

    const eq = line.indexOf("=");
    if (eq === -1) continue;
    out[line.slice(0, eq)] = line.slice(eq + 1);
  }

  return out;
}

export function readOutputs(jobDir: string): Record<string, string> {
  const file = path.join(jobDir, OUTPUTS_FILE);
  if (!fs.existsSync(file)) return {};
  return parseOutputs(fs.readFileSync(file, "utf8"));
}

function appendLine(file: string, entry: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.appendFileSync(file, entry + "\n", "utf8");
}

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CONFIG_DIR } from "../src/config/loader.js";
import { loadConfig } from "../src/config/validator.js";
import { CancelledError, PipelineError } from "../src/core/errors.js";
import { formatCommand, type CommandResult, type CommandRunner, type CommandSpec } from "../src/exec/runner.js";
import type { SourceControl } from "../src/git/operations.js";
import type { DistctlConfig } from "../src/types/config.js";

export const SHA_MASTER = "1".repeat(40);
export const SHA_TAG = "2".repeat(40);
export const SHA_PR = "3".repeat(40);

export const ARCHIVE_LISTING = [
  "example_project-3.1.0/",
  "example_project-3.1.0/PKG-INFO",
  "example_project-3.1.0/example_project/",
  "example_project-3.1.0/example_project/__init__.py",
  "example_project-3.1.0/example_project/server.py",
  "example_project-3.1.0/example_project.egg-info/SOURCES.txt",
];

export const PACKAGE_LISTING = [
  "example_project/__init__.py",
  "example_project/server.py",
  "example_project-3.1.0.dist-info/METADATA",
  "example_project-3.1.0.dist-info/RECORD",
];

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `distctl-${prefix}-`));
}

/** Bundled base config, untouched by the test process environment. */
export function baseConfig(): DistctlConfig {
  return loadConfig(undefined, CONFIG_DIR, {});
}

export type Handler = (spec: CommandSpec) => Partial<CommandResult> | undefined | Promise<Partial<CommandResult> | undefined>;

/** Records every command; the handler decides what each one returns. */
export class FakeRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];

  constructor(private readonly handler: Handler = () => undefined) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    if (spec.signal?.aborted) throw new CancelledError(`Command cancelled: ${formatCommand(spec)}`);
    const res = (await this.handler(spec)) ?? {};
    return { exitCode: 0, stdout: "", stderr: "", duration_ms: 0, ...res };
  }

  commands(): string[] {
    return this.calls.map(formatCommand);
  }
}

/**
 * Stands in for yarn, the build script, tar, zipinfo, twine, python and uv
 * of a healthy project at `version`.
 */
export function projectHandler(opts: { version?: string; override?: Handler } = {}): Handler {
  const version = opts.version ?? "3.1.0";
  return async (spec) => {
    const overridden = await opts.override?.(spec);
    if (overridden) return overridden;

    const cwd = spec.cwd ?? ".";
    if (spec.command === "yarn" && spec.args[0] === "build") {
      fs.mkdirSync(path.join(cwd, "build"), { recursive: true });
      return {};
    }
    if (spec.command === "python" && spec.args[0] === "dev/build.py") {
      const selector = spec.args[spec.args.indexOf("--package-type") + 1];
      const out = path.join(cwd, "dist");
      fs.mkdirSync(out, { recursive: true });
      fs.writeFileSync(path.join(out, `example_project-${version}.tar.gz`), `archive:${selector}`);
      fs.writeFileSync(path.join(out, `example_project-${version}-py3-none-any.whl`), `package:${selector}`);
      return {};
    }
    if (spec.command === "tar" && spec.args[0] === "-tzf") return { stdout: ARCHIVE_LISTING.join("\n") + "\n" };
    if (spec.command === "zipinfo") return { stdout: PACKAGE_LISTING.join("\n") + "\n" };
    if (spec.command === "twine") return { stdout: `Checking ${spec.args[spec.args.length - 1]}: PASSED\n` };
    const last = spec.args[spec.args.length - 1] ?? "";
    if (last.startsWith("import ")) return { stdout: `${version}\n` };
    return {};
  };
}

/** In-memory version control: known refs resolve, worktrees are plain directories. */
export class FakeSource implements SourceControl {
  readonly added: string[] = [];
  readonly removed: string[] = [];

  constructor(
    private readonly refs: Record<string, string> = {
      master: SHA_MASTER,
      "v3.1.0": SHA_TAG,
      "refs/pull/7/merge": SHA_PR,
    },
  ) {}

  async resolveRef(ref: string): Promise<string> {
    const sha = this.refs[ref];
    if (!sha) throw new PipelineError("resolution", `Cannot resolve revision '${ref}'`, { ref });
    return sha;
  }

  async addWorktree(dir: string): Promise<void> {
    fs.mkdirSync(path.join(dir, "ui"), { recursive: true });
    this.added.push(dir);
  }

  async removeWorktree(dir: string): Promise<void> {
    fs.rmSync(dir, { recursive: true, force: true });
    this.removed.push(dir);
  }
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

import path from "node:path";
import { PipelineError } from "../core/errors.js";
import { runChecked, type CommandRunner } from "../exec/runner.js";
import type { DistctlConfig, VariantConfig } from "../types/config.js";
import type { PipelineRun } from "../types/trigger.js";

export function venvPython(venvDir: string): string {
  return process.platform === "win32"
    ? path.join(venvDir, "Scripts", "python.exe")
    : path.join(venvDir, "bin", "python");
}

/** Create a fresh virtual environment; returns its interpreter path. */
export async function createVenv(runner: CommandRunner, python: string, venvDir: string, signal?: AbortSignal): Promise<string> {
  await runChecked(runner, { command: python, args: ["-m", "venv", "--clear", venvDir], signal }, "install");
  return venvPython(venvDir);
}

export async function pipInstall(
  runner: CommandRunner,
  python: string,
  target: string,
  opts: { forceReinstall?: boolean; signal?: AbortSignal } = {},
): Promise<void> {
  const args = ["-m", "pip", "install", ...(opts.forceReinstall ? ["--force-reinstall"] : []), target];
  await runChecked(runner, { command: python, args, signal: opts.signal }, "install");
}

export function versionSnippet(module: string): string {
  return `import ${module}; print(${module}.__version__)`;
}

/** Last non-empty line of the output, which is what the version snippet prints. */
export function parseVersionOutput(stdout: string): string {
  const lines = stdout.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
  return lines[lines.length - 1] ?? "";
}

/**
 * Import the module with the given interpreter and return the version it
 * reports. An empty version is an install error.
 */
export async function importVersion(
  runner: CommandRunner,
  python: string,
  module: string,
  opts: { isolated?: boolean; signal?: AbortSignal } = {},
): Promise<string> {
  const args = [...(opts.isolated ? ["-I"] : []), "-c", versionSnippet(module)];
  const res = await runChecked(runner, { command: python, args, signal: opts.signal }, "install");
  return requireVersion(res.stdout, module);
}

/** `from <module> import *` must succeed. */
export async function importStar(runner: CommandRunner, python: string, module: string, signal?: AbortSignal): Promise<void> {
  await runChecked(runner, { command: python, args: ["-c", `from ${module} import *`], signal }, "install");
}

/**
 * pip requirement pointing at the run's ref on the remote, with the
 * variant's sub-path for non-default variants.
 */
export function remoteRequirement(config: DistctlConfig, run: PipelineRun, variant: VariantConfig): string {
  const base = config.remote.base_url.replace(/\/+$/, "");
  const url = `git+${base}/${run.repository}.git@${run.ref}`;
  return variant.subdirectory ? `${url}#subdirectory=${variant.subdirectory}` : url;
}

/** Install from the remote into a throwaway `uv` environment and import. */
export async function remoteImportVersion(
  runner: CommandRunner,
  uv: string,
  requirement: string,
  module: string,
  signal?: AbortSignal,
): Promise<string> {
  const args = ["run", "--isolated", "--no-project", "--with", requirement, "python", "-I", "-c", versionSnippet(module)];
  const res = await runChecked(runner, { command: uv, args, signal }, "install");
  return requireVersion(res.stdout, module);
}

function requireVersion(stdout: string, module: string): string {
  const version = parseVersionOutput(stdout);
  if (version.length === 0) {
    throw new PipelineError("install", `${module} imported but reported an empty version`);
  }
  return version;
}

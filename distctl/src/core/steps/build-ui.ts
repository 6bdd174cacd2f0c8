import fs from "node:fs";
import path from "node:path";
import { commandFrom, runChecked } from "../../exec/runner.js";
import { PipelineError } from "../errors.js";
import type { JobContext } from "../job-context.js";

/**
 * Build UI step: run the front-end build commands in order. A null
 * `ui.dir` means the project ships no UI and the step does nothing.
 */
export async function runBuildUi(ctx: JobContext, signal: AbortSignal): Promise<void> {
  const { dir, output_dir, commands } = ctx.config.ui;
  if (dir === null) {
    ctx.reporter.info("UI_SKIPPED", "No UI directory configured");
    return;
  }

  const cwd = path.join(ctx.workspace, dir);
  if (!fs.existsSync(cwd)) {
    throw new PipelineError("build", `UI directory not found: ${dir}`);
  }

  for (const argv of commands) {
    await runChecked(ctx.runner, commandFrom(argv, { cwd, signal }), "build");
  }

  if (output_dir !== null && !fs.existsSync(path.join(ctx.workspace, output_dir))) {
    throw new PipelineError("build", `UI build did not produce ${output_dir}`);
  }
}

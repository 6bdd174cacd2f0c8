import fs from "node:fs";
import path from "node:path";
import { normalizeDistName } from "../../dist/dist-name.js";
import { copyDist, locateDists } from "../../dist/locate.js";
import { commandFrom, runChecked } from "../../exec/runner.js";
import type { BuiltDists } from "../../verify/checks.js";
import type { JobContext } from "../job-context.js";

export const DIST_DIR = "dist";

/** Arguments for the project's build script for this job's variant. */
export function buildCommand(ctx: Pick<JobContext, "config" | "run" | "variant" | "sha">): string[] {
  const argv = [...ctx.config.dist.build_command, "--package-type", ctx.variant.selector];
  // Release builds embed the commit they were cut from.
  if (ctx.run.event === "workflow_dispatch" && ctx.sha) argv.push("--sha", ctx.sha);
  return [...argv, ...ctx.variant.extra_build_args];
}

/**
 * Run the build script and copy the single archive and package it
 * produced into `destDir`.
 */
export async function buildDistributions(ctx: JobContext, destDir: string, signal: AbortSignal): Promise<BuiltDists> {
  const outDir = path.join(ctx.workspace, ctx.config.dist.dir);
  fs.rmSync(outDir, { recursive: true, force: true });

  await runChecked(ctx.runner, commandFrom(buildCommand(ctx), { cwd: ctx.workspace, signal }), "build");

  const located = locateDists(outDir, {
    archive: ctx.config.dist.archive_pattern,
    package: ctx.config.dist.package_pattern,
  });
  return {
    archive: copyDist(located.archive, destDir),
    package: copyDist(located.package, destDir),
  };
}

/**
 * Build dist step: install build tooling, build, and expose the results as
 * job outputs.
 */
export async function runBuildDist(ctx: JobContext, signal: AbortSignal): Promise<void> {
  for (const argv of ctx.config.dist.setup_commands) {
    await runChecked(ctx.runner, commandFrom(argv, { cwd: ctx.workspace, signal }), "build");
  }

  const dists = await buildDistributions(ctx, path.join(ctx.jobDir, DIST_DIR), signal);
  warnOnMismatch(ctx, dists);
  ctx.dists = dists;

  ctx.outputs.set("archive-path", dists.archive.path);
  ctx.outputs.set("package-path", dists.package.path);
  ctx.outputs.set("package-name", dists.package.name);
  ctx.outputs.set("package-size", String(dists.package.size));
  ctx.reporter.info("PACKAGED", `${dists.archive.name}, ${dists.package.name} (${dists.package.size} bytes)`);
}

function warnOnMismatch(ctx: JobContext, dists: BuiltDists): void {
  const { archive, package: pkg } = dists;
  if (archive.dist_name === null || pkg.dist_name === null) return;
  if (normalizeDistName(archive.dist_name) !== normalizeDistName(pkg.dist_name) || archive.version !== pkg.version) {
    ctx.reporter.warn(
      "DIST_NAME_MISMATCH",
      `Archive is ${archive.dist_name} ${archive.version ?? "?"} but package is ${pkg.dist_name} ${pkg.version ?? "?"}`,
    );
  }
}

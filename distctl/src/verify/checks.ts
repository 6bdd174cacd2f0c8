import path from "node:path";
import { PipelineError } from "../core/errors.js";
import type { Reporter } from "../core/reporter.js";
import { compareListings, normalizeArchiveListing, normalizePackageListing } from "../dist/parity.js";
import { listArchive, listPackage } from "../dist/listing.js";
import { compareBuilds } from "../dist/reproducibility.js";
import { commandFrom, runChecked, type CommandRunner } from "../exec/runner.js";
import type { DistctlConfig, VariantConfig } from "../types/config.js";
import type { DistFile } from "../types/manifest.js";
import type { PipelineRun } from "../types/trigger.js";
import type { CheckStatus, ReportedVersions } from "../types/verification.js";
import {
  createVenv,
  importStar,
  importVersion,
  pipInstall,
  remoteImportVersion,
  remoteRequirement,
  venvPython,
} from "./install.js";

export type BuiltDists = { archive: DistFile; package: DistFile };

export type CheckContext = {
  run: PipelineRun;
  variant: VariantConfig;
  config: DistctlConfig;
  runner: CommandRunner;
  reporter: Reporter;
  /** Checked-out source tree. */
  workspace: string;
  /** Job-private scratch space (virtual environments, extraction dirs). */
  scratchDir: string;
  dists: BuiltDists;
  signal?: AbortSignal;
  /** Filled in by the install checks. */
  versions: ReportedVersions;
  /** Listings recorded by the listing checks, reused by the parity check. */
  listings: { archive?: string[]; package?: string[] };
  /** Re-run the distribution build; used by the reproducibility check. */
  rebuild?: () => Promise<BuiltDists>;
};

export type CheckOutcome = {
  status: Exclude<CheckStatus, "skipped">;
  message: string;
  details?: Record<string, unknown>;
};

export type VerificationCheck = {
  id: string;
  description: string;
  /** Return a reason string to skip the check for this context. */
  skip?: (ctx: CheckContext) => string | null;
  run: (ctx: CheckContext) => Promise<CheckOutcome>;
};

const listArchiveCheck: VerificationCheck = {
  id: "list-archive",
  description: "List files in source archive",
  async run(ctx) {
    const entries = await listArchive(ctx.runner, ctx.dists.archive.path, ctx.signal);
    ctx.listings.archive = entries;
    ctx.reporter.debug("ARCHIVE_LISTING", entries.join("\n"));
    return { status: "passed", message: `${entries.length} entries in ${ctx.dists.archive.name}` };
  },
};

const listPackageCheck: VerificationCheck = {
  id: "list-package",
  description: "List files in binary package",
  async run(ctx) {
    const entries = await listPackage(ctx.runner, ctx.dists.package.path, ctx.signal);
    ctx.listings.package = entries;
    ctx.reporter.debug("PACKAGE_LISTING", entries.join("\n"));
    return { status: "passed", message: `${entries.length} entries in ${ctx.dists.package.name}` };
  },
};

const parityCheck: VerificationCheck = {
  id: "manifest-parity",
  description: "Compare files in source archive and binary package",
  async run(ctx) {
    const archive = ctx.listings.archive ?? (await listArchive(ctx.runner, ctx.dists.archive.path, ctx.signal));
    const pkg = ctx.listings.package ?? (await listPackage(ctx.runner, ctx.dists.package.path, ctx.signal));
    const report = compareListings(
      normalizeArchiveListing(archive),
      normalizePackageListing(pkg),
      ctx.config.verify.parity.ignore,
    );

    if (report.equal) {
      return { status: "passed", message: `${report.packageCount} files match` };
    }

    const message =
      `${report.onlyInArchive.length} file(s) only in archive, ${report.onlyInPackage.length} only in package`;
    return {
      status: ctx.config.verify.parity.fatal ? "failed" : "warned",
      message,
      details: { diff: report.diff },
    };
  },
};

const metadataLintCheck: VerificationCheck = {
  id: "metadata-lint",
  description: "Check package metadata",
  async run(ctx) {
    const spec = commandFrom([...ctx.config.verify.lint_command, ctx.dists.package.path], { signal: ctx.signal });
    const res = await runChecked(ctx.runner, spec, "quality_gate");
    return { status: "passed", message: res.stdout.trim().split("\n").pop() || "metadata OK" };
  },
};

const installArchiveCheck: VerificationCheck = {
  id: "install-archive",
  description: "Install from source archive",
  async run(ctx) {
    const module = ctx.config.verify.import_name;
    const python = await createVenv(ctx.runner, ctx.config.verify.python, venvDir(ctx), ctx.signal);
    await pipInstall(ctx.runner, python, ctx.dists.archive.path, { signal: ctx.signal });
    const version = await importVersion(ctx.runner, python, module, { signal: ctx.signal });
    await importStar(ctx.runner, python, module, ctx.signal);
    ctx.versions.archive = version;
    return { status: "passed", message: `${module} ${version}` };
  },
};

const installPackageCheck: VerificationCheck = {
  id: "install-package",
  description: "Install from binary package",
  async run(ctx) {
    const module = ctx.config.verify.import_name;
    const python = ctx.versions.archive !== undefined
      ? venvPython(venvDir(ctx))
      : await createVenv(ctx.runner, ctx.config.verify.python, venvDir(ctx), ctx.signal);
    await pipInstall(ctx.runner, python, ctx.dists.package.path, { forceReinstall: true, signal: ctx.signal });
    const version = await importVersion(ctx.runner, python, module, { signal: ctx.signal });
    await importStar(ctx.runner, python, module, ctx.signal);
    ctx.versions.package = version;

    if (ctx.versions.archive !== undefined && ctx.versions.archive !== version) {
      throw new PipelineError(
        "install",
        `Version mismatch: archive reports ${ctx.versions.archive}, package reports ${version}`,
        { archive: ctx.versions.archive, package: version },
      );
    }
    return { status: "passed", message: `${module} ${version}` };
  },
};

const installRemoteCheck: VerificationCheck = {
  id: "install-remote",
  description: "Install from remote reference",
  async run(ctx) {
    const requirement = remoteRequirement(ctx.config, ctx.run, ctx.variant);
    const version = await remoteImportVersion(
      ctx.runner,
      ctx.config.verify.uv,
      requirement,
      ctx.config.verify.import_name,
      ctx.signal,
    );
    ctx.versions.remote = version;
    return { status: "passed", message: `${requirement} -> ${version}` };
  },
};

const installPrScriptCheck: VerificationCheck = {
  id: "install-pr-script",
  description: "Run installer script against the pull request merge ref",
  skip(ctx) {
    if (ctx.run.event !== "pull_request" || !ctx.run.pull_request) return "not a pull request";
    if (!ctx.config.verify.pr_install_script) return "no installer script configured";
    return null;
  },
  async run(ctx) {
    const script = ctx.config.verify.pr_install_script;
    const pr = ctx.run.pull_request;
    if (!script || !pr) throw new PipelineError("config", "install-pr-script ran without a script or pull request");
    const mergeRef = `pull/${pr.number}/merge`;
    await runChecked(
      ctx.runner,
      { command: path.resolve(ctx.workspace, script), args: [mergeRef], cwd: ctx.workspace, signal: ctx.signal },
      "install",
    );
    return { status: "passed", message: `${script} ${mergeRef}` };
  },
};

const reproducibilityCheck: VerificationCheck = {
  id: "reproducibility",
  description: "Rebuild and compare distribution contents",
  skip(ctx) {
    if (!ctx.config.verify.reproducibility) return "disabled";
    if (!ctx.rebuild) return "no rebuild available";
    return null;
  },
  async run(ctx) {
    if (!ctx.rebuild) throw new PipelineError("config", "reproducibility ran without a rebuild hook");
    const second = await ctx.rebuild();
    const report = await compareBuilds(ctx.runner, ctx.dists, second, path.join(ctx.scratchDir, "repro"), ctx.signal);
    if (report.identical) return { status: "passed", message: "rebuild produced identical contents" };
    throw new PipelineError("integrity", "Rebuild produced different distribution contents", {
      archive: report.archive,
      package: report.package,
    });
  },
};

function venvDir(ctx: CheckContext): string {
  return path.join(ctx.scratchDir, "venv");
}

/** Checks in the order they run. */
export const DEFAULT_CHECKS: readonly VerificationCheck[] = [
  listArchiveCheck,
  listPackageCheck,
  parityCheck,
  metadataLintCheck,
  installArchiveCheck,
  installPackageCheck,
  installRemoteCheck,
  installPrScriptCheck,
  reproducibilityCheck,
];

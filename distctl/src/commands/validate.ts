import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { getRequiredRecords } from "../artifact-writer/manifest-builder.js";
import { MANIFEST_FILE } from "../artifact-writer/writer.js";
import { loadConfigLayers } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/errors.js";
import { STATE_FILE, type JobState } from "../core/orchestrator.js";
import type { Diagnostic } from "../core/reporter.js";
import { ARTIFACT_RECORD } from "../core/steps/publish.js";
import { VERIFICATION_FILE } from "../core/steps/verify.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { JobManifest } from "../types/manifest.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

function diag(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): Diagnostic {
  return { level: "error", code, message, ...extra };
}

/** Records validated against a schema when present. */
const RECORD_SCHEMAS: Record<string, string> = {
  [STATE_FILE]: "job-state",
  [MANIFEST_FILE]: "job-manifest",
  [VERIFICATION_FILE]: "verification",
  [ARTIFACT_RECORD]: "published-artifact",
};

/**
 * Validate the layered configuration and, with `runDir`, the records every
 * job of that run left behind.
 */
export function validateAll(opts: {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  runDir?: string;
  registry?: SchemaRegistry;
}): ValidateResult {
  const errors: Diagnostic[] = [];
  const registry = opts.registry ?? createRegistry();

  if (opts.configDir !== undefined && !fs.existsSync(opts.configDir)) {
    return { ok: false, errors: [diag("CONFIG_DIR_MISSING", `Config directory not found: ${opts.configDir}`, { path: opts.configDir })] };
  }

  try {
    const res = validateConfig(loadConfigLayers(opts.envName, opts.configDir, opts.env), registry);
    if (!res.valid) errors.push(diag("CONFIG_INVALID", `Config invalid: ${res.errors}`));
  } catch (e) {
    errors.push(diag("CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`));
  }

  if (opts.runDir !== undefined) {
    errors.push(...validateRunDir(opts.runDir, registry));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}

/** Check every job directory under a run directory. */
export function validateRunDir(runDir: string, registry: SchemaRegistry): Diagnostic[] {
  if (!fs.existsSync(runDir)) {
    return [diag("RUN_DIR_MISSING", `Run directory not found: ${runDir}`, { path: runDir })];
  }

  const jobDirs = fs
    .readdirSync(runDir, { withFileTypes: true })
    .filter((e) => e.isDirectory() && fs.existsSync(path.join(runDir, e.name, STATE_FILE)))
    .map((e) => path.join(runDir, e.name));

  if (jobDirs.length === 0) {
    return [diag("RUN_NO_JOBS", `No job directories in ${runDir}`, { path: runDir })];
  }
  return jobDirs.flatMap((dir) => validateJobDir(dir, registry));
}

export function validateJobDir(jobDir: string, registry: SchemaRegistry): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const docs = new Map<string, unknown>();

  for (const [file, schema] of Object.entries(RECORD_SCHEMAS)) {
    const full = path.join(jobDir, file);
    if (!fs.existsSync(full)) continue;
    let doc: unknown;
    try {
      doc = JSON.parse(fs.readFileSync(full, "utf8"));
    } catch (e) {
      errors.push(diag("RECORD_JSON_INVALID", `Invalid JSON (${full}): ${errorMessage(e)}`, { path: full }));
      continue;
    }
    const res = registry.validate(schema, doc);
    if (!res.valid) {
      errors.push(diag("RECORD_INVALID", `${file} does not match ${schema}: ${res.errors ?? ""}`, { path: full }));
      continue;
    }
    docs.set(file, doc);
  }

  const state = docs.get(STATE_FILE);
  const verdict = registry.is<JobState>("job-state", state) ? state.step_results.verify?.status : undefined;
  const packaged = verdict === "success" || verdict === "failed";
  for (const required of getRequiredRecords(packaged)) {
    if (!fs.existsSync(path.join(jobDir, required))) {
      errors.push(diag("RECORD_MISSING", `Missing record: ${path.join(jobDir, required)}`, { path: jobDir }));
    }
  }

  const manifest = docs.get(MANIFEST_FILE);
  if (registry.is<JobManifest>("job-manifest", manifest)) {
    for (const record of manifest.records) {
      const target = path.resolve(jobDir, record.path);
      if (!isWithinDir(jobDir, target)) {
        errors.push(diag("RECORD_PATH_ESCAPES_DIR", `Manifest path escapes job dir: ${record.path}`, { path: record.path }));
        continue;
      }
      if (!fs.existsSync(target)) {
        errors.push(diag("RECORD_FILE_MISSING", `Missing record file: ${target}`, { path: target }));
        continue;
      }
      const actual = computeSha256(target);
      if (actual !== record.sha256) {
        errors.push(
          diag("RECORD_SHA256_MISMATCH", `Record sha256 mismatch (${record.path}): manifest=${record.sha256} actual=${actual}`, {
            path: target,
            details: { expectedSha256: record.sha256, actualSha256: actual },
          }),
        );
      }
    }
  }

  return errors;
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

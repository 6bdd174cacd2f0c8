import type { DistFile, JobManifest, JobRecord, SourceInfo } from "../types/manifest.js";

/** Records every finished job directory is expected to hold. */
const REQUIRED_RECORDS = ["state.json", "manifest.json"];

/** Records a job owes once it got past distribution build. */
const REQUIRED_RECORDS_WHEN_PACKAGED = ["outputs.env", "verification.json"];

export type ManifestBuildInput = {
  run_id: string;
  variant: string;
  source: SourceInfo;
  distributions: DistFile[];
  records: JobRecord[];
};

/**
 * Build a job manifest. Distributions are ordered archive first, records by path.
 */
export function buildManifest(input: ManifestBuildInput): JobManifest {
  return {
    run_id: input.run_id,
    variant: input.variant,
    created_at: new Date().toISOString(),
    source: input.source,
    distributions: [...input.distributions].sort((a, b) => (a.kind === b.kind ? 0 : a.kind === "archive" ? -1 : 1)),
    records: [...input.records].sort((a, b) => a.path.localeCompare(b.path)),
  };
}

/** Get required record list for a job that did or did not reach verification. */
export function getRequiredRecords(packaged: boolean): string[] {
  return packaged ? [...REQUIRED_RECORDS, ...REQUIRED_RECORDS_WHEN_PACKAGED] : [...REQUIRED_RECORDS];
}

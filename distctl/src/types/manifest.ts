/** Job manifest: digests of a job's distributions and records. */

export type DistKind = "archive" | "package";

export type DistFile = {
  kind: DistKind;
  /** File name, e.g. `example_project-3.1.0-py3-none-any.whl`. */
  name: string;
  path: string;
  size: number;
  sha256: string;
  /** Distribution name and version parsed from the file name, when it follows the naming rules. */
  dist_name: string | null;
  version: string | null;
};

export type JobRecord = {
  path: string;
  schema: string | null;
  sha256: string;
  produced_by: string;
  produced_at: string;
};

export type SourceInfo = {
  ref: string;
  sha: string | null;
};

export type JobManifest = {
  run_id: string;
  variant: string;
  created_at: string;
  source: SourceInfo;
  distributions: DistFile[];
  records: JobRecord[];
};

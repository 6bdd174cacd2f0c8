/** Verification results for one variant job. */

import type { ErrorKind } from "../core/errors.js";

export type CheckStatus = "passed" | "warned" | "failed" | "skipped";

export type CheckResult = {
  id: string;
  description: string;
  status: CheckStatus;
  duration_ms: number;
  message: string;
  error_kind?: ErrorKind;
  details?: Record<string, unknown>;
};

export type ReportedVersions = {
  archive?: string;
  package?: string;
  remote?: string;
};

export type VerificationReport = {
  run_id: string;
  variant: string;
  started_at: string;
  finished_at: string;
  passed: boolean;
  checks: CheckResult[];
  versions: ReportedVersions;
};

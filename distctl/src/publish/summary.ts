import type { JobStatus } from "../core/state-machine.js";
import type { PipelineRun } from "../types/trigger.js";
import type { PublishedArtifact } from "./store.js";

/** Markdown appended to the job summary after a package is published. */
export function publicationSummary(artifact: PublishedArtifact, retentionDays: number): string {
  return [
    "### Download URL",
    artifact.url,
    "",
    "### Notes",
    "",
    `- The artifact will be deleted after ${retentionDays} days.`,
    `- The download is the package file itself (${artifact.file}, ${artifact.size} bytes).`,
    "",
  ].join("\n");
}

export type JobSummaryRow = {
  variant: string;
  status: JobStatus;
  package: string | null;
  url: string | null;
  error: string | null;
};

/** Markdown table for the whole run. */
export function runSummary(run: PipelineRun, rows: JobSummaryRow[]): string {
  const lines = [
    `## ${run.workflow}: ${run.event} ${run.ref}`,
    "",
    "| Variant | Status | Package | Download |",
    "| --- | --- | --- | --- |",
    ...rows.map((r) => `| ${r.variant} | ${r.status} | ${cell(r.package)} | ${r.url ? `[link](${r.url})` : "-"} |`),
    "",
  ];
  const failures = rows.filter((r) => r.error);
  if (failures.length > 0) {
    lines.push("### Failures", "", ...failures.map((r) => `- **${r.variant}**: ${firstLine(r.error)}`), "");
  }
  return lines.join("\n");
}

function cell(value: string | null): string {
  return value ? value.replace(/\|/g, "\\|") : "-";
}

function firstLine(text: string | null): string {
  return (text ?? "").split("\n")[0];
}

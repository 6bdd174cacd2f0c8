import fs from "node:fs";
import path from "node:path";

/**
 * Generate a run ID and claim its directory under `runsDir`.
 * Format: {event}-{ref_slug}-{YYYYMMDD}-{seq}
 *
 * The directory is created without `recursive`, so two processes scanning
 * at the same moment cannot both take one sequence number.
 */
export function generateRunId(event: string, ref: string, runsDir: string, now: Date = new Date()): string {
  const safeRef = refSlug(ref);
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const prefix = `${event.replace(/_/g, "-")}-${safeRef}-${date}`;

  fs.mkdirSync(runsDir, { recursive: true });
  for (let seq = getNextSeq(runsDir, prefix); ; seq++) {
    const runId = `${prefix}-${String(seq).padStart(3, "0")}`;
    try {
      fs.mkdirSync(path.join(runsDir, runId));
      return runId;
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
    }
  }
}

/** `refs/heads/branch-3.1` → `branch-3-1`; `refs/pull/7/merge` → `pull-7-merge`. */
export function refSlug(ref: string): string {
  const short = ref.replace(/^refs\/(heads\/|tags\/)?/, "");
  return short.replace(/[^a-zA-Z0-9_-]/g, "-").replace(/-+/g, "-").replace(/^-|-$/g, "").slice(0, 30) || "ref";
}

function getNextSeq(runsDir: string, prefix: string): number {
  let maxSeq = 0;
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || !entry.name.startsWith(`${prefix}-`)) continue;
    const num = parseInt(entry.name.slice(prefix.length + 1), 10);
    if (!isNaN(num) && num > maxSeq) maxSeq = num;
  }
  return maxSeq + 1;
}

function isAlreadyExists(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "EEXIST";
}

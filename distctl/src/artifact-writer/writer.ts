import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import { buildManifest } from "./manifest-builder.js";
import type { DistFile, JobManifest, JobRecord, SourceInfo } from "../types/manifest.js";

export const MANIFEST_FILE = "manifest.json";

export type WriteRecordInput = {
  /** Relative path within the job directory (e.g., "verification.json"). */
  relativePath: string;
  /** JSON value, or raw text for non-JSON records. */
  content: unknown;
  /** Schema name this record conforms to, if any. */
  schema?: string;
  /** Who produced this record (e.g., "verify"). */
  producedBy: string;
};

/**
 * Manages the record files of one variant job.
 * Writes individual records and generates the final manifest.
 */
export class RecordWriter {
  private records = new Map<string, JobRecord>();

  constructor(
    private readonly jobDir: string,
    private readonly runId: string,
    private readonly variant: string,
  ) {}

  /** Ensure the job directory exists. */
  init(): void {
    fs.mkdirSync(this.jobDir, { recursive: true });
  }

  /** Write a single record file and track it. Rewriting a path replaces its entry. */
  writeRecord(input: WriteRecordInput): string {
    const fullPath = path.join(this.jobDir, input.relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });

    const text = typeof input.content === "string" ? input.content : JSON.stringify(input.content, null, 2) + "\n";
    fs.writeFileSync(fullPath, text, "utf8");

    this.track(input.relativePath, input.producedBy, input.schema);
    return fullPath;
  }

  /** Track a file some other component wrote into the job directory. */
  track(relativePath: string, producedBy: string, schema?: string): void {
    const fullPath = path.join(this.jobDir, relativePath);
    if (!fs.existsSync(fullPath)) return;
    this.records.set(relativePath, {
      path: relativePath,
      schema: schema ?? null,
      sha256: computeSha256(fullPath),
      produced_by: producedBy,
      produced_at: new Date().toISOString(),
    });
  }

  /** Generate and write manifest.json. Returns the manifest. */
  writeManifest(opts: { source: SourceInfo; distributions: DistFile[] }): JobManifest {
    const manifest = buildManifest({
      run_id: this.runId,
      variant: this.variant,
      source: opts.source,
      distributions: opts.distributions,
      records: [...this.records.values()],
    });

    fs.writeFileSync(path.join(this.jobDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getRecords(): JobRecord[] {
    return [...this.records.values()];
  }
}

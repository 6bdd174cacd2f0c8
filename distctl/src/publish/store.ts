import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { minimatch } from "minimatch";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { PipelineError } from "../core/errors.js";

export const ARTIFACT_META_FILE = "artifact.json";

export type PublishedArtifact = {
  id: string;
  name: string;
  file: string;
  size: number;
  sha256: string;
  run_id: string;
  variant: string;
  created_at: string;
  expires_at: string;
  url: string;
};

export type UploadInput = {
  /** Artifact name; the package's own file name. */
  name: string;
  filePath: string;
  /** The upload fails if the file does not match this glob. */
  pattern: string;
  retentionDays: number;
  runId: string;
  variant: string;
};

/** Where published packages go. */
export interface ArtifactStore {
  upload(input: UploadInput): PublishedArtifact;
  list(): PublishedArtifact[];
  /** Delete artifacts past their retention. Returns what was removed. */
  prune(now?: Date): PublishedArtifact[];
}

/**
 * Artifact store on the local filesystem:
 * `<root>/<id>/<file>` plus `<root>/<id>/artifact.json`.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(
    private readonly root: string,
    private readonly baseUrl: string | null = null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  upload(input: UploadInput): PublishedArtifact {
    const fileName = path.basename(input.filePath);
    if (!fs.existsSync(input.filePath) || !fs.statSync(input.filePath).isFile() || !minimatch(fileName, input.pattern, { dot: true })) {
      throw new PipelineError("publication", `No files were found with the provided path: ${input.filePath} (pattern '${input.pattern}')`);
    }

    const created = this.now();
    const expires = new Date(created.getTime() + input.retentionDays * 24 * 60 * 60 * 1000);
    const id = `${input.runId}-${input.variant}`;
    const dir = path.join(this.root, id);
    fs.mkdirSync(dir, { recursive: true });
    const dest = path.join(dir, fileName);
    fs.copyFileSync(input.filePath, dest);

    const artifact: PublishedArtifact = {
      id,
      name: input.name,
      file: fileName,
      size: fs.statSync(dest).size,
      sha256: computeSha256(dest),
      run_id: input.runId,
      variant: input.variant,
      created_at: created.toISOString(),
      expires_at: expires.toISOString(),
      url: this.urlFor(id, fileName, dest),
    };
    fs.writeFileSync(path.join(dir, ARTIFACT_META_FILE), JSON.stringify(artifact, null, 2) + "\n", "utf8");
    return artifact;
  }

  list(): PublishedArtifact[] {
    if (!fs.existsSync(this.root)) return [];
    const out: PublishedArtifact[] = [];
    for (const entry of fs.readdirSync(this.root, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const meta = readArtifactMeta(path.join(this.root, entry.name, ARTIFACT_META_FILE));
      if (meta) out.push(meta);
    }
    return out.sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  prune(now: Date = this.now()): PublishedArtifact[] {
    const removed: PublishedArtifact[] = [];
    for (const artifact of this.list()) {
      if (Date.parse(artifact.expires_at) <= now.getTime()) {
        fs.rmSync(path.join(this.root, artifact.id), { recursive: true, force: true });
        removed.push(artifact);
      }
    }
    return removed;
  }

  private urlFor(id: string, fileName: string, dest: string): string {
    if (!this.baseUrl) return pathToFileURL(path.resolve(dest)).href;
    return `${this.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(id)}/${encodeURIComponent(fileName)}`;
  }
}

function readArtifactMeta(file: string): PublishedArtifact | null {
  if (!fs.existsSync(file)) return null;
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return isPublishedArtifact(parsed) ? parsed : null;
}

function isPublishedArtifact(value: unknown): value is PublishedArtifact {
  if (typeof value !== "object" || value === null) return false;
  const fields = ["id", "name", "file", "sha256", "run_id", "variant", "created_at", "expires_at", "url"] as const;
  return fields.every((f) => f in value && typeof Reflect.get(value, f) === "string") &&
    "size" in value && typeof value.size === "number";
}

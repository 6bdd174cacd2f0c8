import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

/** Compute SHA256 hash of a file. */
export function computeSha256(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Hash every regular file under `dir`. Keys are `/`-separated paths relative
 * to `dir`, sorted.
 */
export function hashTree(dir: string): Map<string, string> {
  const entries: Array<[string, string]> = [];
  walk(dir, dir, entries);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return new Map(entries);
}

function walk(baseDir: string, currentDir: string, out: Array<[string, string]>): void {
  for (const entry of fs.readdirSync(currentDir, { withFileTypes: true })) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      walk(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      const rel = path.relative(baseDir, fullPath).split(path.sep).join("/");
      out.push([rel, computeSha256(fullPath)]);
    }
  }
}

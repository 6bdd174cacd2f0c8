import path from "node:path";
import { FileArtifactStore, type PublishedArtifact } from "../publish/store.js";

export type ArtifactsResult = { ok: true; artifacts: PublishedArtifact[]; pruned: PublishedArtifact[] };

/**
 * List published artifacts; with `prune`, delete the expired ones first.
 */
export function listArtifacts(opts: { storeDir: string; prune?: boolean; now?: Date }): ArtifactsResult {
  const store = new FileArtifactStore(path.resolve(opts.storeDir));
  const pruned = opts.prune ? store.prune(opts.now) : [];
  return { ok: true, artifacts: store.list(), pruned };
}

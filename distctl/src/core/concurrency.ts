import fs from "node:fs";
import path from "node:path";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";
import { CancelledError } from "./errors.js";

export type RunSlot = {
  key: string;
  token: number;
  signal: AbortSignal;
  /** True while no newer acquire() for the same key has happened. */
  isCurrent(): boolean;
  release(): void;
};

/**
 * Single-flight-per-key: acquiring a key cancels whoever held it before.
 * Only the most recent run for a key is allowed to finish.
 */
export class SingleFlight {
  private readonly slots = new Map<string, { token: number; controller: AbortController }>();
  private counter = 0;

  acquire(key: string): RunSlot {
    const previous = this.slots.get(key);
    if (previous) {
      previous.controller.abort(new CancelledError(`Superseded by a newer run for ${key}`));
    }

    const token = ++this.counter;
    const controller = new AbortController();
    this.slots.set(key, { token, controller });

    return {
      key,
      token,
      signal: controller.signal,
      isCurrent: () => this.slots.get(key)?.token === token,
      release: () => {
        if (this.slots.get(key)?.token === token) this.slots.delete(key);
      },
    };
  }
}

// --- Cross-process locks ---

export type RunLock = {
  key: string;
  run_id: string;
  pid: number;
  acquired_at: string;
};

export type LockClaim = {
  lockPath: string;
  /** The run that held the key before, if its process was still alive. */
  superseded: RunLock | null;
};

export type ProcessControl = {
  isAlive(pid: number): boolean;
  terminate(pid: number): void;
};

export const nodeProcessControl: ProcessControl = {
  isAlive(pid) {
    try {
      process.kill(pid, 0);
      return true;
    } catch (e) {
      // EPERM means the process exists but belongs to someone else
      return e instanceof Error && "code" in e && e.code === "EPERM";
    }
  },
  terminate(pid) {
    process.kill(pid, "SIGTERM");
  },
};

export function lockPathFor(locksDir: string, key: string): string {
  return path.join(locksDir, `${computeSha256FromContent(key).slice(0, 16)}.json`);
}

export function readLock(lockPath: string): RunLock | null {
  if (!fs.existsSync(lockPath)) return null;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    return isRunLock(parsed) ? parsed : null;
  } catch {
    // Half-written lock file from a crashed run: treat as free
    return null;
  }
}

/**
 * Take the lock for `key`, signalling the previous holder to stop if it is
 * still running. The last writer wins; the loser notices through `ownsLock`.
 */
export function claimLock(
  locksDir: string,
  key: string,
  runId: string,
  proc: ProcessControl = nodeProcessControl,
): LockClaim {
  fs.mkdirSync(locksDir, { recursive: true });
  const lockPath = lockPathFor(locksDir, key);

  const existing = readLock(lockPath);
  let superseded: RunLock | null = null;
  if (existing && existing.run_id !== runId && existing.pid !== process.pid && proc.isAlive(existing.pid)) {
    proc.terminate(existing.pid);
    superseded = existing;
  }

  const lock: RunLock = { key, run_id: runId, pid: process.pid, acquired_at: new Date().toISOString() };
  const tmp = `${lockPath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(lock, null, 2), "utf8");
  fs.renameSync(tmp, lockPath);

  return { lockPath, superseded };
}

export function ownsLock(lockPath: string, runId: string): boolean {
  return readLock(lockPath)?.run_id === runId;
}

/** Remove the lock only if this run still holds it. */
export function releaseLock(lockPath: string, runId: string): boolean {
  if (!ownsLock(lockPath, runId)) return false;
  fs.rmSync(lockPath, { force: true });
  return true;
}

function isRunLock(value: unknown): value is RunLock {
  if (typeof value !== "object" || value === null) return false;
  return (
    "key" in value && typeof value.key === "string" &&
    "run_id" in value && typeof value.run_id === "string" &&
    "pid" in value && typeof value.pid === "number" &&
    "acquired_at" in value && typeof value.acquired_at === "string"
  );
}

/** A signal that aborts, with the same reason, as soon as any of `signals` does. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}

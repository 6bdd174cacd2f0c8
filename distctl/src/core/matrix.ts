import { CancelledError } from "./errors.js";

export type MatrixJob<T> = {
  name: string;
  run: (signal: AbortSignal) => Promise<T>;
};

export type MatrixResult<T> = {
  results: T[];
  success: boolean;
};

/**
 * Start every job at once and wait for all of them. With `failFast`, the
 * first failure cancels the siblings still running. Results keep job order.
 */
export async function runMatrix<T extends { success: boolean }>(
  jobs: MatrixJob<T>[],
  opts: { failFast?: boolean; signal?: AbortSignal } = {},
): Promise<MatrixResult<T>> {
  const controller = new AbortController();
  const forward = () => controller.abort(opts.signal?.reason ?? new CancelledError());
  if (opts.signal?.aborted) forward();
  else opts.signal?.addEventListener("abort", forward, { once: true });

  const cancelSiblings = (name: string) => {
    if (opts.failFast && !controller.signal.aborted) {
      controller.abort(new CancelledError(`Cancelled because ${name} failed`));
    }
  };

  try {
    const settled = await Promise.allSettled(
      jobs.map(async (job) => {
        try {
          const result = await job.run(controller.signal);
          if (!result.success) cancelSiblings(job.name);
          return result;
        } catch (e) {
          cancelSiblings(job.name);
          throw e;
        }
      }),
    );

    const results: T[] = [];
    for (const s of settled) {
      if (s.status === "rejected") throw s.reason;
      results.push(s.value);
    }
    return { results, success: results.every((r) => r.success) };
  } finally {
    opts.signal?.removeEventListener("abort", forward);
  }
}

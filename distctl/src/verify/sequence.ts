import { CancelledError, errorKind, errorMessage } from "../core/errors.js";
import type { CheckResult, VerificationReport } from "../types/verification.js";
import { DEFAULT_CHECKS, type CheckContext, type VerificationCheck } from "./checks.js";

/**
 * Run checks in order. The first failed check stops the sequence; the rest
 * are recorded as skipped. Cancellation is rethrown, not recorded.
 */
export async function runChecks(
  ctx: CheckContext,
  checks: readonly VerificationCheck[] = DEFAULT_CHECKS,
): Promise<VerificationReport> {
  const started_at = new Date().toISOString();
  const results: CheckResult[] = [];
  let failed = false;

  for (const check of checks) {
    if (failed) {
      results.push(skipped(check, "earlier check failed"));
      continue;
    }

    const reason = check.skip?.(ctx) ?? null;
    if (reason) {
      results.push(skipped(check, reason));
      ctx.reporter.debug("CHECK_SKIPPED", `${check.description}: skipped (${reason})`, { check: check.id });
      continue;
    }

    ctx.reporter.info("CHECK_START", check.description, { check: check.id });
    const start = Date.now();
    try {
      const outcome = await check.run(ctx);
      const result: CheckResult = {
        id: check.id,
        description: check.description,
        status: outcome.status,
        duration_ms: Date.now() - start,
        message: outcome.message,
        details: outcome.details,
      };
      results.push(result);

      if (outcome.status === "failed") {
        failed = true;
        ctx.reporter.error("CHECK_FAILED", `${check.description}: ${outcome.message}`, { check: check.id, ...outcome.details });
      } else if (outcome.status === "warned") {
        ctx.reporter.warn("CHECK_WARNED", `${check.description}: ${outcome.message}`, { check: check.id, ...outcome.details });
      } else {
        ctx.reporter.info("CHECK_PASSED", `${check.description}: ${outcome.message}`, { check: check.id });
      }
    } catch (e) {
      if (e instanceof CancelledError || ctx.signal?.aborted) throw e;
      failed = true;
      results.push({
        id: check.id,
        description: check.description,
        status: "failed",
        duration_ms: Date.now() - start,
        message: errorMessage(e),
        error_kind: errorKind(e),
      });
      ctx.reporter.error("CHECK_FAILED", `${check.description}: ${errorMessage(e)}`, { check: check.id });
    }
  }

  return {
    run_id: ctx.run.run_id,
    variant: ctx.variant.name,
    started_at,
    finished_at: new Date().toISOString(),
    passed: !failed,
    checks: results,
    versions: { ...ctx.versions },
  };
}

function skipped(check: VerificationCheck, reason: string): CheckResult {
  return { id: check.id, description: check.description, status: "skipped", duration_ms: 0, message: reason };
}

import { XMLBuilder } from "fast-xml-parser";
import type { CheckResult, VerificationReport } from "../types/verification.js";

type XmlNode = Record<string, unknown>;

/**
 * Render verification reports as JUnit XML, one testsuite per variant.
 * Warned checks pass, with their message in `system-out`.
 */
export function toJunitXml(reports: VerificationReport[], name = "distctl"): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });

  const suites = reports.map(suiteFor);
  const totals = reports.flatMap((r) => r.checks);

  const doc: XmlNode = {
    testsuites: {
      "@_name": name,
      "@_tests": totals.length,
      "@_failures": totals.filter((c) => c.status === "failed").length,
      "@_skipped": totals.filter((c) => c.status === "skipped").length,
      "@_time": seconds(totals.reduce((sum, c) => sum + c.duration_ms, 0)),
      testsuite: suites,
    },
  };

  return `<?xml version="1.0" encoding="UTF-8"?>\n${builder.build(doc)}`;
}

function suiteFor(report: VerificationReport): XmlNode {
  return {
    "@_name": `verify.${report.variant}`,
    "@_tests": report.checks.length,
    "@_failures": report.checks.filter((c) => c.status === "failed").length,
    "@_skipped": report.checks.filter((c) => c.status === "skipped").length,
    "@_time": seconds(report.checks.reduce((sum, c) => sum + c.duration_ms, 0)),
    "@_timestamp": report.started_at,
    testcase: report.checks.map((c) => caseFor(report.variant, c)),
  };
}

function caseFor(variant: string, check: CheckResult): XmlNode {
  const node: XmlNode = {
    "@_classname": variant,
    "@_name": check.id,
    "@_time": seconds(check.duration_ms),
  };
  if (check.status === "failed") {
    node.failure = { "@_message": check.message, "@_type": check.error_kind ?? "check", "#text": check.message };
  } else if (check.status === "skipped") {
    node.skipped = { "@_message": check.message };
  } else if (check.status === "warned") {
    node["system-out"] = check.message;
  }
  return node;
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

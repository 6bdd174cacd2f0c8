import fs from "node:fs";
import type { PullRequestInfo, TriggerEvent } from "../types/trigger.js";

export type PayloadFields = {
  ref?: string;
  triggerRef?: string;
  pullRequest?: PullRequestInfo;
};

/**
 * Read the fields a trigger needs from a GitHub-style webhook payload
 * (the file `$GITHUB_EVENT_PATH` points at).
 */
export function readEventPayload(event: TriggerEvent, filePath: string): PayloadFields {
  const payload: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return fieldsFromPayload(event, payload);
}

export function fieldsFromPayload(event: TriggerEvent, payload: unknown): PayloadFields {
  if (!isRecord(payload)) throw new Error("Event payload is not a JSON object");

  switch (event) {
    case "push":
      return { ref: stringField(payload, "ref") };
    case "workflow_dispatch": {
      const inputs = payload.inputs;
      return { ref: isRecord(inputs) ? stringField(inputs, "ref") : undefined, triggerRef: stringField(payload, "ref") };
    }
    case "pull_request": {
      const pr = payload.pull_request;
      if (!isRecord(pr) || typeof pr.number !== "number") {
        throw new Error("pull_request payload has no pull_request.number");
      }
      return {
        pullRequest: {
          number: pr.number,
          draft: pr.draft === true,
          action: stringField(payload, "action") ?? "opened",
        },
      };
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

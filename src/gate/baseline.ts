import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { ConfigBaselineMalformedError, ConfigBaselineMissingError } from "../errors/config.errors.js";
import type { Issue } from "../types.js";

/** Fingerprints of the issues recorded in a previous report. */
export type Baseline = ReadonlySet<string>;

export function issueFingerprint(issue: Pick<Issue, "ruleId" | "path" | "line" | "message">): string {
  return JSON.stringify([issue.ruleId, issue.path, issue.line, issue.message]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts a JSON report (`{ "issues": [...] }`) or a bare issue array. Entries without
 * the fingerprint fields are skipped.
 */
export function parseBaseline(raw: string, filePath: string): Baseline {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigBaselineMalformedError(filePath, detail);
  }

  const issues = Array.isArray(payload) ? payload : isRecord(payload) ? payload.issues : undefined;
  if (!Array.isArray(issues)) {
    throw new ConfigBaselineMalformedError(filePath, 'expected an "issues" array');
  }

  const fingerprints = new Set<string>();
  for (const entry of issues) {
    if (!isRecord(entry)) continue;
    const { ruleId, path, line, message } = entry;
    if (typeof ruleId !== "string" || typeof path !== "string" || typeof message !== "string") continue;
    if (typeof line !== "number" || !Number.isInteger(line)) continue;
    fingerprints.add(issueFingerprint({ ruleId, path, line, message }));
  }
  return fingerprints;
}

export async function loadBaseline(filePath: string): Promise<Baseline> {
  if (!existsSync(filePath)) {
    throw new ConfigBaselineMissingError(filePath);
  }
  const raw = await readFile(filePath, "utf-8");
  return parseBaseline(raw, filePath);
}

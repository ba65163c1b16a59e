export const SEVERITIES = ["low", "medium", "high", "critical"] as const;

export type Severity = typeof SEVERITIES[number];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function parseSeverity(raw: string | null | undefined): Severity | null {
  const value = (raw ?? "").trim().toLowerCase();
  for (const severity of SEVERITIES) {
    if (severity === value) return severity;
  }
  return null;
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { low: 0, medium: 0, high: 0, critical: 0 };
}

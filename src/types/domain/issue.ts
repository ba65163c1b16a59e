import type { Severity } from "./severity.js";

export interface Issue {
  ruleId: string;
  path: string;
  line: number;
  column?: number;
  severity: Severity;
  message: string;
  snippet?: string;
}

export type ScanNoteKind =
  | "oversized"
  | "unreadable"
  | "binary"
  | "generated"
  | "parse_fallback"
  | "analyzer_error";

export interface ScanNote {
  kind: ScanNoteKind;
  path?: string;
  message: string;
}

export interface ScanSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byRule: Record<string, number>;
  filesWithIssues: number;
}

export interface ScanMetadata {
  ruleSetFingerprint: string;
  filesScanned: number;
  generatedAt: string;
  toolVersion: string;
}

export interface ScanReport {
  issues: Issue[];
  summary: ScanSummary;
  notes: ScanNote[];
  metadata: ScanMetadata;
}

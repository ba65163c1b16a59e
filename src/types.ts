import type { Issue, ScanMetadata, ScanNote, ScanNoteKind, ScanReport, ScanSummary } from "./types/domain/issue.js";
import type { Severity } from "./types/domain/severity.js";

export type { Issue, ScanMetadata, ScanNote, ScanNoteKind, ScanReport, ScanSummary, Severity };

export type Language =
  | "javascript"
  | "python"
  | "java"
  | "go"
  | "kotlin"
  | "dockerfile"
  | "yaml"
  | "json"
  | "markdown"
  | "shell"
  | "sql"
  | "ruby"
  | "php"
  | "csharp"
  | "rust"
  | "swift"
  | "c"
  | "cpp"
  | "toml"
  | "ini"
  | "html"
  | "xml"
  | "text";

/** A file selected for scanning, before its content is read. */
export interface ScanCandidate {
  path: string;
  absolutePath: string;
  language: Language;
  sizeBytes: number;
}

export interface SourceUnit {
  readonly path: string;
  readonly language: Language;
  readonly content: string;
  readonly sizeBytes: number;
}

export interface DuplicateOccurrence {
  path: string;
  startLine: number;
  endLine: number;
}

export interface DuplicateBlock {
  fingerprint: string;
  lineCount: number;
  occurrences: DuplicateOccurrence[];
}

export type SuppressionScope = "all" | ReadonlySet<string>;

export interface SuppressionDirective {
  line: number;
  scope: SuppressionScope;
}

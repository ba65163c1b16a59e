import { readFile } from "node:fs/promises";
import { loadConfig, type ConfigOverrides, type PolygateConfig } from "../config/loadConfig.js";
import { discoverFiles } from "../fs/discover.js";
import { noopLogger, withContext, type Logger } from "../logging/logger.js";
import { ScanCancelledError } from "../errors/scan.errors.js";
import { evaluateGate, prepareGateInputs, type QualityGateResult } from "../gate/qualityGate.js";
import type { CoverageData } from "../gate/coverage.js";
import { selectAnalyzer } from "./analyzers.js";
import { defaultRegistry, resolveActiveRules, type RuleRegistry, type RuleSet } from "./catalog/registry.js";
import type { RuleThresholds } from "./catalog/types.js";
import { duplicateIssues, findDuplicateBlocks, FingerprintTable, isDuplicateEligible } from "./duplicates.js";
import type { ScanProgressHandler } from "./progress.js";
import { emptySeverityCounts } from "../types/domain/severity.js";
import { TOOL_VERSION } from "../version.js";
import type { Issue, ScanCandidate, ScanNote, ScanReport, ScanSummary, SourceUnit } from "../types.js";

export const DUPLICATE_RULE_ID = "PG109";

const BINARY_SAMPLE_BYTES = 8000;
const GENERATED_HEADER_LINES = 5;
const GENERATED_MARKER = /@generated\b|\bDO NOT EDIT\b/;

export type ReadSource = (candidate: ScanCandidate) => Promise<Buffer | string>;

export interface ScanSourcesOptions {
  rules: RuleSet;
  thresholds: RuleThresholds;
  inlineIgnore: boolean;
  minDuplicateLines: number;
  maxFileSizeBytes: number;
  includeGenerated?: boolean;
  concurrency?: number;
  readSource?: ReadSource;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: ScanProgressHandler;
  now?: () => Date;
}

type FileOutcome = {
  analyzed: boolean;
  issues: Issue[];
  notes: ScanNote[];
};

const defaultReadSource: ReadSource = (candidate) => readFile(candidate.absolutePath);

async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  runner: (item: T, worker: number) => Promise<R>
): Promise<R[]> {
  if (items.length === 0) return [];
  const limit = Math.max(1, Math.trunc(concurrency));
  const results = new Array<R>(items.length);
  let index = 0;
  const workers = new Array(Math.min(limit, items.length)).fill(0).map(async (_, worker: number) => {
    while (index < items.length) {
      const current = index;
      index += 1;
      results[current] = await runner(items[current], worker);
    }
  });
  await Promise.all(workers);
  return results;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isBinary(raw: Buffer | string): boolean {
  if (typeof raw === "string") return raw.slice(0, BINARY_SAMPLE_BYTES).includes("\u0000");
  return raw.subarray(0, BINARY_SAMPLE_BYTES).includes(0);
}

function decode(raw: Buffer | string): string {
  const text = typeof raw === "string" ? raw : raw.toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function hasGeneratedHeader(content: string): boolean {
  const header = content.split(/\r?\n/, GENERATED_HEADER_LINES).join("\n");
  return GENERATED_MARKER.test(header);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw new ScanCancelledError(reason instanceof Error ? reason.message : undefined);
}

function formatKb(bytes: number): string {
  return `${Math.ceil(bytes / 1024)} KB`;
}

function compareIssues(a: Issue, b: Issue): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  const columnDelta = (a.column ?? 0) - (b.column ?? 0);
  if (columnDelta !== 0) return columnDelta;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return 0;
}

function compareNotes(a: ScanNote, b: ScanNote): number {
  const left = `${a.path ?? ""}\u0000${a.kind}\u0000${a.message}`;
  const right = `${b.path ?? ""}\u0000${b.kind}\u0000${b.message}`;
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Sorts issues into report order and keeps the first of each (ruleId, path, line, message). */
export function dedupeIssues(issues: readonly Issue[]): Issue[] {
  const seen = new Set<string>();
  const unique: Issue[] = [];
  for (const issue of [...issues].sort(compareIssues)) {
    const key = `${issue.ruleId}\u0000${issue.path}\u0000${issue.line}\u0000${issue.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(issue);
  }
  return unique;
}

export function summarizeIssues(issues: readonly Issue[]): ScanSummary {
  const bySeverity = emptySeverityCounts();
  const byRule: Record<string, number> = {};
  const files = new Set<string>();
  for (const issue of issues) {
    bySeverity[issue.severity] += 1;
    byRule[issue.ruleId] = (byRule[issue.ruleId] ?? 0) + 1;
    files.add(issue.path);
  }
  return { total: issues.length, bySeverity, byRule, filesWithIssues: files.size };
}

/**
 * Reads and analyzes every candidate on a bounded pool, runs the duplicate pass once over
 * the workers' fingerprint tables, then assembles the report. A failing file only costs
 * that file's findings.
 */
export async function scanSources(candidates: readonly ScanCandidate[], options: ScanSourcesOptions): Promise<ScanReport> {
  const log = options.logger ?? noopLogger;
  const readSource = options.readSource ?? defaultReadSource;
  const analyzeOptions = { thresholds: options.thresholds, inlineIgnore: options.inlineIgnore };
  const duplicateRule = options.rules.rules.find((rule) => rule.id === DUPLICATE_RULE_ID) ?? null;
  const concurrency = options.concurrency ?? 8;
  const workerCount = Math.max(1, Math.min(Math.trunc(concurrency), candidates.length));
  const tables = Array.from(
    { length: workerCount },
    () => new FingerprintTable(options.minDuplicateLines, options.inlineIgnore)
  );
  const total = candidates.length;
  let completed = 0;

  throwIfAborted(options.signal);

  const scanOne = async (candidate: ScanCandidate, worker: number): Promise<FileOutcome> => {
    throwIfAborted(options.signal);
    const skip = (note: ScanNote): FileOutcome => {
      log.debug("Skipped file", { path: candidate.path, kind: note.kind });
      return { analyzed: false, issues: [], notes: [note] };
    };

    if (candidate.sizeBytes > options.maxFileSizeBytes) {
      return skip({
        kind: "oversized",
        path: candidate.path,
        message: `File is ${formatKb(candidate.sizeBytes)}, above the ${formatKb(options.maxFileSizeBytes)} limit; skipped.`
      });
    }

    let raw: Buffer | string;
    try {
      raw = await readSource(candidate);
    } catch (err) {
      log.warn("Could not read file", { path: candidate.path, error: describeError(err) });
      return skip({ kind: "unreadable", path: candidate.path, message: `Could not read file: ${describeError(err)}` });
    }

    const sizeBytes = typeof raw === "string" ? Buffer.byteLength(raw, "utf-8") : raw.length;
    if (sizeBytes > options.maxFileSizeBytes) {
      return skip({
        kind: "oversized",
        path: candidate.path,
        message: `File is ${formatKb(sizeBytes)}, above the ${formatKb(options.maxFileSizeBytes)} limit; skipped.`
      });
    }
    if (isBinary(raw)) {
      return skip({ kind: "binary", path: candidate.path, message: "File looks binary; skipped." });
    }

    const content = decode(raw);
    if (!options.includeGenerated && hasGeneratedHeader(content)) {
      return skip({ kind: "generated", path: candidate.path, message: "File header marks it as generated; skipped." });
    }

    const unit: SourceUnit = Object.freeze({
      path: candidate.path,
      language: candidate.language,
      content,
      sizeBytes
    });

    let outcome: FileOutcome;
    const analyzer = selectAnalyzer(unit.language);
    try {
      const result = analyzer.analyze(unit, options.rules, analyzeOptions);
      outcome = { analyzed: true, issues: result.issues, notes: result.notes };
    } catch (err) {
      log.warn("Analyzer failed", { path: unit.path, analyzer: analyzer.kind, error: describeError(err) });
      outcome = {
        analyzed: true,
        issues: [],
        notes: [{ kind: "analyzer_error", path: unit.path, message: `Analysis failed: ${describeError(err)}` }]
      };
    }
    for (const note of outcome.notes) {
      if (note.kind === "parse_fallback") log.debug("Parse fallback", { path: unit.path, message: note.message });
    }

    if (duplicateRule && isDuplicateEligible(duplicateRule, unit)) {
      tables[worker].add(unit);
    }

    return outcome;
  };

  const outcomes = await runWithConcurrency([...candidates], concurrency, async (candidate, worker) => {
    const outcome = await scanOne(candidate, worker);
    completed += 1;
    options.onProgress?.({ phase: "analyze", current: completed, total, message: candidate.path });
    return outcome;
  });
  throwIfAborted(options.signal);

  const issues = outcomes.flatMap((outcome) => outcome.issues);
  const notes = outcomes.flatMap((outcome) => outcome.notes);

  if (duplicateRule) {
    options.onProgress?.({ phase: "duplicates", current: 0, total: 1 });
    const blocks = findDuplicateBlocks(tables, options.minDuplicateLines);
    issues.push(...duplicateIssues(blocks, duplicateRule, tables));
    log.debug("Duplicate pass finished", { blocks: blocks.length });
    options.onProgress?.({ phase: "duplicates", current: 1, total: 1 });
  }

  const finalIssues = dedupeIssues(issues);
  const now = options.now ?? (() => new Date());
  return {
    issues: finalIssues,
    summary: summarizeIssues(finalIssues),
    notes: notes.sort(compareNotes),
    metadata: {
      ruleSetFingerprint: options.rules.fingerprint,
      filesScanned: outcomes.filter((outcome) => outcome.analyzed).length,
      generatedAt: now().toISOString(),
      toolVersion: TOOL_VERSION
    }
  };
}

export interface RunScanOptions {
  projectRoot: string;
  /** Directory or file to scan; defaults to `projectRoot`. */
  target?: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
  /** Base for relative gate report paths given on the command line. */
  cwd?: string;
  coverage?: CoverageData | null;
  registry?: RuleRegistry;
  logger?: Logger;
  onProgress?: ScanProgressHandler;
  signal?: AbortSignal;
  readSource?: ReadSource;
}

export interface ScanResult {
  config: PolygateConfig;
  report: ScanReport;
  gate: QualityGateResult;
  durationMs: number;
}

/** Loads config, validates gate inputs, discovers files, scans them and evaluates the gate. */
export async function runScan(options: RunScanOptions): Promise<ScanResult> {
  const start = Date.now();
  const config = await loadConfig({
    projectRoot: options.projectRoot,
    configPath: options.configPath,
    overrides: options.overrides
  });

  // Config problems surface before any file is read.
  const rules = resolveActiveRules(options.registry ?? defaultRegistry(), {
    enabledRules: config.rules.enabled,
    disabledRules: config.rules.disabled,
    securityOnly: config.rules.securityOnly
  });
  const gateInputs = await prepareGateInputs(config.gate, {
    cwd: options.cwd ?? config.projectRoot,
    coverage: options.coverage
  });
  const log = withContext(options.logger ?? noopLogger, { ruleSet: rules.fingerprint.slice(0, 12) });

  options.onProgress?.({ phase: "discover", current: 0, total: 1 });
  const candidates = await discoverFiles({
    root: options.target ?? config.projectRoot,
    includeExtensions: config.discovery.includeExtensions,
    includeFilenames: config.discovery.includeFilenames,
    exclude: config.discovery.exclude,
    generatedPaths: config.discovery.generatedPaths,
    includeGenerated: config.discovery.includeGenerated
  });
  options.onProgress?.({ phase: "discover", current: 1, total: 1, message: `${candidates.length} files` });
  log.info("Discovered files", { count: candidates.length, rules: rules.rules.length });

  const report = await scanSources(candidates, {
    rules,
    thresholds: config.rules.thresholds,
    inlineIgnore: config.rules.inlineIgnore,
    minDuplicateLines: config.rules.minDuplicateLines,
    maxFileSizeBytes: config.discovery.maxFileSizeKb * 1024,
    includeGenerated: config.discovery.includeGenerated,
    concurrency: config.scan.concurrency,
    readSource: options.readSource,
    signal: options.signal,
    logger: log,
    onProgress: options.onProgress
  });

  options.onProgress?.({ phase: "report", current: 0, total: 1 });
  const gate = evaluateGate(report, gateInputs);
  log.info("Scan finished", {
    issues: report.summary.total,
    notes: report.notes.length,
    passed: gate.passed,
    violations: gate.violations.length
  });

  return { config, report, gate, durationMs: Date.now() - start };
}

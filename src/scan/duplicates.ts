import { createHash } from "node:crypto";
import { DEFAULT_MIN_DUPLICATE_LINES } from "../config/defaults.js";
import { isCommentLine } from "./catalog/helpers.js";
import { splitLines } from "./analyzer.js";
import { isSuppressed, parseSuppression } from "./suppression.js";
import { appliesTo, type RuleDefinition } from "./catalog/types.js";
import type { DuplicateBlock, DuplicateOccurrence, Issue, SourceUnit, SuppressionScope } from "../types.js";

const MODULUS = 2147483647;
const BASE = 257;

type NormalizedLine = {
  text: string;
  line: number;
};

export type FileFingerprints = {
  path: string;
  lines: NormalizedLine[];
  windowHashes: number[];
  suppressions: Map<number, SuppressionScope>;
};

type WindowRef = {
  file: FileFingerprints;
  start: number;
};

function hashLine(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % MODULUS;
}

// Split multiplication keeps intermediates below 2^53.
function mulMod(a: number, b: number): number {
  const high = ((a * (b >>> 16)) % MODULUS) * 65536;
  return (high + a * (b & 0xffff)) % MODULUS;
}

export function normalizeLine(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function windowHashes(lineHashes: readonly number[], windowSize: number): number[] {
  if (windowSize <= 0 || lineHashes.length < windowSize) return [];
  let power = 1;
  for (let i = 1; i < windowSize; i += 1) power = mulMod(power, BASE);
  let hash = 0;
  for (let i = 0; i < windowSize; i += 1) {
    hash = (mulMod(hash, BASE) + lineHashes[i]) % MODULUS;
  }
  const hashes = [hash];
  for (let i = windowSize; i < lineHashes.length; i += 1) {
    const outgoing = mulMod(lineHashes[i - windowSize], power);
    hash = (hash - outgoing + MODULUS) % MODULUS;
    hash = (mulMod(hash, BASE) + lineHashes[i]) % MODULUS;
    hashes.push(hash);
  }
  return hashes;
}

/** Fingerprints gathered by one worker; merged with the others once every file is read. */
export class FingerprintTable {
  private readonly files: FileFingerprints[] = [];

  constructor(
    private readonly minLines: number,
    private readonly inlineIgnore: boolean
  ) {}

  add(unit: SourceUnit): void {
    const lines: NormalizedLine[] = [];
    const suppressions = new Map<number, SuppressionScope>();
    splitLines(unit.content).forEach((raw, index) => {
      if (this.inlineIgnore) {
        const scope = parseSuppression(raw, unit.language);
        if (scope) suppressions.set(index + 1, scope);
      }
      const text = normalizeLine(raw);
      if (!text || isCommentLine(text, unit.language)) return;
      lines.push({ text, line: index + 1 });
    });
    if (lines.length < this.minLines) return;
    this.files.push({
      path: unit.path,
      lines,
      windowHashes: windowHashes(
        lines.map((entry) => hashLine(entry.text)),
        this.minLines
      ),
      suppressions
    });
  }

  get entries(): readonly FileFingerprints[] {
    return this.files;
  }
}

function windowText(ref: WindowRef, size: number): string {
  return ref.file.lines
    .slice(ref.start, ref.start + size)
    .map((entry) => entry.text)
    .join("\n");
}

/** Drops windows overlapping an earlier kept window of the same file. */
function withoutOverlaps(refs: WindowRef[], size: number): WindowRef[] {
  const kept: WindowRef[] = [];
  const lastStart = new Map<FileFingerprints, number>();
  for (const ref of refs) {
    const previous = lastStart.get(ref.file);
    if (previous !== undefined && ref.start < previous + size) continue;
    kept.push(ref);
    lastStart.set(ref.file, ref.start);
  }
  return kept;
}

type Extent = { refs: WindowRef[]; size: number };

/**
 * Single reduction over every worker's table. Files are ordered by path so the
 * result does not depend on which worker saw which file.
 */
export function findDuplicateBlocks(
  tables: readonly FingerprintTable[],
  minLines: number = DEFAULT_MIN_DUPLICATE_LINES
): DuplicateBlock[] {
  const files = tables
    .flatMap((table) => table.entries)
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const fileIndex = new Map(files.map((file, index) => [file, index]));
  const windowId = (ref: WindowRef, shift = 0) => `${fileIndex.get(ref.file)}:${ref.start + shift}`;

  const buckets = new Map<number, WindowRef[]>();
  for (const file of files) {
    file.windowHashes.forEach((hash, start) => {
      const bucket = buckets.get(hash);
      if (bucket) bucket.push({ file, start });
      else buckets.set(hash, [{ file, start }]);
    });
  }

  const groups: WindowRef[][] = [];
  for (const bucket of buckets.values()) {
    if (bucket.length < 2) continue;
    const byText = new Map<string, WindowRef[]>();
    for (const ref of bucket) {
      const text = windowText(ref, minLines);
      const same = byText.get(text);
      if (same) same.push(ref);
      else byText.set(text, [ref]);
    }
    for (const refs of byText.values()) {
      const distinct = withoutOverlaps(refs, minLines);
      if (distinct.length >= 2) groups.push(distinct);
    }
  }

  const groupOf = new Map<string, number>();
  groups.forEach((refs, index) => refs.forEach((ref) => groupOf.set(windowId(ref), index)));

  // Every shifted window sits in one group; that group may hold further occurrences.
  const sharesGroup = (refs: readonly WindowRef[], shift: number) => {
    const first = groupOf.get(windowId(refs[0], shift));
    return first !== undefined && refs.every((ref) => groupOf.get(windowId(ref, shift)) === first);
  };
  // Refs arrive ordered by file, then start.
  const staysApart = (refs: readonly WindowRef[], size: number) =>
    refs.every((ref, index) => index === 0 || refs[index - 1].file !== ref.file || ref.start - refs[index - 1].start >= size);

  const extents = new Map<string, Extent>();
  for (const refs of groups) {
    let before = 0;
    while (sharesGroup(refs, -(before + 1)) && staysApart(refs, minLines + before + 1)) before += 1;
    let after = 0;
    while (sharesGroup(refs, after + 1) && staysApart(refs, minLines + before + after + 1)) after += 1;
    const shifted = refs.map((ref) => ({ file: ref.file, start: ref.start - before }));
    const size = minLines + before + after;
    const key = `${size}@${shifted.map((ref) => windowId(ref)).join("|")}`;
    if (!extents.has(key)) extents.set(key, { refs: shifted, size });
  }

  // Longest first; an extent lying wholly inside kept ones adds nothing.
  const ordered = [...extents.entries()]
    .sort(([leftKey, left], [rightKey, right]) =>
      right.size - left.size || right.refs.length - left.refs.length || (leftKey < rightKey ? -1 : leftKey > rightKey ? 1 : 0)
    )
    .map(([, extent]) => extent);
  const kept: Extent[] = [];
  for (const extent of ordered) {
    const covered = extent.refs.every((ref) =>
      kept.some((other) =>
        other.refs.some(
          (outer) => outer.file === ref.file && outer.start <= ref.start && ref.start + extent.size <= outer.start + other.size
        )
      )
    );
    if (!covered) kept.push(extent);
  }

  const blocks: DuplicateBlock[] = kept.map(({ refs, size }) => ({
    fingerprint: createHash("sha256").update(windowText(refs[0], size)).digest("hex").slice(0, 16),
    lineCount: size,
    occurrences: refs.map((ref) => ({
      path: ref.file.path,
      startLine: ref.file.lines[ref.start].line,
      endLine: ref.file.lines[ref.start + size - 1].line
    }))
  }));

  return blocks.sort((a, b) => {
    const left = a.occurrences[0];
    const right = b.occurrences[0];
    if (left.path !== right.path) return left.path < right.path ? -1 : 1;
    return left.startLine - right.startLine || b.lineCount - a.lineCount;
  });
}

function describeOthers(block: DuplicateBlock, self: DuplicateOccurrence): string {
  return block.occurrences
    .filter((other) => other !== self)
    .map((other) => `${other.path}:${other.startLine}`)
    .join(", ");
}

export function isDuplicateEligible(rule: RuleDefinition, unit: Pick<SourceUnit, "language">): boolean {
  return appliesTo(rule, unit.language);
}

const within = (inner: DuplicateOccurrence, outer: DuplicateOccurrence) =>
  inner.path === outer.path && outer.startLine <= inner.startLine && inner.endLine <= outer.endLine;

/**
 * One issue per occurrence, each naming the other locations of the block. An
 * occurrence already inside a longer block is reported by that block alone.
 */
export function duplicateIssues(
  blocks: readonly DuplicateBlock[],
  rule: RuleDefinition,
  tables: readonly FingerprintTable[]
): Issue[] {
  const suppressionsByPath = new Map<string, Map<number, SuppressionScope>>();
  for (const table of tables) {
    for (const file of table.entries) suppressionsByPath.set(file.path, file.suppressions);
  }
  const issues: Issue[] = [];
  for (const block of blocks) {
    const longer = blocks.filter((other) => other.lineCount > block.lineCount);
    for (const occurrence of block.occurrences) {
      if (longer.some((other) => other.occurrences.some((outer) => within(occurrence, outer)))) continue;
      const scope = suppressionsByPath.get(occurrence.path)?.get(occurrence.startLine) ?? null;
      if (isSuppressed(scope, rule.id)) continue;
      issues.push({
        ruleId: rule.id,
        path: occurrence.path,
        line: occurrence.startLine,
        severity: rule.severity,
        message: `Duplicated block of ${block.lineCount} lines also found at ${describeOthers(block, occurrence)}.`
      });
    }
  }
  return issues;
}

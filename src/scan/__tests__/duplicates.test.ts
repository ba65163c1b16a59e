import assert from "node:assert/strict";
import { test } from "node:test";
import { duplicateIssues, findDuplicateBlocks, FingerprintTable, normalizeLine, windowHashes } from "../duplicates.js";
import { defaultRegistry } from "../catalog/registry.js";
import type { SourceUnit } from "../../types.js";

const unit = (path: string, lines: string[]): SourceUnit => {
  const content = `${lines.join("\n")}\n`;
  return { path, language: "python", content, sizeBytes: content.length };
};

const BLOCK = [
  "def first(items):",
  "    total = 0",
  "    for item in items:",
  "        total += item.price",
  "        total -= item.discount",
  "    return total"
];

const reindent = (lines: string[]) => lines.map((line) => line.replace(/^ {4}/, "  "));

const duplicateRule = () => {
  const rule = defaultRegistry().get("PG109");
  assert.ok(rule);
  return rule;
};

test("normalizeLine collapses whitespace", () => {
  assert.equal(normalizeLine("  total  +=\titem.price  "), "total += item.price");
});

test("rolling window hashes match hashes computed from scratch", () => {
  const hashes = [11, 22, 33, 44, 55];
  const rolled = windowHashes(hashes, 3);
  assert.equal(rolled.length, 3);
  assert.equal(windowHashes([33, 44, 55], 3)[0], rolled[2]);
  assert.deepEqual(windowHashes(hashes, 6), []);
});

test("a shared block of the minimum length is reported at both locations", () => {
  const table = new FingerprintTable(6, true);
  table.add(unit("a.py", BLOCK));
  table.add(unit("b.py", ["import os", "", ...reindent(BLOCK)]));

  const blocks = findDuplicateBlocks([table], 6);
  assert.equal(blocks.length, 1);
  assert.equal(blocks[0].lineCount, 6);
  assert.equal(blocks[0].fingerprint.length, 16);
  assert.deepEqual(blocks[0].occurrences, [
    { path: "a.py", startLine: 1, endLine: 6 },
    { path: "b.py", startLine: 3, endLine: 8 }
  ]);

  const issues = duplicateIssues(blocks, duplicateRule(), [table]);
  assert.deepEqual(
    issues.map((issue) => [issue.path, issue.line, issue.message]),
    [
      ["a.py", 1, "Duplicated block of 6 lines also found at b.py:3."],
      ["b.py", 3, "Duplicated block of 6 lines also found at a.py:1."]
    ]
  );
  assert.equal(issues[0].severity, "medium");
});

test("a shared block one line shorter than the minimum is not reported", () => {
  const table = new FingerprintTable(6, true);
  table.add(unit("a.py", [...BLOCK.slice(0, 5), "    return 0"]));
  table.add(unit("b.py", [...BLOCK.slice(0, 5), "    return 1"]));
  assert.deepEqual(findDuplicateBlocks([table], 6), []);
});

test("longer runs merge into one block", () => {
  const longer = [...BLOCK, "print(first([]))", "print('done')"];
  const table = new FingerprintTable(6, true);
  table.add(unit("a.py", longer));
  table.add(unit("b.py", longer));
  const blocks = findDuplicateBlocks([table], 6);
  assert.equal(blocks.length, 1);
  assert.equal(blocks[0].lineCount, 8);
  assert.deepEqual(
    blocks[0].occurrences.map((occurrence) => [occurrence.path, occurrence.startLine, occurrence.endLine]),
    [
      ["a.py", 1, 8],
      ["b.py", 1, 8]
    ]
  );
});

test("a run shared by fewer files still grows to its full length", () => {
  const longer = [...BLOCK, "print(first([]))"];
  const table = new FingerprintTable(6, true);
  table.add(unit("a.py", longer));
  table.add(unit("b.py", longer));
  table.add(unit("c.py", BLOCK));

  const blocks = findDuplicateBlocks([table], 6);
  assert.deepEqual(
    blocks.map((block) => [
      block.lineCount,
      block.occurrences.map((occurrence) => `${occurrence.path}:${occurrence.startLine}-${occurrence.endLine}`)
    ]),
    [
      [7, ["a.py:1-7", "b.py:1-7"]],
      [6, ["a.py:1-6", "b.py:1-6", "c.py:1-6"]]
    ]
  );

  const issues = duplicateIssues(blocks, duplicateRule(), [table]);
  assert.deepEqual(
    issues.map((issue) => [issue.path, issue.line, issue.message]),
    [
      ["a.py", 1, "Duplicated block of 7 lines also found at b.py:1."],
      ["b.py", 1, "Duplicated block of 7 lines also found at a.py:1."],
      ["c.py", 1, "Duplicated block of 6 lines also found at a.py:1, b.py:1."]
    ]
  );
});

test("result does not depend on how files were split between workers", () => {
  const files = [unit("c.py", BLOCK), unit("a.py", BLOCK), unit("b.py", ["x = 1", ...BLOCK])];

  const single = new FingerprintTable(6, true);
  files.forEach((file) => single.add(file));

  const left = new FingerprintTable(6, true);
  const right = new FingerprintTable(6, true);
  right.add(files[0]);
  left.add(files[1]);
  right.add(files[2]);

  const fromSingle = findDuplicateBlocks([single], 6);
  const fromSplit = findDuplicateBlocks([left, right], 6);
  assert.deepEqual(fromSplit, fromSingle);
  assert.deepEqual(
    fromSingle[0].occurrences.map((occurrence) => `${occurrence.path}:${occurrence.startLine}`),
    ["a.py:1", "b.py:2", "c.py:1"]
  );
});

test("overlapping windows inside one file are not a duplicate", () => {
  const repeated = Array.from({ length: 8 }, () => "retry()");
  const table = new FingerprintTable(6, true);
  table.add(unit("loop.py", repeated));
  assert.deepEqual(findDuplicateBlocks([table], 6), []);
});

test("comment and blank lines do not count toward a block", () => {
  const table = new FingerprintTable(6, true);
  table.add(unit("a.py", ["# Copyright header", "# all rights reserved", "", "x = 1"]));
  table.add(unit("b.py", ["# Copyright header", "# all rights reserved", "", "y = 2"]));
  assert.equal(table.entries.length, 0);
});

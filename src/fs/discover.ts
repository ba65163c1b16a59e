import path from "node:path";
import { readFileSync, statSync } from "node:fs";
import fg from "fast-glob";
import ignore from "ignore";
import { detectLanguage, isKnownFilename } from "./language.js";
import type { ScanCandidate } from "../types.js";

export interface DiscoverOptions {
  root: string;
  includeExtensions: readonly string[];
  includeFilenames: readonly string[];
  exclude: readonly string[];
  generatedPaths: readonly string[];
  includeGenerated: boolean;
}

function loadGitignore(root: string): string[] {
  const gitignorePath = path.join(root, ".gitignore");
  try {
    const raw = readFileSync(gitignorePath, "utf-8");
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line && !line.startsWith("#"));
  } catch {
    return [];
  }
}

export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

function isIncluded(relPath: string, options: DiscoverOptions): boolean {
  if (isKnownFilename(relPath, options.includeFilenames)) return true;
  const ext = path.extname(relPath).toLowerCase();
  return ext !== "" && options.includeExtensions.includes(ext);
}

function fileSize(absolutePath: string): number {
  try {
    return statSync(absolutePath).size;
  } catch {
    // Left for the orchestrator, which records the file as unreadable.
    return 0;
  }
}

function toCandidate(root: string, absolutePath: string): ScanCandidate {
  const relPath = toPosixRelative(root, absolutePath);
  return {
    path: relPath,
    absolutePath,
    language: detectLanguage(relPath),
    sizeBytes: fileSize(absolutePath)
  };
}

/**
 * Lists scan candidates under `root`, sorted by path. Size, binary and generated-header
 * checks happen when the orchestrator reads each file.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<ScanCandidate[]> {
  const root = path.resolve(options.root);
  const rootStat = statSync(root);
  if (rootStat.isFile()) {
    return [toCandidate(path.dirname(root), root)];
  }

  const ig = ignore();
  ig.add([...options.exclude]);
  ig.add(loadGitignore(root));
  if (!options.includeGenerated) {
    ig.add([...options.generatedPaths]);
  }

  const entries = await fg(["**/*"], {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    absolute: true
  });

  const candidates: ScanCandidate[] = [];
  for (const file of entries) {
    const rel = toPosixRelative(root, file);
    if (ig.ignores(rel)) continue;
    if (!isIncluded(rel, options)) continue;
    candidates.push(toCandidate(root, file));
  }

  return candidates.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

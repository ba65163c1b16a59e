import path from "node:path";
import type { Language } from "../types.js";

const EXTENSION_LANGUAGES: Record<string, Language> = {
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".ts": "javascript",
  ".tsx": "javascript",
  ".mts": "javascript",
  ".cts": "javascript",
  ".py": "python",
  ".java": "java",
  ".go": "go",
  ".kt": "kotlin",
  ".kts": "kotlin",
  ".rb": "ruby",
  ".php": "php",
  ".cs": "csharp",
  ".rs": "rust",
  ".swift": "swift",
  ".c": "c",
  ".h": "c",
  ".cc": "cpp",
  ".cpp": "cpp",
  ".cxx": "cpp",
  ".hpp": "cpp",
  ".sh": "shell",
  ".bash": "shell",
  ".zsh": "shell",
  ".sql": "sql",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".ini": "ini",
  ".cfg": "ini",
  ".md": "markdown",
  ".markdown": "markdown",
  ".html": "html",
  ".htm": "html",
  ".xml": "xml",
  ".txt": "text",
  ".dockerfile": "dockerfile"
};

const FILENAME_LANGUAGES: Record<string, Language> = {
  dockerfile: "dockerfile",
  containerfile: "dockerfile",
  jenkinsfile: "text",
  makefile: "shell",
  vagrantfile: "ruby",
  ".env": "shell"
};

/** `"PY"` and `".py "` both become `".py"`. */
export function normalizeExtension(ext: string): string {
  const lowered = ext.trim().toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

/** Base name used for filename matching: `Dockerfile.prod` and `.env.local` count as their stem. */
export function filenameStem(filePath: string): string {
  const base = path.basename(filePath).toLowerCase();
  if (base.startsWith(".env")) return ".env";
  const dot = base.indexOf(".", 1);
  return dot > 0 ? base.slice(0, dot) : base;
}

function lookup(table: Record<string, Language>, key: string): Language | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/** Known extensions win; otherwise well-known file names such as `Dockerfile.prod` are matched by stem. */
export function detectLanguage(filePath: string): Language {
  const byExtension = lookup(EXTENSION_LANGUAGES, path.extname(filePath).toLowerCase());
  if (byExtension) return byExtension;
  return lookup(FILENAME_LANGUAGES, filenameStem(filePath)) ?? "text";
}

export function isKnownFilename(filePath: string, includeFilenames: readonly string[]): boolean {
  const stem = filenameStem(filePath);
  return includeFilenames.some((name) => name.toLowerCase() === stem);
}

import type { RuleThresholds } from "../scan/catalog/types.js";

export const DEFAULT_INCLUDE_EXTENSIONS = [
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
  ".py",
  ".java",
  ".go",
  ".kt",
  ".kts",
  ".rb",
  ".php",
  ".cs",
  ".rs",
  ".swift",
  ".c",
  ".h",
  ".cc",
  ".cpp",
  ".hpp",
  ".sh",
  ".bash",
  ".zsh",
  ".sql",
  ".json",
  ".yaml",
  ".yml",
  ".toml",
  ".ini",
  ".cfg",
  ".md",
  ".html",
  ".xml",
  ".txt",
  ".dockerfile"
];

export const DEFAULT_INCLUDE_FILENAMES = [
  "Dockerfile",
  "Containerfile",
  "Jenkinsfile",
  "Makefile",
  "Vagrantfile",
  ".env"
];

export const DEFAULT_EXCLUDES = ["**/.git/**", "**/.polygate/**", "**/.venv/**", "**/venv/**", "**/__pycache__/**"];

export const DEFAULT_GENERATED_PATHS = [
  "**/node_modules/**",
  "**/dist/**",
  "**/build/**",
  "**/target/**",
  "**/out/**",
  "**/.next/**",
  "**/coverage/**",
  "**/vendor/**",
  "**/*.min.js",
  "**/*.min.css",
  "**/*.map"
];

export const DEFAULT_THRESHOLDS: RuleThresholds = {
  maxLineLength: 140,
  maxParams: 6,
  maxFunctionLines: 60,
  maxNesting: 4,
  maxImports: 20,
  maxMethods: 15,
  minCohesion: 0.15,
  maxTopLevelFunctions: 20
};

export const DEFAULT_MAX_FILE_SIZE_KB = 1024;
export const DEFAULT_MIN_DUPLICATE_LINES = 6;
export const DEFAULT_CONCURRENCY = 8;

export const CONFIG_FILE_NAMES = ["polygate.config.json", ".polygaterc.json"];
export const STATE_DIR_NAME = ".polygate";

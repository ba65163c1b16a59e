import { CODE_LANGUAGES } from "./helpers.js";
import type { RuleDefinition, RuleMatch } from "./types.js";
import type { Language } from "../../types.js";

const EVAL_LANGUAGES: readonly Language[] = [
  "java",
  "go",
  "kotlin",
  "shell",
  "ruby",
  "php",
  "csharp",
  "rust",
  "swift",
  "c",
  "cpp"
];

const PROSE_LANGUAGES: ReadonlySet<Language> = new Set(["markdown", "text", "html", "xml"]);

const INSECURE_HTTP_PATTERN =
  /\bhttp:\/\/(?!(?:localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1\]|www\.w3\.org)(?![\w.-])|schemas\.)[^\s'"`)<>]+/i;

export const GENERIC_RULES: RuleDefinition[] = [
  {
    id: "PG101",
    title: "Dynamic code evaluation",
    category: "security",
    description: "eval()/Function() style evaluation executes strings as code.",
    severity: "high",
    languages: EVAL_LANGUAGES,
    security: true,
    parseFallback: true,
    detector: {
      kind: "line",
      pattern: /\b(eval|Function)\s*\(/,
      skipComments: true,
      message: (match) => `Avoid dynamic evaluation via ${match[1]}().`
    }
  },
  {
    id: "PG102",
    title: "Private key material in source",
    category: "security",
    description: "A private key block marker is committed to the repository.",
    severity: "critical",
    languages: "*",
    security: true,
    detector: {
      kind: "line",
      pattern: /-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----/,
      message: () => "Private key block found. Remove key material from source control."
    }
  },
  {
    id: "PG103",
    title: "Potential hardcoded secret",
    category: "security",
    description: "A credential-like name is assigned a literal value of eight or more characters.",
    severity: "high",
    languages: "*",
    security: true,
    detector: {
      kind: "line",
      pattern: /(api[_-]?key|secret|token|password)\s*[:=]\s*['"][^'"]{8,}['"]/i,
      message: (match) => `Possible hardcoded ${match[1].toLowerCase()} assignment.`
    }
  },
  {
    id: "PG104",
    title: "Work item marker",
    category: "style",
    description: "TODO/FIXME markers left in source.",
    severity: "low",
    languages: "*",
    security: false,
    detector: {
      kind: "line",
      pattern: /\b(TODO|FIXME)\b/,
      message: (match) => `${match[1]} marker found. Track and resolve before release.`
    }
  },
  {
    id: "PG105",
    title: "Unresolved merge conflict marker",
    category: "security",
    description: "Git merge conflict markers left in a file.",
    severity: "high",
    languages: "*",
    security: true,
    detector: {
      kind: "line",
      pattern: /^(?:<{7}|>{7})(?: |$)|^={7}$/,
      // A row of "=" underlines a heading in markdown.
      unless: (match, _line, ctx) => match[0].startsWith("=") && ctx.unit.language === "markdown",
      message: () => "Unresolved merge conflict marker."
    }
  },
  {
    id: "PG106",
    title: "Line too long",
    category: "style",
    description: "Lines longer than the configured maximum are hard to review.",
    severity: "low",
    languages: "*",
    security: false,
    detector: {
      kind: "scan",
      scan: ({ unit, lines, thresholds }) => {
        if (PROSE_LANGUAGES.has(unit.language) || unit.language === "json") return [];
        const matches: RuleMatch[] = [];
        for (let index = 0; index < lines.length; index += 1) {
          const length = lines[index].length;
          if (length <= thresholds.maxLineLength) continue;
          matches.push({
            line: index + 1,
            column: thresholds.maxLineLength + 1,
            message: `Line is ${length} characters long; keep it at or below ${thresholds.maxLineLength}.`
          });
        }
        return matches;
      }
    }
  },
  {
    id: "PG107",
    title: "Trailing whitespace",
    category: "style",
    description: "Whitespace at the end of a line.",
    severity: "low",
    languages: [...CODE_LANGUAGES, "dockerfile", "yaml", "toml", "ini"],
    security: false,
    detector: {
      kind: "line",
      pattern: /[ \t]+$/,
      message: () => "Trailing whitespace."
    }
  },
  {
    id: "PG108",
    title: "Insecure HTTP URL",
    category: "security",
    description: "Plain http:// endpoints send traffic unencrypted.",
    severity: "medium",
    languages: "*",
    security: true,
    detector: {
      kind: "line",
      pattern: INSECURE_HTTP_PATTERN,
      skipComments: true,
      message: (match) => `Insecure URL ${match[0]}; use https.`
    }
  },
  {
    id: "PG109",
    title: "Duplicated block",
    category: "duplication",
    description: "The same block of lines appears in more than one place.",
    severity: "medium",
    languages: [...CODE_LANGUAGES, "text"],
    security: false,
    detector: { kind: "cross_file" }
  }
];

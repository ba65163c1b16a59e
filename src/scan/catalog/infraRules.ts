import type { PatternContext, RuleDefinition, RuleMatch, ScanDetector } from "./types.js";

const FROM_PATTERN = /^\s*FROM\s+(?:--platform=\S+\s+)?(\S+)(?:\s+AS\s+(\S+))?/i;
const USER_PATTERN = /^\s*USER\s+(\S+)/i;
const ROOT_USERS = new Set(["root", "0", "root:root", "0:0"]);

export function isKubernetesManifest(content: string): boolean {
  return /^\s*apiVersion\s*:/m.test(content) && /^\s*kind\s*:/m.test(content);
}

function manifestSetting(pattern: RegExp, describe: (match: RegExpExecArray) => string): ScanDetector {
  return {
    kind: "scan",
    scan: ({ unit, lines }: PatternContext) => {
      if (!isKubernetesManifest(unit.content)) return [];
      const matches: RuleMatch[] = [];
      lines.forEach((line, index) => {
        const match = pattern.exec(line);
        if (!match) return;
        matches.push({ line: index + 1, column: match.index + 1, message: describe(match) });
      });
      return matches;
    }
  };
}

function scanDockerUser({ lines }: PatternContext): RuleMatch[] {
  let lastFrom = -1;
  lines.forEach((line, index) => {
    if (FROM_PATTERN.test(line)) lastFrom = index;
  });
  if (lastFrom < 0) return [];

  let lastUser: { index: number; user: string } | null = null;
  for (let index = lastFrom + 1; index < lines.length; index += 1) {
    const match = USER_PATTERN.exec(lines[index]);
    if (match) lastUser = { index, user: match[1] };
  }
  if (!lastUser) {
    return [
      {
        line: lastFrom + 1,
        message: "Final image stage never switches to a non-root USER."
      }
    ];
  }
  if (ROOT_USERS.has(lastUser.user.toLowerCase())) {
    return [{ line: lastUser.index + 1, message: `Container runs as ${lastUser.user}; use a non-root USER.` }];
  }
  return [];
}

function scanDockerBaseImages({ lines }: PatternContext): RuleMatch[] {
  const stages = new Set<string>();
  const matches: RuleMatch[] = [];
  lines.forEach((line, index) => {
    const match = FROM_PATTERN.exec(line);
    if (!match) return;
    const image = match[1];
    const alias = match[2];
    const pinned =
      image.toLowerCase() === "scratch" ||
      image.startsWith("$") ||
      image.includes("@sha256:") ||
      stages.has(image.toLowerCase());
    if (!pinned) {
      const lastSegment = image.slice(image.lastIndexOf("/") + 1);
      const tagIndex = lastSegment.indexOf(":");
      const tag = tagIndex >= 0 ? lastSegment.slice(tagIndex + 1) : "";
      if (!tag) {
        matches.push({ line: index + 1, message: `Base image ${image} has no tag; pin a version.` });
      } else if (tag.toLowerCase() === "latest") {
        matches.push({ line: index + 1, message: `Base image ${image} uses the latest tag; pin a version.` });
      }
    }
    if (alias) stages.add(alias.toLowerCase());
  });
  return matches;
}

export const INFRA_RULES: RuleDefinition[] = [
  {
    id: "PG110",
    title: "Container runs as root",
    category: "infrastructure",
    description: "The final Dockerfile stage has no USER instruction or switches to root.",
    severity: "high",
    languages: ["dockerfile"],
    security: true,
    detector: { kind: "scan", scan: scanDockerUser }
  },
  {
    id: "PG111",
    title: "Unpinned base image",
    category: "infrastructure",
    description: "FROM without a tag or digest, or with the latest tag.",
    severity: "medium",
    languages: ["dockerfile"],
    security: true,
    detector: { kind: "scan", scan: scanDockerBaseImages }
  },
  {
    id: "PG112",
    title: "Remote script piped to shell",
    category: "infrastructure",
    description: "curl/wget output is executed directly by a shell.",
    severity: "high",
    languages: ["dockerfile", "shell"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\b(curl|wget)\b[^|\n]*\|\s*(?:sudo\s+)?(?:ba|z)?sh\b/,
      skipComments: true,
      message: (match) => `${match[1]} output is piped straight into a shell; download and verify first.`
    }
  },
  {
    id: "PG113",
    title: "Privileged container",
    category: "infrastructure",
    description: "securityContext.privileged is enabled in a Kubernetes manifest.",
    severity: "high",
    languages: ["yaml"],
    security: true,
    detector: manifestSetting(/^\s*-?\s*privileged\s*:\s*true\b/, () => "Container runs privileged.")
  },
  {
    id: "PG114",
    title: "Privilege escalation allowed",
    category: "infrastructure",
    description: "allowPrivilegeEscalation is true in a Kubernetes manifest.",
    severity: "high",
    languages: ["yaml"],
    security: true,
    detector: manifestSetting(
      /^\s*-?\s*allowPrivilegeEscalation\s*:\s*true\b/,
      () => "allowPrivilegeEscalation is enabled; set it to false."
    )
  },
  {
    id: "PG115",
    title: "Root user permitted",
    category: "infrastructure",
    description: "runAsNonRoot is explicitly false in a Kubernetes manifest.",
    severity: "medium",
    languages: ["yaml"],
    security: true,
    detector: manifestSetting(/^\s*-?\s*runAsNonRoot\s*:\s*false\b/, () => "runAsNonRoot is disabled.")
  },
  {
    id: "PG116",
    title: "Host namespace shared",
    category: "infrastructure",
    description: "hostNetwork, hostPID or hostIPC is enabled in a Kubernetes manifest.",
    severity: "high",
    languages: ["yaml"],
    security: true,
    detector: manifestSetting(
      /^\s*-?\s*(hostNetwork|hostPID|hostIPC)\s*:\s*true\b/,
      (match) => `${match[1]} is enabled; the pod shares the host namespace.`
    )
  }
];

import { readEnvRaw } from "./env.js";

export const SECURITY_ONLY_FLAG = "POLYGATE_SECURITY_ONLY";
export const DISABLE_INLINE_IGNORE_FLAG = "POLYGATE_DISABLE_INLINE_IGNORE";
export const INCLUDE_GENERATED_FLAG = "POLYGATE_INCLUDE_GENERATED";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

/** Returns the flag's boolean value, or null when unset or unrecognized. */
export function readFlag(name: string): boolean | null {
  const raw = readEnvRaw(name);
  if (raw == null) return null;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return null;
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return null;
}

export function isSecurityOnlyEnabled(): boolean | null {
  return readFlag(SECURITY_ONLY_FLAG);
}

export function isInlineIgnoreEnabled(): boolean | null {
  const disabled = readFlag(DISABLE_INLINE_IGNORE_FLAG);
  return disabled == null ? null : !disabled;
}

export function isIncludeGeneratedEnabled(): boolean | null {
  return readFlag(INCLUDE_GENERATED_FLAG);
}

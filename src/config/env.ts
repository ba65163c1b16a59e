import { ConfigInvalidThresholdError } from "../errors/config.errors.js";

export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim();
}

export function readEnvRaw(name: string): string | undefined {
  return process.env[name];
}

export function readEnvList(name: string): string[] | null {
  const raw = readEnv(name);
  if (!raw) return null;
  return raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}

export function readEnvNumber(name: string): number | null {
  const raw = readEnv(name);
  if (!raw) return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigInvalidThresholdError(name, raw, "a number");
  }
  return value;
}

import { readEnvRaw } from "./env.js";

export const DISABLE_MANIFEST_FALLBACK_FLAG = "MCPSCAN_DISABLE_MANIFEST_FALLBACK";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

export function parseFlag(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw == null) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return defaultValue;
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return defaultValue;
}

export function isManifestFallbackEnabled(): boolean {
  return !parseFlag(readEnvRaw(DISABLE_MANIFEST_FALLBACK_FLAG), false);
}

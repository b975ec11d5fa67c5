import path from "node:path";
import { existsSync, readFileSync } from "node:fs";
import {
  PACKAGE_MANIFEST_FILE,
  PACKAGE_MCP_MARKERS,
  PYTHON_MANIFEST_FILES,
  PYTHON_MCP_MARKERS
} from "../config/defaults.js";
import { noopLogger, type Logger } from "../logging/logger.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function pythonManifestMentionsMcp(content: string): boolean {
  return PYTHON_MCP_MARKERS.some((marker) => content.includes(marker));
}

/**
 * True when a dependency or devDependency key of a package.json names an MCP package.
 * Anything that is not an object with object-valued dependency maps counts as no reference.
 */
export function packageManifestMentionsMcp(data: unknown): boolean {
  if (!isRecord(data)) return false;
  const names: string[] = [];
  for (const field of ["dependencies", "devDependencies"]) {
    const deps = data[field];
    if (deps === undefined) continue;
    if (!isRecord(deps)) return false;
    names.push(...Object.keys(deps));
  }
  return names.some((name) => PACKAGE_MCP_MARKERS.some((marker) => name.includes(marker)));
}

/** Looks for an MCP dependency in the manifests at the repository root. */
export function isMcpServer(repoPath: string, logger: Logger = noopLogger): boolean {
  for (const manifest of PYTHON_MANIFEST_FILES) {
    const filePath = path.join(repoPath, manifest);
    if (!existsSync(filePath)) continue;
    if (pythonManifestMentionsMcp(readFileSync(filePath, "utf-8"))) {
      logger.debug("MCP dependency found", { manifest });
      return true;
    }
  }

  const packagePath = path.join(repoPath, PACKAGE_MANIFEST_FILE);
  if (!existsSync(packagePath)) return false;

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(packagePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug("Ignoring unreadable package manifest", { manifest: PACKAGE_MANIFEST_FILE, message });
    return false;
  }

  const found = packageManifestMentionsMcp(data);
  if (found) {
    logger.debug("MCP dependency found", { manifest: PACKAGE_MANIFEST_FILE });
  }
  return found;
}

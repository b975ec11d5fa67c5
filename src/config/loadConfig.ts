import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readListEnv } from "./env.js";
import { isManifestFallbackEnabled } from "./featureFlags.js";
import {
  DEFAULT_LANGUAGES,
  DEFAULT_REPO_BASE_URL,
  DEFAULT_REPORT_PATH,
  DEFAULT_RESULTS_LINK_PREFIX,
  DEFAULT_SCANNERS,
  STATE_DIR_NAME
} from "./defaults.js";
import {
  ConfigFileParseError,
  ConfigInvalidScannersError,
  ConfigUnsupportedLanguageError
} from "../errors/config.errors.js";
import type { ToolLanguageId } from "../types.js";

export interface McpScanConfig {
  projectRoot: string;
  stateDir: string;
  detection: {
    languages: ToolLanguageId[];
    exclude: string[];
    manifestFallback: boolean;
  };
  results: {
    scanners: string[];
    reportPath: string;
    repoBaseUrl: string;
    resultsLinkPrefix: string;
  };
}

interface McpScanConfigFile {
  detection?: {
    languages?: string[];
    exclude?: string[];
    manifestFallback?: boolean;
  };
  results?: {
    scanners?: string[];
    reportPath?: string;
    repoBaseUrl?: string;
    resultsLinkPrefix?: string;
  };
}

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function parseConfigFile(raw: unknown): McpScanConfigFile {
  if (!isRecord(raw)) return {};
  const detection: Record<string, unknown> = isRecord(raw.detection) ? raw.detection : {};
  const results: Record<string, unknown> = isRecord(raw.results) ? raw.results : {};
  return {
    detection: {
      languages: readStringArray(detection.languages),
      exclude: readStringArray(detection.exclude),
      manifestFallback: readBoolean(detection.manifestFallback)
    },
    results: {
      scanners: readStringArray(results.scanners),
      reportPath: readString(results.reportPath),
      repoBaseUrl: readString(results.repoBaseUrl),
      resultsLinkPrefix: readString(results.resultsLinkPrefix)
    }
  };
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<McpScanConfigFile> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : [
        path.resolve(projectRoot, "mcpscan.config.json"),
        path.resolve(projectRoot, ".mcpscanrc.json")
      ];

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    try {
      return parseConfigFile(JSON.parse(raw));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigFileParseError(candidate, message);
    }
  }

  return {};
}

function isToolLanguageId(value: string): value is ToolLanguageId {
  return value === "python" || value === "typescript";
}

function normalizeLanguages(values: string[]): ToolLanguageId[] {
  const languages: ToolLanguageId[] = [];
  for (const value of values) {
    const lowered = value.trim().toLowerCase();
    if (!isToolLanguageId(lowered)) {
      throw new ConfigUnsupportedLanguageError(value);
    }
    if (!languages.includes(lowered)) languages.push(lowered);
  }
  return languages;
}

function normalizeScanners(values: string[]): string[] {
  const scanners: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (!trimmed) continue;
    if (/[\\/]/.test(trimmed)) {
      throw new ConfigInvalidScannersError();
    }
    if (!scanners.includes(trimmed)) scanners.push(trimmed);
  }
  if (!scanners.length) {
    throw new ConfigInvalidScannersError();
  }
  return scanners;
}

export async function loadConfig(params: LoadConfigParams): Promise<McpScanConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);

  const languages = normalizeLanguages(
    readListEnv("MCPSCAN_LANGUAGES") ?? configFile.detection?.languages ?? DEFAULT_LANGUAGES
  );

  const scanners = normalizeScanners(
    readListEnv("MCPSCAN_SCANNERS") ?? configFile.results?.scanners ?? DEFAULT_SCANNERS
  );

  return {
    projectRoot: params.projectRoot,
    stateDir: path.join(params.projectRoot, STATE_DIR_NAME),
    detection: {
      languages,
      exclude: readListEnv("MCPSCAN_DETECT_EXCLUDE") ?? configFile.detection?.exclude ?? [],
      manifestFallback: isManifestFallbackEnabled() && (configFile.detection?.manifestFallback ?? true)
    },
    results: {
      scanners,
      reportPath: readEnv("MCPSCAN_REPORT_PATH") || configFile.results?.reportPath || DEFAULT_REPORT_PATH,
      repoBaseUrl:
        readEnv("MCPSCAN_REPO_BASE_URL") || configFile.results?.repoBaseUrl || DEFAULT_REPO_BASE_URL,
      resultsLinkPrefix:
        readEnv("MCPSCAN_RESULTS_LINK_PREFIX") ||
        configFile.results?.resultsLinkPrefix ||
        DEFAULT_RESULTS_LINK_PREFIX
    }
  };
}

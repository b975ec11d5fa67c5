import path from "node:path";
import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { ResultsFileFormatError, ResultsFileParseError } from "../errors/results.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { ScannerResults, ViolationRecord } from "../types.js";

const VIOLATIONS_SUFFIX = "-violations.json";

export function repoResultsFileName(orgName: string, repoName: string): string {
  return `${orgName}-${repoName}${VIOLATIONS_SUFFIX}`;
}

export function scannerTempFileName(scanner: string): string {
  return `${scanner}${VIOLATIONS_SUFFIX}`;
}

export function tempScannerFileNames(scanners: string[]): Set<string> {
  return new Set(scanners.map(scannerTempFileName));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isViolationList(value: unknown): value is ViolationRecord[] {
  return Array.isArray(value) && value.every(isRecord);
}

export function parseScannerResults(raw: string, filePath: string): ScannerResults {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ResultsFileParseError(filePath, message);
  }
  if (!isRecord(parsed)) {
    throw new ResultsFileFormatError(filePath);
  }

  const entries: [string, ViolationRecord[]][] = [];
  for (const [scanner, violations] of Object.entries(parsed)) {
    if (!isViolationList(violations)) {
      throw new ResultsFileFormatError(filePath);
    }
    entries.push([scanner, violations]);
  }
  // fromEntries defines own properties, so a scanner named "__proto__" stays a key.
  return Object.fromEntries(entries);
}

export function readScannerResults(filePath: string): ScannerResults {
  return parseScannerResults(readFileSync(filePath, "utf-8"), filePath);
}

/**
 * Loads `{org}-{repo}-violations.json` and layers every registered scanner's temp file on top.
 * Each scanner key found in a temp file replaces the stored entry for that key.
 */
export function aggregateResults(
  orgName: string,
  repoName: string,
  resultsDir: string,
  scanners: string[]
): ScannerResults {
  let aggregated: ScannerResults = {};

  const perRepoFile = path.join(resultsDir, repoResultsFileName(orgName, repoName));
  if (existsSync(perRepoFile)) {
    aggregated = readScannerResults(perRepoFile);
  }

  for (const scanner of scanners) {
    const scannerFile = path.join(resultsDir, scannerTempFileName(scanner));
    if (!existsSync(scannerFile)) continue;
    const scannerData = readScannerResults(scannerFile);
    aggregated = Object.fromEntries([...Object.entries(aggregated), ...Object.entries(scannerData)]);
  }

  return aggregated;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint" || typeof value === "symbol" || typeof value === "function") {
    return String(value);
  }
  return value;
}

export function serializeScannerResults(results: ScannerResults): string {
  return JSON.stringify(results, jsonReplacer, 2);
}

/** Writes the per-repo file, then removes every registered scanner temp file that exists. */
export function saveAggregatedResults(
  orgName: string,
  repoName: string,
  results: ScannerResults,
  resultsDir: string,
  scanners: string[],
  logger: Logger = noopLogger
): string {
  mkdirSync(resultsDir, { recursive: true });

  const violationsFile = path.join(resultsDir, repoResultsFileName(orgName, repoName));
  writeFileSync(violationsFile, serializeScannerResults(results), "utf-8");
  logger.info(`Saved results to ${violationsFile}`);

  for (const scanner of scanners) {
    const tempFile = path.join(resultsDir, scannerTempFileName(scanner));
    if (!existsSync(tempFile)) continue;
    unlinkSync(tempFile);
    logger.info(`Removed temporary scanner file: ${tempFile}`);
  }

  return violationsFile;
}

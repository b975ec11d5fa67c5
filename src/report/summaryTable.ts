import path from "node:path";
import fg from "fast-glob";
import { DEFAULT_REPO_BASE_URL, DEFAULT_RESULTS_LINK_PREFIX } from "../config/defaults.js";
import { readScannerResults, repoResultsFileName, tempScannerFileNames } from "../results/aggregateResults.js";
import {
  countBySeverity,
  countFixable,
  formatScannersUsed,
  severityRank,
  severityStatusEmoji,
  worstSeverity
} from "../results/severity.js";
import type { SummaryRow, ViolationRecord } from "../types.js";

export interface SummaryTableOptions {
  scanners: string[];
  repoBaseUrl?: string;
  resultsLinkPrefix?: string;
}

const REPORT_TITLE = "# Vulnerability Scan Results";
const TABLE_HEADER = "| Project | Results | Total | Critical | High | Medium | Low | Fixable | Scanners | Status |";
const TABLE_DIVIDER = "|---------|---------|-------|----------|------|--------|-----|---------|----------|--------|";

/** `org-repo-violations.json` -> ["org", "repo"]; the org ends at the first hyphen. */
export function parseRepoResultsFileName(fileName: string): [string, string] | null {
  const stem = fileName.endsWith(".json") ? fileName.slice(0, -".json".length) : fileName;
  const orgRepo = stem.split("-violations").join("");
  const separator = orgRepo.indexOf("-");
  if (separator === -1) return null;
  return [orgRepo.slice(0, separator), orgRepo.slice(separator + 1)];
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rows sort by negated severity rank, then by `org/repo`. The most severe repositories
 * therefore come last; an unranked worst severity would sort first.
 */
export function sortSummaryRows(rows: SummaryRow[]): SummaryRow[] {
  return [...rows].sort((a, b) => {
    const byRank = severityRank(b.worstSeverity) - severityRank(a.worstSeverity);
    if (byRank !== 0) return byRank;
    return compareCodePoints(a.orgRepo, b.orgRepo);
  });
}

export function buildSummaryRow(orgName: string, repoName: string, scanners: Record<string, ViolationRecord[]>): SummaryRow {
  const violations = Object.values(scanners).flat();
  const worst = worstSeverity(violations);
  return {
    orgRepo: `${orgName}/${repoName}`,
    filename: repoResultsFileName(orgName, repoName),
    total: violations.length,
    worstSeverity: worst,
    severityCounts: countBySeverity(violations),
    fixable: countFixable(violations),
    scanners: formatScannersUsed(scanners),
    status: severityStatusEmoji(worst)
  };
}

export async function buildSummaryRows(resultsDir: string, options: SummaryTableOptions): Promise<SummaryRow[]> {
  const tempFiles = tempScannerFileNames(options.scanners);
  const files = await fg(["*-*-violations.json"], {
    cwd: resultsDir,
    onlyFiles: true,
    dot: true
  });

  const rows: SummaryRow[] = [];
  for (const fileName of files) {
    if (tempFiles.has(fileName)) continue;
    const parsed = parseRepoResultsFileName(fileName);
    if (!parsed) continue;
    const [orgName, repoName] = parsed;
    const scanners = readScannerResults(path.join(resultsDir, fileName));
    rows.push(buildSummaryRow(orgName, repoName, scanners));
  }

  return sortSummaryRows(rows);
}

export function formatSummaryRow(row: SummaryRow, options: Omit<SummaryTableOptions, "scanners"> = {}): string {
  const repoBaseUrl = (options.repoBaseUrl ?? DEFAULT_REPO_BASE_URL).replace(/\/+$/, "");
  const linkPrefix = (options.resultsLinkPrefix ?? DEFAULT_RESULTS_LINK_PREFIX).replace(/\/+$/, "");
  const repoLink = `[${row.orgRepo}](${repoBaseUrl}/${row.orgRepo})`;
  const violationsLink = `[📋](${linkPrefix}/${row.filename})`;
  const counts = row.severityCounts;
  return (
    `| ${repoLink} | ${violationsLink} | ${row.total} | ` +
    `${counts.CRITICAL} | ${counts.HIGH} | ${counts.MEDIUM} | ${counts.LOW} | ` +
    `${row.fixable} | ${row.scanners} | ${row.status} |`
  );
}

export function renderSummaryTable(rows: SummaryRow[], options: Omit<SummaryTableOptions, "scanners"> = {}): string {
  const lines = [REPORT_TITLE, "", TABLE_HEADER, TABLE_DIVIDER];
  for (const row of rows) {
    lines.push(formatSummaryRow(row, options));
  }
  return lines.join("\n");
}

export async function generateSummaryTable(resultsDir: string, options: SummaryTableOptions): Promise<string> {
  const rows = await buildSummaryRows(resultsDir, options);
  return renderSummaryTable(rows, options);
}

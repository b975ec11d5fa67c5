import path from "node:path";
import { writeFile } from "node:fs/promises";
import { noopLogger, type Logger } from "../logging/logger.js";
import { generateSummaryTable } from "../report/summaryTable.js";
import { aggregateResults, saveAggregatedResults } from "./aggregateResults.js";
import type { ScannerResults } from "../types.js";

export interface RunAggregateOptions {
  orgName: string;
  repoName: string;
  resultsDir: string;
  reportPath: string;
  scanners: string[];
  repoBaseUrl?: string;
  resultsLinkPrefix?: string;
  logger?: Logger;
}

export interface RunAggregateResult {
  results: ScannerResults;
  violationsFile: string;
  reportPath: string;
  summary: string;
}

/** aggregate -> save -> summarize every repository -> write the report. */
export async function runAggregate(options: RunAggregateOptions): Promise<RunAggregateResult> {
  const logger = options.logger ?? noopLogger;

  const results = aggregateResults(options.orgName, options.repoName, options.resultsDir, options.scanners);
  logger.debug("Aggregated scanner results", {
    repo: `${options.orgName}/${options.repoName}`,
    scanners: Object.keys(results)
  });

  const violationsFile = saveAggregatedResults(
    options.orgName,
    options.repoName,
    results,
    options.resultsDir,
    options.scanners,
    logger
  );

  const summary = await generateSummaryTable(options.resultsDir, {
    scanners: options.scanners,
    repoBaseUrl: options.repoBaseUrl,
    resultsLinkPrefix: options.resultsLinkPrefix
  });

  await writeFile(options.reportPath, summary, "utf-8");
  logger.info(`Generated ${path.basename(options.reportPath)} with vulnerability summary`);

  return { results, violationsFile, reportPath: options.reportPath, summary };
}

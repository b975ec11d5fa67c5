#!/usr/bin/env node
import path from "node:path";
import { Command, Option } from "commander";
import pc from "picocolors";
import { loadConfig } from "./config/loadConfig.js";
import { ToolDetector } from "./scan/toolDetector.js";
import { runAggregate } from "./results/runAggregate.js";
import { formatToolsJson, formatToolsText } from "./report/formatters.js";
import { createAppLogger, noopLogger, withConsole, type AppLogger } from "./logging/logger.js";

const AGGREGATE_USAGE = "Usage: mcpscan aggregate <org_name> <repo_name> <results_dir>";

const program = new Command();

async function openAppLogger(stateDir: string, label: string, debug?: boolean): Promise<AppLogger | null> {
  if (!debug) return null;
  try {
    return await createAppLogger({ stateDir, label, level: "debug" });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(pc.yellow(`Debug log unavailable: ${message}`));
    return null;
  }
}

async function closeAppLogger(appLogger: AppLogger | null): Promise<void> {
  try {
    await appLogger?.close();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(pc.yellow(`Debug log incomplete: ${message}`));
  }
}

program
  .name("mcpscan")
  .description("Detect MCP tool definitions and aggregate vulnerability scanner results")
  .version("0.1.0");

program
  .command("detect [target]")
  .description("Detect MCP tool definitions in a repository")
  .option("-c, --config <path>", "Path to mcpscan.config.json")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]).default("text"))
  .option("--json", "Shortcut for --format json")
  .option("--debug", "Write a debug log under .mcpscan/logs")
  .action(async (
    target: string | undefined,
    options: { config?: string; format: string; json?: boolean; debug?: boolean }
  ) => {
    const repoPath = target ?? ".";
    const projectRoot = path.resolve(process.cwd(), repoPath);
    const isJsonOutput = options.json || options.format === "json";
    let appLogger: AppLogger | null = null;
    try {
      const config = await loadConfig({ projectRoot, configPath: options.config });
      appLogger = await openAppLogger(config.stateDir, "detect", options.debug);
      const uiLogger = withConsole(appLogger ?? noopLogger, { quiet: true });

      const detector = new ToolDetector(repoPath, {
        languages: config.detection.languages,
        exclude: config.detection.exclude,
        manifestFallback: config.detection.manifestFallback,
        logger: uiLogger
      });
      const tools = await detector.detectTools();
      const toolsByFile = detector.getToolsByFile();

      if (isJsonOutput) {
        console.log(formatToolsJson(tools, toolsByFile));
      } else {
        console.log(formatToolsText(toolsByFile));
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      (appLogger ?? noopLogger).error(message);
      console.error(pc.red(`Error: ${message}`));
      process.exitCode = 2;
    } finally {
      await closeAppLogger(appLogger);
    }
  });

program
  .command("aggregate [orgName] [repoName] [resultsDir]")
  .description("Merge scanner temp files into <org>-<repo>-violations.json and regenerate the summary report")
  .option("-c, --config <path>", "Path to mcpscan.config.json")
  .option("-o, --output <path>", "Report path (default SCAN_RESULTS.md)")
  .option("--debug", "Write a debug log under .mcpscan/logs")
  .action(async (
    orgName: string | undefined,
    repoName: string | undefined,
    resultsDir: string | undefined,
    options: { config?: string; output?: string; debug?: boolean }
  ) => {
    if (!orgName || !repoName || !resultsDir) {
      console.log(AGGREGATE_USAGE);
      process.exitCode = 1;
      return;
    }

    const projectRoot = process.cwd();
    let appLogger: AppLogger | null = null;
    try {
      const config = await loadConfig({ projectRoot, configPath: options.config });
      appLogger = await openAppLogger(config.stateDir, "aggregate", options.debug);
      const uiLogger = withConsole(appLogger ?? noopLogger);

      await runAggregate({
        orgName,
        repoName,
        resultsDir: path.resolve(projectRoot, resultsDir),
        reportPath: path.resolve(projectRoot, options.output ?? config.results.reportPath),
        scanners: config.results.scanners,
        repoBaseUrl: config.results.repoBaseUrl,
        resultsLinkPrefix: config.results.resultsLinkPrefix,
        logger: uiLogger
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      (appLogger ?? noopLogger).error(message);
      console.error(pc.red(`Error: ${message}`));
      process.exitCode = 2;
    } finally {
      await closeAppLogger(appLogger);
    }
  });

await program.parseAsync(process.argv);

export * from "./scan/toolDetector.js";
export * from "./scan/mcpManifest.js";
export * from "./scan/detectors/pythonTools.js";
export * from "./scan/detectors/typescriptTools.js";
export * from "./results/aggregateResults.js";
export * from "./results/runAggregate.js";
export * from "./results/severity.js";
export * from "./report/summaryTable.js";
export * from "./report/formatters.js";
export * from "./config/loadConfig.js";
export * from "./types.js";

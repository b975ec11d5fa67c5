import { readFile, stat } from "node:fs/promises";
import { discoverFiles } from "../fs/discover.js";
import { toRelative } from "../fs/paths.js";
import {
  DEFAULT_LANGUAGES,
  UNDETECTED_TOOL_DESCRIPTION,
  UNDETECTED_TOOL_NAME
} from "../config/defaults.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { RepositoryNotDirectoryError } from "../errors/scan.errors.js";
import { isMcpServer } from "./mcpManifest.js";
import { pythonToolLanguage } from "./detectors/pythonTools.js";
import { typescriptToolLanguage } from "./detectors/typescriptTools.js";
import { lineNumberAt, normalizeNewlines, type ToolLanguage } from "./detectors/shared.js";
import type { DetectedTool, ToolLanguageId, ToolsByFile } from "../types.js";

export const TOOL_LANGUAGES: Record<ToolLanguageId, ToolLanguage> = {
  python: pythonToolLanguage,
  typescript: typescriptToolLanguage
};

export interface ToolDetectorOptions {
  languages?: ToolLanguageId[];
  exclude?: string[];
  manifestFallback?: boolean;
  logger?: Logger;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class ToolDetector {
  private tools: DetectedTool[] = [];
  private readonly logger: Logger;

  constructor(
    readonly repoPath: string,
    private readonly options: ToolDetectorOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  /** Runs a full detection pass, replacing the results of any earlier pass. */
  async detectTools(): Promise<DetectedTool[]> {
    this.tools = [];
    const rootStat = await stat(this.repoPath);
    if (!rootStat.isDirectory()) {
      throw new RepositoryNotDirectoryError(this.repoPath);
    }
    const languages = this.options.languages ?? DEFAULT_LANGUAGES;

    for (const languageId of languages) {
      const language = TOOL_LANGUAGES[languageId];
      const files = await discoverFiles({
        root: this.repoPath,
        extensions: language.extensions,
        exclude: this.options.exclude
      });
      this.logger.debug("Discovered source files", { language: language.id, count: files.length });

      for (const filePath of files) {
        const found = await this.detectInFile(language, filePath);
        this.tools.push(...found);
      }
    }

    const manifestFallback = this.options.manifestFallback ?? true;
    if (!this.tools.length && manifestFallback && isMcpServer(this.repoPath, this.logger)) {
      this.tools.push({
        name: UNDETECTED_TOOL_NAME,
        filePath: this.repoPath,
        description: UNDETECTED_TOOL_DESCRIPTION,
        lineNumber: 0
      });
    }

    this.logger.info("Tool detection finished", { repoPath: this.repoPath, tools: this.tools.length });
    return this.tools;
  }

  getToolsByFile(): ToolsByFile {
    const toolsByFile: ToolsByFile = new Map();
    for (const tool of this.tools) {
      const existing = toolsByFile.get(tool.filePath);
      if (existing) {
        existing.push(tool);
      } else {
        toolsByFile.set(tool.filePath, [tool]);
      }
    }
    return toolsByFile;
  }

  private async detectInFile(language: ToolLanguage, filePath: string): Promise<DetectedTool[]> {
    let content: string;
    try {
      content = normalizeNewlines(utf8.decode(await readFile(filePath)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.debug("Skipping unreadable file", { filePath, message });
      return [];
    }

    const relativePath = toRelative(this.repoPath, filePath);
    return language.detect(content).map((match) => ({
      name: match.name,
      filePath: relativePath,
      description: match.description,
      lineNumber: lineNumberAt(content, match.index)
    }));
  }
}

export async function detectToolsInRepo(
  repoPath: string,
  options?: ToolDetectorOptions
): Promise<DetectedTool[]> {
  const detector = new ToolDetector(repoPath, options);
  return await detector.detectTools();
}

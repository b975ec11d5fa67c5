import { LANGUAGE_EXTENSIONS } from "../../config/defaults.js";
import { byOffset, escapeRegExp, type ToolLanguage, type ToolMatch } from "./shared.js";

const TYPESCRIPT_TOOL_PATTERNS: RegExp[] = [
  // @Tool({ ... }) on a function or method; the identifier after it names the tool
  /@Tool\(\{[^}]*\}\)\s*(?:async\s+)?(?:function\s+)?([\p{L}\p{N}\p{Mn}\p{Mc}\p{Pc}]+)/gu,
  // server.setRequestHandler(ListToolsRequestSchema, ...) up to the first `name:` field
  /setRequestHandler\s*\(\s*ListToolsRequestSchema[^)]*\)\s*.*?name:\s*["']([^"']+)["']/gsu
];

export function findDecoratorDescription(content: string, toolName: string): string {
  const pattern = new RegExp(
    `@Tool\\(\\{[^}]*description:\\s*["']([^"']+)["'][^}]*\\}\\)\\s*(?:async\\s+)?(?:function\\s+)?${escapeRegExp(toolName)}`,
    "u"
  );
  return pattern.exec(content)?.[1] ?? "";
}

export function detectTypeScriptTools(content: string): ToolMatch[] {
  const matches: ToolMatch[] = [];

  for (const pattern of TYPESCRIPT_TOOL_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const toolName = match[1];
      if (!toolName || match.index === undefined) continue;
      matches.push({
        name: toolName,
        description: findDecoratorDescription(content, toolName),
        index: match.index
      });
    }
  }

  return byOffset(matches);
}

export const typescriptToolLanguage: ToolLanguage = {
  id: "typescript",
  extensions: LANGUAGE_EXTENSIONS.typescript,
  detect: detectTypeScriptTools
};

import pc from "picocolors";
import { toolToRecord, type DetectedTool, type ToolRecord, type ToolsByFile } from "../types.js";

function formatTool(tool: DetectedTool): string {
  const location = tool.lineNumber > 0 ? pc.dim(`:${tool.lineNumber}`) : "";
  const description = tool.description ? ` ${pc.dim("-")} ${tool.description}` : "";
  return `  ${pc.cyan(tool.name)}${location}${description}`;
}

export function formatToolsText(toolsByFile: ToolsByFile): string {
  if (!toolsByFile.size) {
    return pc.yellow("No MCP tools detected.");
  }

  const lines: string[] = [];
  let total = 0;
  for (const [filePath, tools] of toolsByFile) {
    lines.push(pc.bold(filePath));
    for (const tool of tools) {
      lines.push(formatTool(tool));
    }
    total += tools.length;
  }
  lines.push("");
  const fileLabel = toolsByFile.size === 1 ? "file" : "files";
  const toolLabel = total === 1 ? "tool" : "tools";
  lines.push(`${pc.green(String(total))} ${toolLabel} in ${toolsByFile.size} ${fileLabel}`);
  return lines.join("\n");
}

export function formatToolsJson(tools: DetectedTool[], toolsByFile: ToolsByFile): string {
  const grouped: Record<string, ToolRecord[]> = {};
  for (const [filePath, fileTools] of toolsByFile) {
    grouped[filePath] = fileTools.map(toolToRecord);
  }
  return JSON.stringify(
    {
      tools: tools.map(toolToRecord),
      tools_by_file: grouped
    },
    null,
    2
  );
}
